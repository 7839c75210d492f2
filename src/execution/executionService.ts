/**
 * Execution service
 *
 * Turns a trade decision into exactly one order command, calls the executor
 * once and reports the outcome. Thrown errors are converted into failure
 * outcomes here so the orchestrator sees one shape.
 */

import BigNumber from 'bignumber.js';
import type { ExecutionFill, ExecutionOutcome, Position, TradeDecision } from '../types';
import { errorMessage } from '../utils/errors';
import { generateClientOrderId } from '../utils/id';
import logger from '../utils/logger';
import type { OrderCommand, OrderExecutor, OrderResult } from './orderExecutor';

const NOTIONAL_DECIMALS = 8;

export interface ExecutionReport {
    command: OrderCommand;
    outcome: ExecutionOutcome;
    fill: ExecutionFill | null;
}

export function buildOrderCommand(position: Position, decision: TradeDecision, price: number): OrderCommand {
    const base = {
        clientOrderId: generateClientOrderId(position.id),
        positionId: position.id,
        instrument: position.instrument,
        venue: position.venue,
        timeframe: position.timeframe,
        referencePrice: price,
    };

    if (decision.type === 'add') {
        return {
            ...base,
            side: 'buy',
            notional: new BigNumber(decision.notional).decimalPlaces(NOTIONAL_DECIMALS, BigNumber.ROUND_DOWN).toFixed(),
        };
    }
    return { ...base, side: 'sell', quantity: decision.quantity };
}

export class ExecutionService {
    constructor(private readonly executor: OrderExecutor) {}

    async execute(
        position: Position,
        decision: TradeDecision,
        price: number,
        now: () => Date = () => new Date()
    ): Promise<ExecutionReport> {
        const command = buildOrderCommand(position, decision, price);
        const tag = `position=${position.id.slice(0, 8)} ${position.instrument}/${position.timeframe}`;

        logger.info(`[EXEC] START ${tag} side=${command.side} trigger=${decision.trigger} size=${decision.sizeFraction.toFixed(4)}`);

        let result: OrderResult;
        try {
            result = await this.executor.execute(command);
        } catch (err: unknown) {
            const message = errorMessage(err);
            logger.error(`[EXEC] FAIL ${tag} code=EXECUTOR_THREW ${message}`);
            return { command, outcome: { status: 'failed', errorCode: 'EXECUTOR_THREW', message }, fill: null };
        }

        if (!result.ok) {
            logger.error(`[EXEC] FAIL ${tag} code=${result.errorCode} ${result.message}`);
            return { command, outcome: { status: 'failed', errorCode: result.errorCode, message: result.message }, fill: null };
        }

        logger.info(`[EXEC] OK ${tag} ref=${result.reference} qty=${result.filledQuantity} notional=${result.notional} price=${result.price}`);

        return {
            command,
            outcome: {
                status: 'success',
                reference: result.reference,
                price: result.price,
                quantity: result.filledQuantity,
                notional: result.notional,
            },
            fill: {
                side: command.side,
                quantity: result.filledQuantity,
                notional: result.notional,
                price: result.price,
                reference: result.reference,
                executedAt: now().toISOString(),
            },
        };
    }
}
