/**
 * Decision planner
 *
 * Pure mapping from (engine flags, A/E scores, holdings, price) to one
 * decision. Precedence picks the action; sizing tables pick the size; a
 * decision that cannot be acted on becomes a hold with a reason.
 */

import { ENGINE_CONFIG } from '../config/constants';
import { hasQuantity, quantityFraction, remainingBudget } from '../core/holdings';
import type { ScoreSource } from '../risk/scoring/types';
import { computeEntrySize, computeTrimSize, entryStageFor } from '../risk/sizing';
import type { SizeResult } from '../risk/sizing';
import type {
    Decision,
    DecisionJustification,
    HoldReason,
    Position,
    RiskScores,
    TrendEngineOutput,
} from '../types';
import { toBigNumber } from '../utils/math';
import { selectAction } from './trend/precedence';

export interface PlanInput {
    position: Pick<Position, 'allocationCap' | 'holdings'>;
    trend: TrendEngineOutput;
    scores: RiskScores;
    scoreSource: ScoreSource;
    price: number | null;
}

export interface PlannedDecision {
    decision: Decision;
    justification: DecisionJustification;
}

function justify(input: PlanInput, size: SizeResult | null): DecisionJustification {
    return {
        state: input.trend.state,
        flags: { ...input.trend.flags },
        exitReason: input.trend.exitReason,
        trendScores: { ...input.trend.scores },
        aggression: input.scores.aggression,
        exitPressure: input.scores.exitPressure,
        scoreSource: input.scoreSource,
        tier: size?.tier ?? null,
        baseFraction: size?.baseFraction ?? null,
        riskMultiplier: size?.multiplier ?? null,
    };
}

function hold(input: PlanInput, reason: HoldReason, size: SizeResult | null = null): PlannedDecision {
    return { decision: { type: 'hold', reason }, justification: justify(input, size) };
}

export function planDecision(input: PlanInput): PlannedDecision {
    const { position, scores, price } = input;
    const action = selectAction(input.trend.flags);

    if (action === null) {
        return hold(input, 'no_signal');
    }
    if (price === null || !(price > 0)) {
        return hold(input, 'no_price');
    }

    const ctx = { allocationCap: position.allocationCap, holdings: position.holdings, price };

    switch (action) {
        case 'exit_position':
        case 'emergency_exit': {
            if (!hasQuantity(position.holdings)) {
                return hold(input, 'no_holdings');
            }
            return {
                decision: { type: 'exit', trigger: action, sizeFraction: 1, quantity: position.holdings.quantity },
                justification: justify(input, null),
            };
        }

        case 'trim_flag': {
            if (!hasQuantity(position.holdings)) {
                return hold(input, 'no_holdings');
            }
            const size = computeTrimSize(scores.exitPressure, ctx);
            const quantity = quantityFraction(position.holdings, size.fraction);
            if (!toBigNumber(quantity).isGreaterThan(0)) {
                return hold(input, 'below_min_size', size);
            }
            return {
                decision: { type: 'trim', trigger: 'trim_flag', sizeFraction: size.fraction, quantity },
                justification: justify(input, size),
            };
        }

        case 'buy_signal':
        case 'buy_flag':
        case 'first_dip_buy_flag':
        case 'reclaimed_ema333': {
            const size = computeEntrySize(entryStageFor(action), scores.aggression, ctx);
            const budget = remainingBudget(position.holdings, position.allocationCap);
            if (budget < ENGINE_CONFIG.MIN_ORDER_NOTIONAL) {
                return hold(input, 'allocation_exhausted', size);
            }

            const notional = Math.min(size.fraction * position.allocationCap, budget);
            if (notional < ENGINE_CONFIG.MIN_ORDER_NOTIONAL) {
                return hold(input, 'below_min_size', size);
            }
            return {
                decision: { type: 'add', trigger: action, sizeFraction: notional / position.allocationCap, notional },
                justification: justify(input, size),
            };
        }
    }
}
