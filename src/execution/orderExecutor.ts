/**
 * Order-execution boundary
 *
 * One synchronous call per decision. The executor settles the order and
 * reports the realized fill, or a failure with an error code.
 */

import type { Timeframe } from '../types';

interface OrderCommandBase {
    clientOrderId: string;
    positionId: string;
    instrument: string;
    venue: string;
    timeframe: Timeframe;
    /** Price the decision was sized against */
    referencePrice: number;
}

export interface BuyCommand extends OrderCommandBase {
    side: 'buy';
    /** Native currency to spend */
    notional: string;
}

export interface SellCommand extends OrderCommandBase {
    side: 'sell';
    /** Quantity to sell */
    quantity: string;
}

export type OrderCommand = BuyCommand | SellCommand;

export type OrderResult =
    | { ok: true; reference: string; price: number; filledQuantity: string; notional: string }
    | { ok: false; errorCode: string; message: string };

export interface OrderExecutor {
    execute(command: OrderCommand): Promise<OrderResult>;
}
