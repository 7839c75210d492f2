/**
 * Holdings arithmetic
 *
 * Quantity, invested and extracted are cumulative decimal strings. Deployed
 * and realized-profit fractions are derived from these three numbers and the
 * allocation cap, never from a trade ledger.
 */

import BigNumber from 'bignumber.js';
import { ENGINE_CONFIG } from '../config/constants';
import type { ExecutionFill, Holdings } from '../types';
import { clamp, toBigNumber } from '../utils/math';

const QUANTITY_DECIMALS = 18;

export function emptyHoldings(): Holdings {
    return { quantity: '0', invested: '0', extracted: '0' };
}

export function hasQuantity(holdings: Holdings): boolean {
    return toBigNumber(holdings.quantity).isGreaterThan(0);
}

/**
 * Apply one executed fill. Sells never take quantity below zero and a
 * remainder under the dust threshold becomes exactly zero.
 */
export function applyFill(holdings: Holdings, fill: ExecutionFill): Holdings {
    const quantity = toBigNumber(holdings.quantity);
    const fillQuantity = toBigNumber(fill.quantity);
    const fillNotional = toBigNumber(fill.notional);

    if (fill.side === 'buy') {
        return {
            quantity: quantity.plus(fillQuantity).toFixed(),
            invested: toBigNumber(holdings.invested).plus(fillNotional).toFixed(),
            extracted: holdings.extracted,
        };
    }

    let remaining = BigNumber.max(quantity.minus(fillQuantity), 0);
    if (remaining.isLessThan(ENGINE_CONFIG.DUST_QUANTITY)) {
        remaining = new BigNumber(0);
    }

    return {
        quantity: remaining.toFixed(),
        invested: holdings.invested,
        extracted: toBigNumber(holdings.extracted).plus(fillNotional).toFixed(),
    };
}

/**
 * Capital still at work: invested minus extracted, floored at zero.
 */
export function netInvested(holdings: Holdings): number {
    const net = toBigNumber(holdings.invested).minus(holdings.extracted);
    return BigNumber.max(net, 0).toNumber();
}

export function deployedFraction(holdings: Holdings, allocationCap: number): number {
    if (allocationCap <= 0) return 1;
    return clamp(netInvested(holdings) / allocationCap);
}

export function realizedProfit(holdings: Holdings): number {
    const profit = toBigNumber(holdings.extracted).minus(holdings.invested);
    return BigNumber.max(profit, 0).toNumber();
}

/**
 * Realized profit as a fraction of the cap. Not clamped: values above 1 mean
 * the position has returned more than its whole allocation.
 */
export function realizedProfitFraction(holdings: Holdings, allocationCap: number): number {
    if (allocationCap <= 0) return 0;
    return realizedProfit(holdings) / allocationCap;
}

export function remainingBudget(holdings: Holdings, allocationCap: number): number {
    return Math.max(0, allocationCap - netInvested(holdings));
}

/**
 * Total return on invested capital at `price`, counting extracted proceeds.
 * Zero when nothing was ever invested.
 */
export function unrealizedReturn(holdings: Holdings, price: number): number {
    const invested = toBigNumber(holdings.invested);
    if (invested.isZero()) return 0;
    const value = toBigNumber(holdings.quantity).times(price).plus(holdings.extracted);
    return value.minus(invested).dividedBy(invested).toNumber();
}

/**
 * A fraction of the held quantity, rounded down so a sell never exceeds it.
 */
export function quantityFraction(holdings: Holdings, fraction: number): string {
    if (fraction >= 1) return toBigNumber(holdings.quantity).toFixed();
    return toBigNumber(holdings.quantity)
        .times(fraction)
        .decimalPlaces(QUANTITY_DECIMALS, BigNumber.ROUND_DOWN)
        .toFixed();
}
