/**
 * Position lifecycle rules
 *
 * STATUS FSM:
 *   dormant ──bars ≥ threshold──▶ watchlist ──first fill──▶ active
 *                                     ▲                       │
 *                                     └──────full exit────────┘
 *   watchlist/active ──manual──▶ paused/archived
 *
 * INVARIANTS:
 * - quantity ≥ 0
 * - active ⇔ quantity > 0 (for tradable statuses)
 * - watchlist ⇒ quantity == 0
 */

import type { Position, PositionStatus, Holdings } from '../types';
import { InvariantViolationError } from '../utils/errors';
import { toBigNumber } from '../utils/math';

export const ELIGIBLE_STATUSES: readonly PositionStatus[] = ['watchlist', 'active'];

export function isEligible(status: PositionStatus): boolean {
    return ELIGIBLE_STATUSES.includes(status);
}

/**
 * Throws InvariantViolationError when holdings contradict status.
 */
export function assertPositionInvariants(position: Pick<Position, 'id' | 'status' | 'holdings'>): void {
    const quantity = toBigNumber(position.holdings.quantity);

    if (quantity.isNaN()) {
        throw new InvariantViolationError(position.id, 'quantity is not a number', {
            quantity: position.holdings.quantity,
        });
    }
    if (quantity.isNegative()) {
        throw new InvariantViolationError(position.id, 'negative quantity', {
            quantity: position.holdings.quantity,
        });
    }
    if (position.status === 'active' && quantity.isZero()) {
        throw new InvariantViolationError(position.id, 'active position with zero holdings');
    }
    if (position.status === 'watchlist' && !quantity.isZero()) {
        throw new InvariantViolationError(position.id, 'watchlist position with non-zero holdings', {
            quantity: position.holdings.quantity,
        });
    }
}

/**
 * Status after holdings change through an executed fill.
 */
export function statusAfterHoldingsChange(status: PositionStatus, holdings: Holdings): PositionStatus {
    const held = toBigNumber(holdings.quantity).isGreaterThan(0);
    if (status === 'watchlist' && held) return 'active';
    if (status === 'active' && !held) return 'watchlist';
    return status;
}

/**
 * Initial status for a newly opened position.
 */
export function initialStatus(barsCount: number, threshold: number): PositionStatus {
    return barsCount >= threshold ? 'watchlist' : 'dormant';
}

export function shouldPromote(position: Pick<Position, 'status' | 'barsCount'>, threshold: number): boolean {
    return position.status === 'dormant' && position.barsCount >= threshold;
}

/**
 * A watchlist position whose history fell below the gate goes back to dormant.
 * Active positions are never demoted: they hold until holdings reach zero.
 */
export function shouldDemote(position: Pick<Position, 'status' | 'barsCount'>, threshold: number): boolean {
    return position.status === 'watchlist' && position.barsCount < threshold;
}
