/**
 * Allocation split across timeframes
 *
 * An approved instrument gets one position per timeframe, each with its own
 * carved slice of the total allocation.
 */

import { DEFAULT_TIMEFRAME_SPLITS } from '../config/constants';
import type { AllocationApproval, NewPosition, Timeframe } from '../types';
import { TIMEFRAMES } from '../types';
import { initialStatus } from './positionModel';

const SPLIT_TOLERANCE = 1e-9;

export function splitAllocation(
    totalAllocation: number,
    splits: Record<Timeframe, number> = DEFAULT_TIMEFRAME_SPLITS
): Record<Timeframe, number> {
    if (!Number.isFinite(totalAllocation) || totalAllocation < 0) {
        throw new Error(`[ALLOCATION] invalid total allocation ${totalAllocation}`);
    }

    const sum = TIMEFRAMES.reduce((acc, tf) => acc + splits[tf], 0);
    if (Math.abs(sum - 1) > SPLIT_TOLERANCE) {
        throw new Error(`[ALLOCATION] timeframe splits sum to ${sum}, expected 1`);
    }
    if (TIMEFRAMES.some(tf => splits[tf] < 0)) {
        throw new Error('[ALLOCATION] negative timeframe split');
    }

    const caps: Record<Timeframe, number> = { '1m': 0, '15m': 0, '1h': 0, '4h': 0 };
    for (const tf of TIMEFRAMES) {
        caps[tf] = totalAllocation * splits[tf];
    }
    return caps;
}

/**
 * Positions to create for an approval, one per timeframe with a non-zero cap.
 */
export function planPositionsForApproval(approval: AllocationApproval, minBars: number): NewPosition[] {
    const caps = splitAllocation(approval.totalAllocation, approval.splits);

    return TIMEFRAMES
        .filter(tf => caps[tf] > 0)
        .map(tf => {
            const barsCount = approval.barsCountByTimeframe[tf] ?? 0;
            return {
                instrument: approval.instrument,
                venue: approval.venue,
                timeframe: tf,
                status: initialStatus(barsCount, minBars),
                allocationCap: caps[tf],
                barsCount,
            };
        });
}
