/**
 * Allocation approvals → positions
 *
 * An approved (instrument, venue) allocation is split across timeframes and
 * one position is created per timeframe with a non-zero cap. Creation is
 * idempotent on the (instrument, venue, timeframe) tuple.
 */

import { getMinBarsThreshold } from '../config/constants';
import { planPositionsForApproval } from '../core/allocation';
import type { PositionRepository } from '../storage/positionRepository';
import type { AllocationApproval, Position } from '../types';
import logger from '../utils/logger';

export async function openPositionsForApproval(
    repository: PositionRepository,
    approval: AllocationApproval,
    minBars: number = getMinBarsThreshold()
): Promise<Position[]> {
    const plans = planPositionsForApproval(approval, minBars);
    if (plans.length === 0) {
        logger.warn(`[ALLOCATION] nothing to open for ${approval.instrument}@${approval.venue}`);
        return [];
    }

    const positions = await repository.createPositions(plans);

    for (const p of positions) {
        logger.info(
            `[ALLOCATION] ${p.instrument}@${p.venue} tf=${p.timeframe} cap=${p.allocationCap} ` +
            `status=${p.status} bars=${p.barsCount}`
        );
    }
    return positions;
}
