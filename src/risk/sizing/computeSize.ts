/**
 * Table-driven sizing
 *
 * Tier from the score (≥ 0.7 aggressive, < 0.3 patient), base fraction from
 * the table for the entry stage, then the allocation-risk multiplier.
 */

import { ENTRY_BASE_FRACTIONS, EntryStage, TIER_THRESHOLDS, TRIM_BASE_FRACTIONS } from '../../config/sizingConfig';
import type { EntryTrigger, SizingTier } from '../../types';
import { entryRiskMultiplier, trimRiskMultiplier } from './multipliers';
import type { AllocationRiskContext, SizeResult } from './types';

export function tierFor(score: number): SizingTier {
    if (score >= TIER_THRESHOLDS.aggressive) return 'aggressive';
    if (score < TIER_THRESHOLDS.patient) return 'patient';
    return 'normal';
}

export function entryStageFor(trigger: EntryTrigger): EntryStage {
    switch (trigger) {
        case 'buy_signal':
            return 's1';
        case 'first_dip_buy_flag':
            return 'first_dip';
        case 'buy_flag':
        case 'reclaimed_ema333':
            return 'later';
    }
}

/**
 * Entry size as a fraction of the allocation cap. Not clipped to the
 * remaining budget; the planner does that.
 */
export function computeEntrySize(
    stage: EntryStage,
    aggression: number,
    ctx: AllocationRiskContext
): SizeResult {
    const tier = tierFor(aggression);
    const baseFraction = ENTRY_BASE_FRACTIONS[stage][tier];
    const multiplier = entryRiskMultiplier(ctx);
    return { tier, baseFraction, multiplier, fraction: baseFraction * multiplier };
}

/**
 * Trim size as a fraction of current holdings, capped at 1.
 */
export function computeTrimSize(exitPressure: number, ctx: AllocationRiskContext): SizeResult {
    const tier = tierFor(exitPressure);
    const baseFraction = TRIM_BASE_FRACTIONS[tier];
    const multiplier = trimRiskMultiplier(ctx);
    return { tier, baseFraction, multiplier, fraction: Math.min(1, baseFraction * multiplier) };
}
