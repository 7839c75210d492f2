/**
 * Sizing tables
 *
 * Entry bases are fractions of allocation cap; trim bases are fractions of
 * current holdings. Tier thresholds apply to A for entries and E for trims.
 */

import type { PhaseLabel, SizingTier } from '../types';

export const TIER_THRESHOLDS = {
    aggressive: 0.7,
    patient: 0.3,
} as const;

export type EntryStage = 's1' | 'later' | 'first_dip';

export const ENTRY_BASE_FRACTIONS: Record<EntryStage, Record<SizingTier, number>> = {
    s1: { aggressive: 0.50, normal: 0.30, patient: 0.10 },
    later: { aggressive: 0.25, normal: 0.15, patient: 0.05 },
    first_dip: { aggressive: 0.35, normal: 0.20, patient: 0.07 },
};

export const TRIM_BASE_FRACTIONS: Record<SizingTier, number> = {
    aggressive: 0.50,
    normal: 0.10,
    patient: 0.03,
};

export const RISK_MULTIPLIER_CONFIG = {
    // Realized profit already covers the allocation
    PAID_FOR_ITSELF: 0.3,
    // Entry: shrink linearly from 1.0 towards 0.3 as profit approaches the cap
    ENTRY_PROFIT_SHRINK: 0.7,
    // Entry: grow up to 1.5x at a 50% drawdown
    ENTRY_UNDERWATER_GAIN: 0.5,
    ENTRY_UNDERWATER_FULL_AT: 0.5,
    // Trim: grow up to 3x as deployment goes from 50% to 100%
    TRIM_DEPLOYED_START: 0.5,
    TRIM_DEPLOYED_GAIN: 2.0,
} as const;

export const SCORE_WEIGHTS = {
    macro: 0.4,
    meso: 0.6,
    cutPressure: 0.30,
    deployed: 0.10,
    realizedProfit: 0.10,
} as const;

/**
 * Phase contribution to aggression (a) and exit pressure (e).
 */
export const PHASE_LEVERS: Record<PhaseLabel, { a: number; e: number }> = {
    euphoria: { a: 0.35, e: 0.70 },
    good: { a: 0.65, e: 0.35 },
    recover: { a: 0.75, e: 0.30 },
    dip: { a: 0.35, e: 0.55 },
    double_dip: { a: 0.25, e: 0.65 },
    capitulation: { a: 0.10, e: 0.85 },
    unknown: { a: 0.5, e: 0.5 },
};
