/**
 * Allocation-risk multipliers
 *
 * ENTRY
 *   realized profit ≥ cap   → 0.3
 *   realized profit > 0     → 1 − 0.7 · (profit / cap), floored at 0.3
 *   underwater (return r<0) → 1 + 0.5 · min(1, −r / 0.5), up to 1.5
 *   otherwise               → 1.0
 *
 * TRIM
 *   realized profit ≥ cap   → 0.3
 *   otherwise               → 1 + 2 · clamp((deployed − 0.5) / 0.5), up to 3.0
 */

import { RISK_MULTIPLIER_CONFIG as CFG } from '../../config/sizingConfig';
import { deployedFraction, realizedProfitFraction, unrealizedReturn } from '../../core/holdings';
import { clamp } from '../../utils/math';
import type { AllocationRiskContext } from './types';

export function entryRiskMultiplier(ctx: AllocationRiskContext): number {
    const profitFraction = realizedProfitFraction(ctx.holdings, ctx.allocationCap);
    if (profitFraction >= 1) {
        return CFG.PAID_FOR_ITSELF;
    }
    if (profitFraction > 0) {
        return 1 - CFG.ENTRY_PROFIT_SHRINK * clamp(profitFraction);
    }

    if (ctx.price !== null && ctx.price > 0) {
        const r = unrealizedReturn(ctx.holdings, ctx.price);
        if (r < 0) {
            return 1 + CFG.ENTRY_UNDERWATER_GAIN * clamp(-r / CFG.ENTRY_UNDERWATER_FULL_AT);
        }
    }
    return 1;
}

export function trimRiskMultiplier(ctx: AllocationRiskContext): number {
    const profitFraction = realizedProfitFraction(ctx.holdings, ctx.allocationCap);
    if (profitFraction >= 1) {
        return CFG.PAID_FOR_ITSELF;
    }
    const deployed = deployedFraction(ctx.holdings, ctx.allocationCap);
    const ramp = clamp((deployed - CFG.TRIM_DEPLOYED_START) / (1 - CFG.TRIM_DEPLOYED_START));
    return 1 + CFG.TRIM_DEPLOYED_GAIN * ramp;
}
