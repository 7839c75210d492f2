/**
 * Aggression (A) and Exit-pressure (E)
 *
 * Phase sets the baseline, blended macro 40% / meso 60%. Cut pressure,
 * deployment and realized profit then lower A and raise E.
 */

import { PHASE_LEVERS, SCORE_WEIGHTS } from '../../config/sizingConfig';
import { deployedFraction, realizedProfitFraction } from '../../core/holdings';
import type { Position, RiskScores } from '../../types';
import { clamp } from '../../utils/math';
import type { PhaseContext } from './types';

export function computeRiskScores(
    phase: PhaseContext,
    position: Pick<Position, 'holdings' | 'allocationCap'>,
    now: Date
): RiskScores {
    const macro = PHASE_LEVERS[phase.macro];
    const meso = PHASE_LEVERS[phase.meso];
    const cutPressure = clamp(phase.cutPressure);
    const deployed = deployedFraction(position.holdings, position.allocationCap);
    const profit = realizedProfitFraction(position.holdings, position.allocationCap);

    const phaseA = SCORE_WEIGHTS.macro * macro.a + SCORE_WEIGHTS.meso * meso.a;
    const phaseE = SCORE_WEIGHTS.macro * macro.e + SCORE_WEIGHTS.meso * meso.e;
    const pressure =
        SCORE_WEIGHTS.cutPressure * cutPressure +
        SCORE_WEIGHTS.deployed * deployed +
        SCORE_WEIGHTS.realizedProfit * Math.min(1, profit);

    return {
        aggression: clamp(phaseA - pressure),
        exitPressure: clamp(phaseE + pressure),
        computedAt: now.toISOString(),
        components: {
            macro: phase.macro,
            meso: phase.meso,
            cutPressure,
            deployedFraction: deployed,
            realizedProfitFraction: profit,
        },
    };
}

export function isScoreFresh(scores: RiskScores | undefined, now: Date, ttlMs: number): scores is RiskScores {
    if (!scores) return false;
    const age = now.getTime() - Date.parse(scores.computedAt);
    return Number.isFinite(age) && age >= 0 && age < ttlMs;
}
