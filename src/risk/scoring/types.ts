import type { PhaseLabel, RiskScores } from '../../types';

/**
 * Portfolio-wide context, supplied read-only by the phase provider.
 */
export interface PhaseContext {
    macro: PhaseLabel;
    meso: PhaseLabel;
    /** Drawdown pressure in [0, 1] */
    cutPressure: number;
    updatedAt: string | null;
}

export type ScoreSource = 'cache' | 'computed';

export interface ScoreLookup {
    scores: RiskScores;
    source: ScoreSource;
}

export const UNKNOWN_PHASE: PhaseContext = {
    macro: 'unknown',
    meso: 'unknown',
    cutPressure: 0,
    updatedAt: null,
};
