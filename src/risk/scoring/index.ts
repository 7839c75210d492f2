export type { PhaseContext, ScoreLookup, ScoreSource } from './types';
export { UNKNOWN_PHASE } from './types';
export { computeRiskScores, isScoreFresh } from './computeScores';
export { RiskScoringService } from './scoringService';
