/**
 * Cached A/E scoring
 *
 * Scores live in features.riskScores. A cache younger than the TTL is reused;
 * anything older is recomputed and written back. Only this service writes the
 * cache. Failures here never stop a tick: a phase lookup failure falls back
 * to the unknown phase and a failed cache write is only logged.
 */

import { getScoreCacheTtlMs } from '../../config/constants';
import type { PhaseProvider } from '../../services/phaseProvider';
import type { PositionRepository } from '../../storage/positionRepository';
import type { Position } from '../../types';
import { errorMessage } from '../../utils/errors';
import logger from '../../utils/logger';
import { computeRiskScores, isScoreFresh } from './computeScores';
import { ScoreLookup, UNKNOWN_PHASE, PhaseContext } from './types';

export class RiskScoringService {
    constructor(
        private readonly repository: PositionRepository,
        private readonly phaseProvider: PhaseProvider,
        private readonly ttlMs: number = getScoreCacheTtlMs()
    ) {}

    async getScores(position: Position, now: Date): Promise<ScoreLookup> {
        const cached = position.features.riskScores;
        if (isScoreFresh(cached, now, this.ttlMs)) {
            return { scores: cached, source: 'cache' };
        }

        const phase = await this.loadPhase();
        const scores = computeRiskScores(phase, position, now);

        try {
            await this.repository.updateRiskScores(position.id, scores);
        } catch (err: unknown) {
            logger.warn(`[SCORES] cache write failed position=${position.id.slice(0, 8)} error=${errorMessage(err)}`);
        }

        logger.debug(
            `[SCORES] position=${position.id.slice(0, 8)} A=${scores.aggression.toFixed(3)} ` +
            `E=${scores.exitPressure.toFixed(3)} phase=${phase.macro}/${phase.meso}`
        );
        return { scores, source: 'computed' };
    }

    private async loadPhase(): Promise<PhaseContext> {
        try {
            return (await this.phaseProvider.getPhase()) ?? UNKNOWN_PHASE;
        } catch (err: unknown) {
            logger.warn(`[SCORES] phase lookup failed, using unknown phase: ${errorMessage(err)}`);
            return UNKNOWN_PHASE;
        }
    }
}
