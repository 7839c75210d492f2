/**
 * Trend engine job
 *
 * Runs the signal engine for every tracked position on a timeframe and
 * stores the output in features.trend. Dormant positions run in bootstrap
 * mode: state converges, flags stay off. Missing market data skips the
 * position for this run; the previous output stays in place and goes stale.
 */

import { ENGINE_CONFIG, getTickConcurrency } from '../config/constants';
import { TrendEngineOptions, createTrendOptions } from '../config/trendConfig';
import type { MarketDataProvider } from '../services/marketData';
import type { PositionRepository } from '../storage/positionRepository';
import type { Position, Timeframe } from '../types';
import { mapWithConcurrency } from '../utils/concurrency';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { logMissingDataRateLimited } from '../utils/rateLimitedLogger';
import { evaluateTrend, hasUsableEmas } from './trend';

export interface TrendJobDeps {
    repository: PositionRepository;
    marketData: MarketDataProvider;
    clock?: () => Date;
}

export interface TrendJobSummary {
    timeframe: Timeframe;
    evaluated: number;
    skipped: number;
    failed: number;
    transitions: number;
}

type JobOutcome = 'evaluated' | 'transition' | 'skipped' | 'failed';

export class TrendEngineJob {
    private readonly clock: () => Date;

    constructor(
        private readonly deps: TrendJobDeps,
        private readonly options: TrendEngineOptions = createTrendOptions(),
        private readonly concurrency: number = getTickConcurrency()
    ) {
        this.clock = deps.clock ?? (() => new Date());
    }

    async run(timeframe: Timeframe): Promise<TrendJobSummary> {
        const [eligible, dormant] = await Promise.all([
            this.deps.repository.getEligiblePositions(timeframe),
            this.deps.repository.getBootstrapPositions(timeframe),
        ]);
        const positions = [...eligible, ...dormant];

        const outcomes = await mapWithConcurrency(positions, this.concurrency, async position => {
            try {
                return await this.evaluatePosition(position);
            } catch (err: unknown) {
                logger.error(`[TREND] evaluation failed position=${position.id.slice(0, 8)} error=${errorMessage(err)}`);
                return 'failed' as const;
            }
        });

        const summary: TrendJobSummary = { timeframe, evaluated: 0, skipped: 0, failed: 0, transitions: 0 };
        for (const outcome of outcomes) {
            if (outcome === 'transition') {
                summary.transitions++;
                summary.evaluated++;
            } else {
                summary[outcome]++;
            }
        }

        logger.info(
            `[TREND] tf=${timeframe} evaluated=${summary.evaluated} transitions=${summary.transitions} ` +
            `skipped=${summary.skipped} failed=${summary.failed}`
        );
        return summary;
    }

    private async evaluatePosition(position: Position): Promise<JobOutcome> {
        const { marketData, repository } = this.deps;

        const snapshot = await marketData.getIndicatorSnapshot(position);
        if (!snapshot || !hasUsableEmas(snapshot.ema)) {
            logMissingDataRateLimited(position.id, 'indicators');
            return 'skipped';
        }

        const bars = await marketData.getRecentBars(position, ENGINE_CONFIG.RECENT_BARS);
        const price = await marketData.getLatestPrice(position);
        if (price === null) {
            logMissingDataRateLimited(position.id, 'price');
            return 'skipped';
        }

        const previous = position.features.trend ?? null;
        const output = evaluateTrend(
            {
                timeframe: position.timeframe,
                snapshot,
                bars,
                price,
                barsCount: position.barsCount,
                mode: position.status === 'dormant' ? 'bootstrap' : 'live',
                now: this.clock(),
            },
            previous,
            this.options
        );

        await repository.refreshFeatures(position.id, { trend: output, indicators: snapshot });

        if (previous && previous.state !== output.state) {
            logger.info(
                `[TREND] ${previous.state} → ${output.state} position=${position.id.slice(0, 8)} ` +
                `${position.instrument}/${position.timeframe} mode=${output.mode}`
            );
            return 'transition';
        }
        return 'evaluated';
    }
}
