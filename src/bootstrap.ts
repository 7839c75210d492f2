/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP — COMPONENT FACTORY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Builds the component graph. NO RUNTIME LOOPS are started here.
 *
 * RULES:
 * 1. Every dependency can be injected; missing ones default to Supabase/HTTP
 * 2. One TimeframeLoop per configured timeframe, with its own run mode
 * 3. Live execution is never on unless LIVE_EXECUTION=true
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    getConfiguredTimeframes,
    getIdempotencyWindowMs,
    getMinBarsThreshold,
    getRunMode,
    getScoreCacheTtlMs,
    getTickConcurrency,
    isLiveExecutionEnabled,
} from './config/constants';
import { createTrendOptions } from './config/trendConfig';
import { DecisionOrchestrator, createOrchestratorOptions } from './engine/orchestrator';
import { TrendEngineJob } from './engine/trendEngineJob';
import { ExecutionService } from './execution/executionService';
import { HttpOrderExecutor } from './execution/httpOrderExecutor';
import type { OrderExecutor } from './execution/orderExecutor';
import { RiskScoringService } from './risk/scoring';
import { TimeframeLoop } from './runtime/timeframeLoop';
import { AuditLog, AuditSink, SupabaseAuditSink } from './services/auditLog';
import { MarketDataProvider, SupabaseMarketDataProvider } from './services/marketData';
import { PhaseProvider, SupabasePhaseProvider } from './services/phaseProvider';
import type { PositionRepository } from './storage/positionRepository';
import { SupabasePositionRepository } from './storage/supabasePositionRepository';
import type { Timeframe } from './types';
import logger from './utils/logger';

export interface BootstrapOverrides {
    repository?: PositionRepository;
    marketData?: MarketDataProvider;
    phaseProvider?: PhaseProvider;
    auditSink?: AuditSink;
    executor?: OrderExecutor;
    timeframes?: Timeframe[];
    clock?: () => Date;
}

export interface EngineComponents {
    repository: PositionRepository;
    audit: AuditLog;
    orchestrator: DecisionOrchestrator;
    trendJob: TrendEngineJob;
    loops: TimeframeLoop[];
}

export function bootstrap(overrides: BootstrapOverrides = {}): EngineComponents {
    const repository = overrides.repository ?? new SupabasePositionRepository();
    const marketData = overrides.marketData ?? new SupabaseMarketDataProvider();
    const phaseProvider = overrides.phaseProvider ?? new SupabasePhaseProvider();
    const audit = new AuditLog(overrides.auditSink ?? new SupabaseAuditSink());
    const executor = overrides.executor ?? new HttpOrderExecutor();
    const minBars = getMinBarsThreshold();
    const concurrency = getTickConcurrency();

    const scoring = new RiskScoringService(repository, phaseProvider, getScoreCacheTtlMs());
    const trendJob = new TrendEngineJob(
        { repository, marketData, clock: overrides.clock },
        createTrendOptions({ minBars }),
        concurrency
    );
    const orchestrator = new DecisionOrchestrator(
        {
            repository,
            marketData,
            scoring,
            execution: new ExecutionService(executor),
            audit,
            clock: overrides.clock,
        },
        createOrchestratorOptions({
            liveExecution: isLiveExecutionEnabled(),
            minBars,
            idempotencyWindowMs: getIdempotencyWindowMs(),
            concurrency,
        })
    );

    const timeframes = overrides.timeframes ?? getConfiguredTimeframes();
    const loops = timeframes.map(timeframe =>
        new TimeframeLoop(trendJob, orchestrator, { timeframe, runMode: getRunMode(timeframe) })
    );

    logger.info(
        `[BOOTSTRAP] timeframes=${timeframes.join(',')} live=${isLiveExecutionEnabled()} ` +
        `minBars=${minBars} modes=${loops.map(l => `${l.timeframe}:${l.runMode}`).join(',')}`
    );

    return { repository, audit, orchestrator, trendJob, loops };
}
