/**
 * Decision Orchestrator
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ONE TICK, PER TIMEFRAME:
 *   1. Promote dormant positions whose history reached the threshold
 *   2. For each eligible position (isolated, bounded concurrency):
 *        invariants → history gate → signal freshness → A/E → plan
 *        → repeat gate (execution history)
 *   3. Holds and dry runs are audited and stop there
 *   4. Trades claim the idempotency window, execute once, record the fill
 *      together with the execution history entry
 *
 * INVARIANTS:
 *   - At most one executed order per position per idempotency window
 *   - At most one executed order per engine output
 *   - Executor failure leaves holdings untouched
 *   - Every evaluated position produces exactly one decision/hold record
 *   - One position failing never stops the others
 *
 * GREP-FRIENDLY LOGS:
 *   [TICK] [STATUS] [REPEAT] [DUPLICATE] [INVARIANT] [EXEC-RECORD]
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    SIGNAL_STALENESS_INTERVALS,
    TIMEFRAME_INTERVAL_MS,
    getIdempotencyWindowMs,
    getMinBarsThreshold,
    getTickConcurrency,
    isLiveExecutionEnabled,
} from '../config/constants';
import { historyUpdateFor, repeatHoldReason } from '../core/executionHistory';
import { assertPositionInvariants, shouldDemote, shouldPromote } from '../core/positionModel';
import type { ExecutionService } from '../execution/executionService';
import type { RiskScoringService } from '../risk/scoring';
import type { AuditLog } from '../services/auditLog';
import type { MarketDataProvider } from '../services/marketData';
import type { PositionRepository } from '../storage/positionRepository';
import type { HoldReason, Position, StatusChange, Timeframe, TrendEngineOutput } from '../types';
import { mapWithConcurrency } from '../utils/concurrency';
import { InvariantViolationError, errorMessage } from '../utils/errors';
import { generateTickId } from '../utils/id';
import logger from '../utils/logger';
import { logStaleSignalRateLimited } from '../utils/rateLimitedLogger';
import { decisionRecord, emptyJustification, holdRecord, transitionRecord } from './auditRecords';
import { planDecision } from './decisionPlanner';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface OrchestratorDeps {
    repository: PositionRepository;
    marketData: MarketDataProvider;
    scoring: RiskScoringService;
    execution: ExecutionService;
    audit: AuditLog;
    clock?: () => Date;
}

export interface OrchestratorOptions {
    /** false = dry run: decisions are audited, nothing is executed */
    liveExecution: boolean;
    minBars: number;
    idempotencyWindowMs: number;
    concurrency: number;
    /** Engine output older than this is not acted on */
    maxSignalAgeMs: (timeframe: Timeframe) => number;
}

export type PositionOutcome =
    | 'hold'
    | 'executed'
    | 'failed'
    | 'skipped_duplicate'
    | 'dry_run'
    | 'demoted'
    | 'error';

export interface TickSummary {
    tickId: string;
    timeframe: Timeframe;
    liveExecution: boolean;
    startedAt: string;
    finishedAt: string;
    promoted: number;
    evaluated: number;
    outcomes: Record<PositionOutcome, number>;
    errors: Array<{ positionId: string; message: string }>;
}

interface TickContext {
    tickId: string;
    timeframe: Timeframe;
    now: Date;
    liveExecution: boolean;
}

export function createOrchestratorOptions(overrides: Partial<OrchestratorOptions> = {}): OrchestratorOptions {
    return {
        liveExecution: isLiveExecutionEnabled(),
        minBars: getMinBarsThreshold(),
        idempotencyWindowMs: getIdempotencyWindowMs(),
        concurrency: getTickConcurrency(),
        maxSignalAgeMs: tf => SIGNAL_STALENESS_INTERVALS * TIMEFRAME_INTERVAL_MS[tf],
        ...overrides,
    };
}

function emptyOutcomes(): Record<PositionOutcome, number> {
    return { hold: 0, executed: 0, failed: 0, skipped_duplicate: 0, dry_run: 0, demoted: 0, error: 0 };
}

function tag(position: Position): string {
    return `position=${position.id.slice(0, 8)} ${position.instrument}/${position.timeframe}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class DecisionOrchestrator {
    private readonly clock: () => Date;

    constructor(
        private readonly deps: OrchestratorDeps,
        private readonly options: OrchestratorOptions = createOrchestratorOptions()
    ) {
        this.clock = deps.clock ?? (() => new Date());
    }

    /**
     * Run one tick for a timeframe. `liveExecution` overrides the configured
     * switch for this tick only (per-timeframe run modes).
     */
    async runTick(timeframe: Timeframe, overrides: { liveExecution?: boolean } = {}): Promise<TickSummary> {
        const ctx: TickContext = {
            tickId: generateTickId(),
            timeframe,
            now: this.clock(),
            liveExecution: overrides.liveExecution ?? this.options.liveExecution,
        };
        const outcomes = emptyOutcomes();
        const errors: TickSummary['errors'] = [];

        logger.info(`[TICK] START tf=${timeframe} tick=${ctx.tickId.slice(0, 8)} live=${ctx.liveExecution}`);

        const promoted = await this.promoteDormant(ctx);
        const positions = await this.deps.repository.getEligiblePositions(timeframe);

        const results = await mapWithConcurrency(positions, this.options.concurrency, async position => {
            try {
                return await this.processPosition(position, ctx);
            } catch (err: unknown) {
                const message = errorMessage(err);
                if (err instanceof InvariantViolationError) {
                    logger.error(message);
                } else {
                    logger.error(`[TICK] position failed ${tag(position)} error=${message}`);
                }
                errors.push({ positionId: position.id, message });
                return 'error' as const;
            }
        });

        for (const outcome of results) {
            outcomes[outcome]++;
        }

        await this.deps.audit.flush();

        const summary: TickSummary = {
            tickId: ctx.tickId,
            timeframe,
            liveExecution: ctx.liveExecution,
            startedAt: ctx.now.toISOString(),
            finishedAt: this.clock().toISOString(),
            promoted,
            evaluated: positions.length,
            outcomes,
            errors,
        };

        logger.info(
            `[TICK] DONE tf=${timeframe} evaluated=${summary.evaluated} promoted=${promoted} ` +
            `executed=${outcomes.executed} holds=${outcomes.hold} dup=${outcomes.skipped_duplicate} ` +
            `dry=${outcomes.dry_run} failed=${outcomes.failed} errors=${outcomes.error}`
        );
        return summary;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STATUS GATING
    // ═══════════════════════════════════════════════════════════════════════════

    private async promoteDormant(ctx: TickContext): Promise<number> {
        let promoted = 0;
        let dormant: Position[];
        try {
            dormant = await this.deps.repository.getBootstrapPositions(ctx.timeframe);
        } catch (err: unknown) {
            logger.error(`[STATUS] bootstrap lookup failed tf=${ctx.timeframe} error=${errorMessage(err)}`);
            return 0;
        }

        for (const position of dormant) {
            if (!shouldPromote(position, this.options.minBars)) {
                continue;
            }
            try {
                const updated = await this.deps.repository.updateStatus(position.id, 'dormant', 'watchlist');
                if (updated) {
                    promoted++;
                    logger.info(`[STATUS] dormant → watchlist ${tag(position)} bars=${position.barsCount}`);
                    this.deps.audit.append(
                        transitionRecord(ctx.tickId, updated, 'dormant', 'watchlist', 'history_sufficient', ctx.now)
                    );
                }
            } catch (err: unknown) {
                logger.error(`[STATUS] promotion failed ${tag(position)} error=${errorMessage(err)}`);
            }
        }
        return promoted;
    }

    private hold(ctx: TickContext, position: Position, reason: HoldReason): 'hold' {
        this.deps.audit.append(
            holdRecord(ctx.tickId, position, { type: 'hold', reason }, emptyJustification(), ctx.now)
        );
        return 'hold';
    }

    private isStale(position: Position, trend: TrendEngineOutput, ctx: TickContext): boolean {
        const age = ctx.now.getTime() - Date.parse(trend.evaluatedAt);
        if (Number.isNaN(age) || age > this.options.maxSignalAgeMs(ctx.timeframe)) {
            logStaleSignalRateLimited(position.id, Number.isNaN(age) ? 0 : age);
            return true;
        }
        return false;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PER-POSITION PIPELINE
    // ═══════════════════════════════════════════════════════════════════════════

    private async processPosition(position: Position, ctx: TickContext): Promise<PositionOutcome> {
        const { repository, marketData, scoring, execution, audit } = this.deps;

        assertPositionInvariants(position);

        if (shouldDemote(position, this.options.minBars)) {
            const updated = await repository.updateStatus(position.id, 'watchlist', 'dormant');
            if (updated) {
                logger.warn(`[STATUS] watchlist → dormant ${tag(position)} bars=${position.barsCount}`);
                audit.append(transitionRecord(ctx.tickId, updated, 'watchlist', 'dormant', 'history_insufficient', ctx.now));
            }
            return 'demoted';
        }
        if (position.barsCount < this.options.minBars) {
            return this.hold(ctx, position, 'insufficient_history');
        }

        const trend = position.features.trend;
        if (!trend || this.isStale(position, trend, ctx)) {
            return this.hold(ctx, position, 'stale_signal');
        }

        const { scores, source } = await scoring.getScores(position, ctx.now);
        const price = (await marketData.getLatestPrice(position)) ?? trend.price;

        const { decision, justification } = planDecision({ position, trend, scores, scoreSource: source, price });

        if (decision.type === 'hold') {
            audit.append(holdRecord(ctx.tickId, position, decision, justification, ctx.now));
            return 'hold';
        }

        const repeat = repeatHoldReason(decision, trend, position.features.executionHistory, position.timeframe, ctx.now);
        if (repeat !== null) {
            logger.info(`[REPEAT] ${tag(position)} ${decision.type} trigger=${decision.trigger} reason=${repeat}`);
            audit.append(holdRecord(ctx.tickId, position, { type: 'hold', reason: repeat }, justification, ctx.now));
            return 'hold';
        }

        if (!ctx.liveExecution) {
            logger.info(`[EXEC] DRY-RUN ${tag(position)} ${decision.type} trigger=${decision.trigger}`);
            audit.append(decisionRecord(ctx.tickId, position, decision, justification, { status: 'dry_run' }, ctx.now));
            return 'dry_run';
        }

        const claim = await repository.claimExecution(position.id, ctx.now, this.options.idempotencyWindowMs);
        if (!claim.claimed) {
            logger.warn(`[DUPLICATE] ${tag(position)} last=${claim.lastExecutionAt ?? 'none'} trigger=${decision.trigger}`);
            audit.append(decisionRecord(
                ctx.tickId,
                position,
                decision,
                justification,
                { status: 'skipped', reason: 'duplicate', lastExecutionAt: claim.lastExecutionAt },
                ctx.now
            ));
            return 'skipped_duplicate';
        }

        const report = await execution.execute(position, decision, price, this.clock);
        audit.append(decisionRecord(ctx.tickId, position, decision, justification, report.outcome, ctx.now));

        if (report.fill === null) {
            return 'failed';
        }

        let statusChange: StatusChange | null;
        try {
            ({ statusChange } = await repository.recordExecution(
                position.id,
                report.fill,
                historyUpdateFor(decision, trend, report.fill)
            ));
        } catch (err: unknown) {
            // Order is filled but holdings are not. Needs manual reconciliation.
            logger.error(
                `[EXEC-RECORD] fill not recorded ${tag(position)} ref=${report.fill.reference} ` +
                `side=${report.fill.side} qty=${report.fill.quantity} error=${errorMessage(err)}`
            );
            throw err;
        }

        if (statusChange) {
            const cause = statusChange.to === 'active' ? 'first_entry' : 'full_exit';
            logger.info(`[STATUS] ${statusChange.from} → ${statusChange.to} ${tag(position)} cause=${cause}`);
            audit.append(transitionRecord(ctx.tickId, position, statusChange.from, statusChange.to, cause, ctx.now));
        }

        return 'executed';
    }
}
