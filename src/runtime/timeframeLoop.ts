/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * TIMEFRAME LOOP — ONE RUNTIME DRIVER PER TIMEFRAME
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Each cycle: trend engine job → decision tick. Cycles never overlap; the
 * next one is scheduled only after the current one finishes (recursive
 * setTimeout, not setInterval).
 *
 * Run modes:
 *   live     → decisions are executed
 *   dry_run  → decisions are audited, nothing is executed
 *   off      → the loop does not start
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { RunMode, TIMEFRAME_INTERVAL_MS } from '../config/constants';
import type { DecisionOrchestrator, TickSummary } from '../engine/orchestrator';
import type { TrendEngineJob, TrendJobSummary } from '../engine/trendEngineJob';
import type { Timeframe } from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { logPeriodicSummary } from '../utils/rateLimitedLogger';

export interface CycleReport {
    timeframe: Timeframe;
    runMode: RunMode;
    trend: TrendJobSummary;
    tick: TickSummary;
}

export interface TimeframeLoopOptions {
    timeframe: Timeframe;
    runMode: RunMode;
    intervalMs?: number;
    /** Upper bound for stop() to wait on a running cycle */
    stopTimeoutMs?: number;
}

export class TimeframeLoop {
    readonly timeframe: Timeframe;
    readonly runMode: RunMode;
    private readonly intervalMs: number;
    private readonly stopTimeoutMs: number;

    private isCycling = false;
    private isRunning = false;
    private stopRequested = false;
    private loopTimeout: ReturnType<typeof setTimeout> | null = null;
    private last: CycleReport | null = null;

    constructor(
        private readonly trendJob: TrendEngineJob,
        private readonly orchestrator: DecisionOrchestrator,
        options: TimeframeLoopOptions
    ) {
        this.timeframe = options.timeframe;
        this.runMode = options.runMode;
        this.intervalMs = options.intervalMs ?? TIMEFRAME_INTERVAL_MS[options.timeframe];
        this.stopTimeoutMs = options.stopTimeoutMs ?? 60_000;
    }

    start(): void {
        if (this.runMode === 'off') {
            logger.info(`[LOOP] tf=${this.timeframe} run mode off, not starting`);
            return;
        }
        if (this.isRunning) {
            logger.warn(`[LOOP] tf=${this.timeframe} already running, ignoring start()`);
            return;
        }

        this.isRunning = true;
        this.stopRequested = false;
        logger.info(`[LOOP] tf=${this.timeframe} started mode=${this.runMode} interval=${this.intervalMs / 1000}s`);
        void this.loop();
    }

    async stop(): Promise<void> {
        if (!this.isRunning) {
            return;
        }

        this.stopRequested = true;
        if (this.loopTimeout) {
            clearTimeout(this.loopTimeout);
            this.loopTimeout = null;
        }

        const startWait = Date.now();
        while (this.isCycling && Date.now() - startWait < this.stopTimeoutMs) {
            await new Promise(resolve => setTimeout(resolve, 100));
        }
        if (this.isCycling) {
            logger.warn(`[LOOP] tf=${this.timeframe} force stopping after timeout`);
        }

        this.isRunning = false;
        logger.info(`[LOOP] tf=${this.timeframe} stopped`);
    }

    isLoopRunning(): boolean {
        return this.isRunning;
    }

    lastReport(): CycleReport | null {
        return this.last;
    }

    /**
     * Run one cycle with overlap protection. Returns null when a cycle is
     * already in progress or the cycle failed.
     */
    async runCycle(): Promise<CycleReport | null> {
        if (this.isCycling) {
            logger.warn(`[LOOP] tf=${this.timeframe} previous cycle still running, skipping`);
            return null;
        }

        this.isCycling = true;
        try {
            const trend = await this.trendJob.run(this.timeframe);
            const tick = await this.orchestrator.runTick(this.timeframe, {
                liveExecution: this.runMode === 'live',
            });
            this.last = { timeframe: this.timeframe, runMode: this.runMode, trend, tick };
            return this.last;
        } catch (err: unknown) {
            logger.error(`[LOOP] tf=${this.timeframe} cycle error: ${errorMessage(err)}`);
            return null;
        } finally {
            this.isCycling = false;
            logPeriodicSummary();
        }
    }

    private async loop(): Promise<void> {
        if (this.stopRequested) {
            return;
        }

        await this.runCycle();

        if (!this.stopRequested && this.isRunning) {
            this.loopTimeout = setTimeout(() => void this.loop(), this.intervalMs);
        }
    }
}
