// Configuration Constants for the position lifecycle engine

import type { Timeframe } from '../types';

export type RunMode = 'live' | 'dry_run' | 'off';

export const ENGINE_CONFIG = {
    // History gate (dormant → watchlist)
    DEFAULT_MIN_BARS: 350,

    // Exactly-once guard
    DEFAULT_IDEMPOTENCY_WINDOW_MS: 3 * 60 * 1000, // 3 minutes

    // Score cache
    DEFAULT_SCORE_CACHE_TTL_MS: 5 * 60 * 1000, // 5 minutes

    // Tick parallelism
    DEFAULT_TICK_CONCURRENCY: 4,

    // Smallest order the engine will send (native currency)
    MIN_ORDER_NOTIONAL: 0.0001,

    // Quantities below this are treated as zero after a sell
    DUST_QUANTITY: '0.000000000001',

    // Bars handed to the trend engine
    RECENT_BARS: 50,

    // Status server
    DEFAULT_STATUS_PORT: 3030,
} as const;

/**
 * Cadence per timeframe job. A faster timeframe ticks more often.
 */
export const TIMEFRAME_INTERVAL_MS: Record<Timeframe, number> = {
    '1m': 60 * 1000,
    '15m': 15 * 60 * 1000,
    '1h': 60 * 60 * 1000,
    '4h': 4 * 60 * 60 * 1000,
};

/**
 * An engine output older than this many intervals is not acted on.
 */
export const SIGNAL_STALENESS_INTERVALS = 3;

/**
 * Minimum gap between two trims, or two S3 dip / reclaim buys, on one
 * position. Never shorter than the idempotency window.
 */
export const REPEAT_COOLDOWN_MS: Record<Timeframe, number> = {
    '1m': 15 * 60 * 1000,
    '15m': 2 * 60 * 60 * 1000,
    '1h': 6 * 60 * 60 * 1000,
    '4h': 24 * 60 * 60 * 1000,
};

/**
 * Default split of an approved total allocation across timeframes.
 */
export const DEFAULT_TIMEFRAME_SPLITS: Record<Timeframe, number> = {
    '1m': 0.05,
    '15m': 0.125,
    '1h': 0.70,
    '4h': 0.125,
};

// ═══════════════════════════════════════════════════════════════════════════════
// ENV-BACKED GETTERS
// ═══════════════════════════════════════════════════════════════════════════════

function readInt(key: string, fallback: number): number {
    const parsed = parseInt(process.env[key] ?? String(fallback), 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function getMinBarsThreshold(): number {
    return readInt('MIN_BARS_THRESHOLD', ENGINE_CONFIG.DEFAULT_MIN_BARS);
}

export function getIdempotencyWindowMs(): number {
    return readInt('IDEMPOTENCY_WINDOW_MS', ENGINE_CONFIG.DEFAULT_IDEMPOTENCY_WINDOW_MS);
}

export function getScoreCacheTtlMs(): number {
    return readInt('SCORE_CACHE_TTL_MS', ENGINE_CONFIG.DEFAULT_SCORE_CACHE_TTL_MS);
}

export function getTickConcurrency(): number {
    return Math.max(1, readInt('TICK_CONCURRENCY', ENGINE_CONFIG.DEFAULT_TICK_CONCURRENCY));
}

export function getStatusPort(): number {
    return readInt('STATUS_PORT', ENGINE_CONFIG.DEFAULT_STATUS_PORT);
}

/**
 * Global live-execution switch. Anything other than "true" is dry-run.
 */
export function isLiveExecutionEnabled(): boolean {
    return process.env.LIVE_EXECUTION === 'true';
}

function isTimeframe(value: string): value is Timeframe {
    return value === '1m' || value === '15m' || value === '1h' || value === '4h';
}

export function getConfiguredTimeframes(): Timeframe[] {
    const raw = process.env.TIMEFRAMES;
    if (!raw) {
        return ['1m', '15m', '1h', '4h'];
    }
    return raw
        .split(',')
        .map(s => s.trim())
        .filter(isTimeframe);
}

/**
 * Run mode for one timeframe job. A per-timeframe mode can only make a job
 * safer than the global switch: "live" is downgraded to "dry_run" when live
 * execution is disabled.
 */
export function getRunMode(timeframe: Timeframe): RunMode {
    const raw = process.env[`RUN_MODE_${timeframe.toUpperCase()}`];
    const requested: RunMode = raw === 'off' || raw === 'dry_run' || raw === 'live' ? raw : 'live';
    if (requested === 'live' && !isLiveExecutionEnabled()) {
        return 'dry_run';
    }
    return requested;
}

export function getOrderServiceConfig(): { baseUrl: string; timeoutMs: number } {
    return {
        baseUrl: process.env.ORDER_SERVICE_URL ?? 'http://localhost:8080',
        timeoutMs: readInt('ORDER_SERVICE_TIMEOUT_MS', 15_000),
    };
}
