/**
 * Rate-Limited Logger
 *
 * A position with no market data, or a stale engine output, would otherwise
 * log the same line on every tick. Identical lines are emitted at most once
 * per window and the suppressed count is appended to the next emission.
 */

import logger from './logger';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const RATE_LIMIT_CONFIG = {
    DEFAULT_RATE_LIMIT_MS: 60 * 1000,
    MISSING_DATA_RATE_LIMIT_MS: 15 * 60 * 1000,
    STALE_SIGNAL_RATE_LIMIT_MS: 15 * 60 * 1000,
    SUMMARY_INTERVAL_MS: 5 * 60 * 1000,
    MAX_TRACKED_KEYS: 1000,
};

// ═══════════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════════

interface RateLimitEntry {
    lastLogTime: number;
    suppressedCount: number;
    category: string;
}

const rateLimitMap = new Map<string, RateLimitEntry>();
let lastSummaryTime = Date.now();

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log with rate limiting. Returns true if logged, false if suppressed.
 */
export function rateLimitedLog(
    category: string,
    key: string,
    message: string,
    rateLimitMs: number = RATE_LIMIT_CONFIG.DEFAULT_RATE_LIMIT_MS,
    logLevel: 'info' | 'warn' | 'debug' = 'info',
    now: number = Date.now()
): boolean {
    const compositeKey = `${category}:${key}`;
    const existing = rateLimitMap.get(compositeKey);

    if (existing && (now - existing.lastLogTime) < rateLimitMs) {
        existing.suppressedCount++;
        return false;
    }

    let logMessage = `[${category.toUpperCase()}] ${message}`;
    if (existing && existing.suppressedCount > 0) {
        logMessage += ` (suppressed=${existing.suppressedCount})`;
    }

    switch (logLevel) {
        case 'warn':
            logger.warn(logMessage);
            break;
        case 'debug':
            logger.debug(logMessage);
            break;
        default:
            logger.info(logMessage);
    }

    if (!existing && rateLimitMap.size >= RATE_LIMIT_CONFIG.MAX_TRACKED_KEYS) {
        evictOldestEntry();
    }
    rateLimitMap.set(compositeKey, { lastLogTime: now, suppressedCount: 0, category });

    return true;
}

export function logMissingDataRateLimited(positionId: string, what: string): boolean {
    return rateLimitedLog(
        'MISSING-DATA',
        `${positionId}:${what}`,
        `position=${positionId.slice(0, 8)} missing=${what}`,
        RATE_LIMIT_CONFIG.MISSING_DATA_RATE_LIMIT_MS,
        'warn'
    );
}

export function logStaleSignalRateLimited(positionId: string, ageMs: number): boolean {
    return rateLimitedLog(
        'STALE-SIGNAL',
        positionId,
        `position=${positionId.slice(0, 8)} ageMin=${Math.round(ageMs / 60000)}`,
        RATE_LIMIT_CONFIG.STALE_SIGNAL_RATE_LIMIT_MS,
        'warn'
    );
}

/**
 * Log a one-line summary of suppressed lines per category.
 */
export function logPeriodicSummary(forceLog: boolean = false): void {
    const now = Date.now();
    if (!forceLog && (now - lastSummaryTime) < RATE_LIMIT_CONFIG.SUMMARY_INTERVAL_MS) {
        return;
    }
    lastSummaryTime = now;

    const totals = new Map<string, number>();
    for (const entry of rateLimitMap.values()) {
        if (entry.suppressedCount > 0) {
            totals.set(entry.category, (totals.get(entry.category) ?? 0) + entry.suppressedCount);
        }
    }
    if (totals.size === 0) {
        return;
    }

    const parts = Array.from(totals, ([category, count]) => `${category}=${count}`);
    logger.info(`[LOG-SUMMARY] Suppressed logs: ${parts.join(' | ')}`);
}

function evictOldestEntry(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of rateLimitMap) {
        if (entry.lastLogTime < oldestTime) {
            oldestTime = entry.lastLogTime;
            oldestKey = key;
        }
    }

    if (oldestKey) {
        rateLimitMap.delete(oldestKey);
    }
}
