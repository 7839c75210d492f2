/**
 * Trend Signal Engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * STATES
 * ═══════════════════════════════════════════════════════════════════════════════
 *   S0  bearish / undetermined. No trade flags.
 *   S1  fast band reclaimed EMA60. buy_signal once per episode.
 *   S2  price above EMA333 without full alignment. Retest buys, trims.
 *   S3  full bullish alignment. Trims, dip buys, emergency exit, reclaim.
 *
 * TRANSITIONS
 *   (none) → S3 on bullish order, → S0 on bearish order, else wait
 *   S0 → S1  fast band above EMA60 and price > EMA60
 *   S1 → S2  price > EMA333
 *   S2 → S1  price < EMA333
 *   S2 → S3  bullish order
 *   S3 → S0  EMA20..EMA250 all below EMA333 (exit_position)
 *   any → S0 fast band below every slower EMA (exit_position)
 *
 * The function is pure: the previous output carries all context (meta) and
 * the caller persists the result.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { TREND_CONFIG, TrendEngineOptions, createTrendOptions } from '../../config/trendConfig';
import type {
    StructuralExitReason,
    TrendDiagnostics,
    TrendEngineInput,
    TrendEngineOutput,
    TrendFlags,
    TrendMeta,
    TrendScores,
    TrendState,
} from '../../types';
import { checkEntryQuality, isSlowBandHealthy } from './entryQuality';
import {
    allBelowEma333,
    isBearishOrder,
    isBullishOrder,
    isFastBandAboveEma60,
    isFastBandAtBottom,
} from './emaStructure';
import { computeExtensionScores, dipBuyThreshold } from './extensionScores';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function noFlags(): TrendFlags {
    return {
        buySignal: false,
        buyFlag: false,
        firstDipBuyFlag: false,
        trimFlag: false,
        emergencyExit: false,
        exitPosition: false,
        reclaimedEma333: false,
    };
}

export function initialMeta(): TrendMeta {
    return {
        determined: false,
        provisional: false,
        liveConfirmations: 0,
        s1BuyConsumed: false,
        emergencyExitActive: false,
        firstDipConsumed: false,
        s3EnteredAt: null,
        lastTransitionAt: null,
    };
}

interface StepResult {
    state: TrendState;
    flags: TrendFlags;
    exitReason: StructuralExitReason | null;
    scores: TrendScores;
    diagnostics: TrendDiagnostics;
    meta: TrendMeta;
}

/**
 * Context dropped by a structural reset. First-dip consumption survives only
 * under the per-lifetime policy.
 */
function resetContext(meta: TrendMeta, options: TrendEngineOptions): TrendMeta {
    return {
        ...meta,
        s1BuyConsumed: false,
        emergencyExitActive: false,
        s3EnteredAt: null,
        firstDipConsumed: options.firstDipReset === 'per_lifetime' ? meta.firstDipConsumed : false,
    };
}

function enterS3(meta: TrendMeta, now: string, options: TrendEngineOptions): TrendMeta {
    return {
        ...meta,
        s3EnteredAt: now,
        emergencyExitActive: false,
        firstDipConsumed: options.firstDipReset === 'per_lifetime' ? meta.firstDipConsumed : false,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE STEP
// ═══════════════════════════════════════════════════════════════════════════════

function step(
    input: TrendEngineInput,
    previous: TrendEngineOutput | null,
    options: TrendEngineOptions
): StepResult {
    const { snapshot, price } = input;
    const ema = snapshot.ema;
    const now = input.now.toISOString();

    const flags = noFlags();
    let meta: TrendMeta = { ...(previous?.meta ?? initialMeta()) };
    let prevState: TrendState | null = meta.determined && previous ? previous.state : null;

    const quality60 = checkEntryQuality(price, snapshot, 'ema60');
    const scores: TrendScores = {
        ts: quality60.ts,
        srBoost: quality60.srBoost,
        tsWithBoost: quality60.tsWithBoost,
        ox: 0,
        dx: 0,
        edx: 0,
    };
    const diagnostics: TrendDiagnostics = {
        entryZoneOk: quality60.entryZoneOk,
        slopeOk: quality60.slopeOk,
        tsOk: quality60.tsOk,
        halo: quality60.halo,
    };

    // Live evaluation without enough history never trusts derived signals
    if (input.mode === 'live' && input.barsCount < options.minBars) {
        diagnostics.insufficientHistory = true;
        return { state: 'S0', flags, exitReason: null, scores, diagnostics, meta: initialMeta() };
    }

    if (prevState === null) {
        if (isBullishOrder(ema)) {
            meta = enterS3({ ...meta, determined: true }, now, options);
            prevState = 'S3';
        } else if (isBearishOrder(ema)) {
            meta = { ...meta, determined: true };
            prevState = 'S0';
        } else {
            diagnostics.awaitingClearOrder = true;
            return { state: 'S0', flags, exitReason: null, scores, diagnostics, meta };
        }
    }

    if (isFastBandAtBottom(ema)) {
        flags.exitPosition = true;
        return {
            state: 'S0',
            flags,
            exitReason: 'fast_band_at_bottom',
            scores,
            diagnostics,
            meta: resetContext(meta, options),
        };
    }

    switch (prevState) {
        case 'S0': {
            if (isFastBandAboveEma60(ema) && price > ema.ema60) {
                meta.s1BuyConsumed = false;
                if (quality60.ok) {
                    flags.buySignal = true;
                    meta.s1BuyConsumed = true;
                }
                return { state: 'S1', flags, exitReason: null, scores, diagnostics, meta };
            }
            return { state: 'S0', flags, exitReason: null, scores, diagnostics, meta };
        }

        case 'S1': {
            if (price > ema.ema333) {
                return { state: 'S2', flags, exitReason: null, scores, diagnostics, meta };
            }
            if (!meta.s1BuyConsumed && quality60.ok) {
                flags.buySignal = true;
                meta.s1BuyConsumed = true;
            }
            return { state: 'S1', flags, exitReason: null, scores, diagnostics, meta };
        }

        case 'S2': {
            if (price < ema.ema333) {
                return { state: 'S1', flags, exitReason: null, scores, diagnostics, meta };
            }
            if (isBullishOrder(ema)) {
                return { state: 'S3', flags, exitReason: null, scores, diagnostics, meta: enterS3(meta, now, options) };
            }

            const ext = computeExtensionScores(price, snapshot, input.bars);
            const retest = checkEntryQuality(price, snapshot, 'ema333');
            flags.trimFlag = ext.ox >= TREND_CONFIG.OX_TRIM_THRESHOLD;
            flags.buyFlag = retest.ok;

            Object.assign(scores, { ox: ext.ox, dx: ext.dx, edx: ext.edx, srBoost: retest.srBoost, tsWithBoost: retest.tsWithBoost });
            Object.assign(diagnostics, ext.components, {
                retestEntryZoneOk: retest.entryZoneOk,
                retestSlopeOk: retest.slopeOk,
                retestTsOk: retest.tsOk,
            });
            return { state: 'S2', flags, exitReason: null, scores, diagnostics, meta };
        }

        case 'S3': {
            if (allBelowEma333(ema)) {
                flags.exitPosition = true;
                return {
                    state: 'S0',
                    flags,
                    exitReason: 'all_emas_below_ema333',
                    scores,
                    diagnostics,
                    meta: resetContext(meta, options),
                };
            }

            const ext = computeExtensionScores(price, snapshot, input.bars);
            const quality333 = checkEntryQuality(price, snapshot, 'ema333');
            Object.assign(scores, { ox: ext.ox, dx: ext.dx, edx: ext.edx, srBoost: quality333.srBoost, tsWithBoost: quality333.tsWithBoost });
            Object.assign(diagnostics, ext.components);

            const emergencyLine = ema.ema333 - options.emergencyBufferAtr * snapshot.atr;
            diagnostics.emergencyLine = emergencyLine;

            if (price < emergencyLine) {
                flags.emergencyExit = true;
                meta.emergencyExitActive = true;
                return { state: 'S3', flags, exitReason: null, scores, diagnostics, meta };
            }

            if (meta.emergencyExitActive) {
                if (price > ema.ema333 && quality333.ts >= TREND_CONFIG.RECLAIM_MIN_TS) {
                    flags.reclaimedEma333 = true;
                    meta.emergencyExitActive = false;
                    if (options.firstDipReset === 'per_s3_entry_and_reclaim') {
                        meta.firstDipConsumed = false;
                    }
                } else {
                    // Between the break and a confirmed reclaim nothing else is raised
                    return { state: 'S3', flags, exitReason: null, scores, diagnostics, meta };
                }
            }

            flags.trimFlag = ext.ox >= TREND_CONFIG.OX_TRIM_THRESHOLD;

            const inDiscount = price <= ema.ema144;
            const threshold = dipBuyThreshold(price, snapshot, ext.edx);
            const dipOk = ext.dx >= threshold && inDiscount && isSlowBandHealthy(snapshot) && quality333.tsOk;
            Object.assign(diagnostics, { dipThreshold: threshold, inDiscount, dipOk });

            if (dipOk) {
                if (!meta.firstDipConsumed) {
                    flags.firstDipBuyFlag = true;
                    meta.firstDipConsumed = true;
                } else {
                    flags.buyFlag = true;
                }
            }
            return { state: 'S3', flags, exitReason: null, scores, diagnostics, meta };
        }
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FLAG GATING
// ═══════════════════════════════════════════════════════════════════════════════

const NON_EXIT_FLAGS: ReadonlyArray<keyof TrendFlags> = [
    'buySignal',
    'buyFlag',
    'firstDipBuyFlag',
    'trimFlag',
    'reclaimedEma333',
];

/**
 * Clear suppressed flags. A once-only flag that gets suppressed is handed back
 * so the next tradable evaluation can raise it.
 */
function suppress(result: StepResult, names: ReadonlyArray<keyof TrendFlags>): void {
    if (names.includes('buySignal') && result.flags.buySignal) {
        result.meta.s1BuyConsumed = false;
    }
    if (names.includes('firstDipBuyFlag') && result.flags.firstDipBuyFlag) {
        result.meta.firstDipConsumed = false;
    }
    for (const name of names) {
        result.flags[name] = false;
    }
}

function isTransitional(state: TrendState): boolean {
    return state === 'S1' || state === 'S2';
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Evaluate one position on one timeframe.
 *
 * Bootstrap runs converge state but never raise flags; landing in S1/S2 marks
 * the state provisional. Live runs keep entry and trim flags off while the
 * state is provisional, until a live transition or enough live confirmations.
 */
export function evaluateTrend(
    input: TrendEngineInput,
    previous: TrendEngineOutput | null,
    options: TrendEngineOptions = createTrendOptions()
): TrendEngineOutput {
    const result = step(input, previous, options);
    const prevMeta = previous?.meta ?? initialMeta();
    const previousState = previous?.state ?? null;
    const now = input.now.toISOString();

    if (input.mode === 'bootstrap') {
        suppress(result, [...NON_EXIT_FLAGS, 'emergencyExit', 'exitPosition']);
        result.meta.provisional = result.meta.determined && isTransitional(result.state);
        result.meta.liveConfirmations = 0;
    } else if (prevMeta.provisional && result.meta.determined && isTransitional(result.state)) {
        const transitioned = previousState !== result.state;
        const confirmations = prevMeta.liveConfirmations + 1;
        const confirmed = transitioned || confirmations >= TREND_CONFIG.PROVISIONAL_CONFIRMATIONS;
        result.meta.provisional = !confirmed;
        result.meta.liveConfirmations = confirmed ? 0 : confirmations;
        if (!confirmed) {
            suppress(result, NON_EXIT_FLAGS);
        }
    } else {
        result.meta.provisional = false;
        result.meta.liveConfirmations = 0;
    }

    if (previousState !== null && previousState !== result.state) {
        result.meta.lastTransitionAt = now;
    }

    return {
        timeframe: input.timeframe,
        state: result.state,
        previousState,
        mode: input.mode,
        tradable: input.mode === 'live' && result.meta.determined,
        flags: result.flags,
        exitReason: result.exitReason,
        scores: result.scores,
        diagnostics: { ...result.diagnostics, provisional: result.meta.provisional },
        meta: result.meta,
        price: input.price,
        barTimestamp: input.snapshot.timestamp,
        evaluatedAt: now,
    };
}
