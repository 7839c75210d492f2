/**
 * Shared test fixtures. Every builder takes a partial override.
 */

import { emptyHoldings } from '../../src/core/holdings';
import { initialMeta, noFlags } from '../../src/engine/trend/trendEngine';
import type {
    EmaSet,
    IndicatorSnapshot,
    Position,
    RiskScores,
    TrendEngineInput,
    TrendEngineOutput,
    TrendFlags,
    TrendMeta,
} from '../../src/types';

export const T0 = new Date('2026-01-05T12:00:00.000Z');

export function minutesAfter(base: Date, minutes: number): Date {
    return new Date(base.getTime() + minutes * 60 * 1000);
}

// ═══════════════════════════════════════════════════════════════════════════════
// EMA LAYOUTS
// ═══════════════════════════════════════════════════════════════════════════════

/** 20 > 30 > 60 > 144 > 250 > 333 */
export const BULLISH_EMAS: EmaSet = { ema20: 110, ema30: 108, ema60: 105, ema144: 100, ema250: 95, ema333: 90 };

/** Mirror of bullish; fast band is also below every slower EMA */
export const BEARISH_EMAS: EmaSet = { ema20: 80, ema30: 82, ema60: 85, ema144: 90, ema250: 95, ema333: 100 };

/** Fast band back above EMA60, slow band still overhead */
export const RECOVERY_EMAS: EmaSet = { ema20: 96, ema30: 95, ema60: 94, ema144: 97, ema250: 99, ema333: 100 };

/** Everything under EMA333 but the fast band is not at the bottom */
export const BROKEN_EMAS: EmaSet = { ema20: 98, ema30: 98, ema60: 97, ema144: 96, ema250: 95, ema333: 100 };

// ═══════════════════════════════════════════════════════════════════════════════
// BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Defaults give TS = 0.775 (rsiSlope10 = 3, adxSlope10 = 1), healthy slopes,
 * ATR 2 and no support/resistance levels.
 */
export function createSnapshot(partial: Partial<IndicatorSnapshot> = {}): IndicatorSnapshot {
    return {
        timestamp: T0.toISOString(),
        ema: BULLISH_EMAS,
        slopes: { ema20: 0.5, ema60: 0.5, ema144: 0.5, ema250: 0.5, ema333: 0.5, dEma144: 1 },
        atr: 2,
        atrMean20: 1,
        rsiSlope10: 3,
        adx: 25,
        adxSlope10: 1,
        volumeZ: -3,
        dsepFast5: 0.01,
        dsepMid5: 0.01,
        ...partial,
    };
}

export function createTrendInput(partial: Partial<TrendEngineInput> = {}): TrendEngineInput {
    return {
        timeframe: '1h',
        snapshot: createSnapshot(),
        bars: [],
        price: 91,
        barsCount: 400,
        mode: 'live',
        now: T0,
        ...partial,
    };
}

export function createPosition(partial: Partial<Position> = {}): Position {
    return {
        id: 'a1b2c3d4-0000-4000-8000-000000000001',
        instrument: 'TEST-ASSET',
        venue: 'test-venue',
        timeframe: '1h',
        status: 'watchlist',
        allocationCap: 1000,
        holdings: emptyHoldings(),
        barsCount: 400,
        features: { version: 0 },
        lastExecutionAt: null,
        createdAt: T0.toISOString(),
        updatedAt: T0.toISOString(),
        ...partial,
    };
}

export function createTrendOutput(
    partial: Omit<Partial<TrendEngineOutput>, 'flags' | 'meta'> & {
        flags?: Partial<TrendFlags>;
        meta?: Partial<TrendMeta>;
    } = {}
): TrendEngineOutput {
    const { flags, meta, ...rest } = partial;
    return {
        timeframe: '1h',
        state: 'S1',
        previousState: 'S0',
        mode: 'live',
        tradable: true,
        exitReason: null,
        scores: { ts: 0.775, srBoost: 0, tsWithBoost: 0.775, ox: 0, dx: 0, edx: 0 },
        diagnostics: {},
        price: 100,
        barTimestamp: T0.toISOString(),
        evaluatedAt: T0.toISOString(),
        ...rest,
        flags: { ...noFlags(), ...flags },
        meta: { ...initialMeta(), determined: true, ...meta },
    };
}

export function createRiskScores(partial: Partial<RiskScores> = {}): RiskScores {
    return {
        aggression: 0.5,
        exitPressure: 0.5,
        computedAt: T0.toISOString(),
        components: {
            macro: 'unknown',
            meso: 'unknown',
            cutPressure: 0,
            deployedFraction: 0,
            realizedProfitFraction: 0,
        },
        ...partial,
    };
}
