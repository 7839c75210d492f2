/**
 * Trend Signal Engine types
 */

import type { Timeframe } from './position';

export type TrendState = 'S0' | 'S1' | 'S2' | 'S3';

export type EngineMode = 'live' | 'bootstrap';

export interface EmaSet {
    ema20: number;
    ema30: number;
    ema60: number;
    ema144: number;
    ema250: number;
    ema333: number;
}

export interface EmaSlopes {
    ema20: number;
    ema60: number;
    ema144: number;
    ema250: number;
    ema333: number;
    /** Change of the EMA144 slope, used as a curl measure */
    dEma144: number;
}

export interface SupportResistanceLevel {
    price: number;
    /** 0..1 */
    strength: number;
}

export interface IndicatorSnapshot {
    timestamp: string;
    ema: EmaSet;
    slopes: EmaSlopes;
    atr: number;
    atrMean20: number;
    rsiSlope10: number;
    adx: number;
    adxSlope10: number;
    volumeZ: number;
    /** 5-bar change of normalized (EMA20 - EMA60) separation */
    dsepFast5: number;
    /** 5-bar change of normalized (EMA60 - EMA144) separation */
    dsepMid5: number;
    srLevels?: SupportResistanceLevel[];
}

export interface PriceBar {
    timestamp: string;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

export interface TrendFlags {
    buySignal: boolean;
    buyFlag: boolean;
    firstDipBuyFlag: boolean;
    trimFlag: boolean;
    emergencyExit: boolean;
    exitPosition: boolean;
    reclaimedEma333: boolean;
}

export type TrendFlagName = keyof TrendFlags;

export type StructuralExitReason = 'fast_band_at_bottom' | 'all_emas_below_ema333';

export interface TrendScores {
    ts: number;
    srBoost: number;
    tsWithBoost: number;
    ox: number;
    dx: number;
    edx: number;
}

export type FirstDipResetPolicy = 'per_s3_entry' | 'per_s3_entry_and_reclaim' | 'per_lifetime';

/** Context the engine carries from one evaluation to the next */
export interface TrendMeta {
    determined: boolean;
    provisional: boolean;
    liveConfirmations: number;
    /** buy_signal already raised in the current S1 episode */
    s1BuyConsumed: boolean;
    emergencyExitActive: boolean;
    firstDipConsumed: boolean;
    s3EnteredAt: string | null;
    lastTransitionAt: string | null;
}

export type TrendDiagnostics = Record<string, number | boolean | string>;

export interface TrendEngineOutput {
    timeframe: Timeframe;
    state: TrendState;
    previousState: TrendState | null;
    mode: EngineMode;
    /** False for bootstrap runs; flags are cleared in that case */
    tradable: boolean;
    flags: TrendFlags;
    exitReason: StructuralExitReason | null;
    scores: TrendScores;
    diagnostics: TrendDiagnostics;
    meta: TrendMeta;
    price: number;
    barTimestamp: string;
    evaluatedAt: string;
}

export interface TrendEngineInput {
    timeframe: Timeframe;
    snapshot: IndicatorSnapshot;
    /** Most recent bars, oldest first */
    bars: PriceBar[];
    price: number;
    barsCount: number;
    mode: EngineMode;
    now: Date;
}
