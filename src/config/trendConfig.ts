/**
 * Trend Signal Engine thresholds
 *
 * Score weights and sigmoid scales for the S2/S3 trim (OX), dip (DX) and
 * exhaustion (EDX) composites live here next to the gate thresholds.
 */

import type { FirstDipResetPolicy } from '../types';

export const TREND_CONFIG = {
    // Entry quality
    TS_THRESHOLD: 0.58,
    SR_BOOST_MAX: 0.15,
    SR_LEVEL_PROXIMITY_ATR: 1.0,
    EMA60_HALO_ATR: 1.0,
    EMA333_HALO_ATR: 0.5,

    // Emergency exit / reclaim
    EMERGENCY_EXIT_BUFFER_ATR: 0,
    RECLAIM_MIN_TS: 0.5,

    // Trim
    OX_TRIM_THRESHOLD: 0.65,
    OX_EDX_BOOST: 0.33,

    // Dip buy
    DX_BUY_THRESHOLD: 0.65,
    DX_HALLWAY_DECAY: 3,
    DX_COMPRESSION_WEIGHT: 0.3,
    DX_POSITION_BOOST_NEAR_333: 0.10,
    DX_POSITION_PENALTY_NEAR_144: 0.05,

    // Momentum scales
    ADX_FLOOR: 18,
    RSI_K: 0.5,
    ADX_K: 0.3,

    // EMA20 slope scale for fragility
    CURVATURE_K: 0.0008,

    // Rail distances in ATR units
    RAIL_FAST_K: 1.5,
    RAIL_MID_K: 2.0,
    RAIL_144_K: 1.5,
    RAIL_250_K: 2.0,

    // Separation expansion scales
    EXP_FAST_K: 0.0015,
    EXP_MID_K: 0.0010,

    // Exhaustion slope scales
    EDX_SLOW_K: 0.00025,
    EDX_SLOW_333_K: 0.0002,

    // Bootstrap → live confirmation
    PROVISIONAL_CONFIRMATIONS: 2,
} as const;

export const DEFAULT_FIRST_DIP_RESET: FirstDipResetPolicy = 'per_s3_entry_and_reclaim';

export const OX_WEIGHTS = {
    railFast: 0.35,
    railMid: 0.20,
    rail144: 0.10,
    rail250: 0.10,
    expFast: 0.10,
    expMid: 0.05,
    atrSurge: 0.05,
    fragility: 0.05,
} as const;

export const DX_WEIGHTS = {
    location: 0.45,
    exhaustion: 0.25,
    relief: 0.25,
    curl: 0.05,
} as const;

export const EDX_WEIGHTS = {
    slowDown: 0.30,
    structure: 0.25,
    participationDecay: 0.20,
    asymmetry: 0.15,
    geometryRoll: 0.10,
} as const;


export interface TrendEngineOptions {
    minBars: number;
    firstDipReset: FirstDipResetPolicy;
    emergencyBufferAtr: number;
}

export function createTrendOptions(overrides: Partial<TrendEngineOptions> = {}): TrendEngineOptions {
    return {
        minBars: 350,
        firstDipReset: DEFAULT_FIRST_DIP_RESET,
        emergencyBufferAtr: TREND_CONFIG.EMERGENCY_EXIT_BUFFER_ATR,
        ...overrides,
    };
}
