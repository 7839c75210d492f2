/**
 * Entry quality gate shared by S1 entries, S2 EMA333 retests and S3 dips.
 *
 * A buy qualifies when price sits inside an ATR halo around the anchor EMA,
 * the anchor's band is not rolling over, and trend strength (TS) plus any
 * support/resistance boost clears TS_THRESHOLD.
 */

import { TREND_CONFIG } from '../../config/trendConfig';
import type { IndicatorSnapshot, SupportResistanceLevel } from '../../types';
import { clamp } from '../../utils/math';

export type EntryAnchor = 'ema60' | 'ema333';

export interface EntryQuality {
    ok: boolean;
    entryZoneOk: boolean;
    slopeOk: boolean;
    tsOk: boolean;
    ts: number;
    srBoost: number;
    tsWithBoost: number;
    halo: number;
}

/**
 * TS = mean of normalized RSI slope and ADX slope.
 */
export function computeTrendStrength(snapshot: Pick<IndicatorSnapshot, 'rsiSlope10' | 'adxSlope10'>): number {
    const rsiWeight = clamp((snapshot.rsiSlope10 + 5) / 10);
    const adxWeight = clamp((snapshot.adxSlope10 + 2) / 4);
    return clamp((rsiWeight + adxWeight) / 2);
}

/**
 * Strongest support/resistance level near the anchor, scaled by proximity.
 */
export function computeSrBoost(
    anchor: number,
    atr: number,
    levels: SupportResistanceLevel[] | undefined
): number {
    if (!levels || levels.length === 0 || atr <= 0) {
        return 0;
    }

    const halo = TREND_CONFIG.SR_LEVEL_PROXIMITY_ATR * atr;
    let best = 0;
    for (const level of levels) {
        const distance = Math.abs(level.price - anchor);
        if (distance <= halo) {
            const proximity = 1 - distance / halo;
            best = Math.max(best, clamp(level.strength) * proximity * TREND_CONFIG.SR_BOOST_MAX);
        }
    }
    return Math.min(best, TREND_CONFIG.SR_BOOST_MAX);
}

export function isSlowBandHealthy(snapshot: IndicatorSnapshot): boolean {
    return snapshot.slopes.ema250 > 0 || snapshot.slopes.ema333 >= 0;
}

export function checkEntryQuality(
    price: number,
    snapshot: IndicatorSnapshot,
    anchor: EntryAnchor
): EntryQuality {
    const anchorValue = snapshot.ema[anchor];
    const halo = (anchor === 'ema333' ? TREND_CONFIG.EMA333_HALO_ATR : TREND_CONFIG.EMA60_HALO_ATR) * snapshot.atr;

    const entryZoneOk = Math.abs(price - anchorValue) <= halo;
    const slopeOk = anchor === 'ema333'
        ? isSlowBandHealthy(snapshot)
        : snapshot.slopes.ema60 > 0 || snapshot.slopes.ema144 >= 0;

    const ts = computeTrendStrength(snapshot);
    const srBoost = computeSrBoost(anchorValue, snapshot.atr, snapshot.srLevels);
    const tsWithBoost = ts + srBoost;
    const tsOk = tsWithBoost >= TREND_CONFIG.TS_THRESHOLD;

    return {
        ok: entryZoneOk && slopeOk && tsOk,
        entryZoneOk,
        slopeOk,
        tsOk,
        ts,
        srBoost,
        tsWithBoost: clamp(tsWithBoost),
        halo,
    };
}
