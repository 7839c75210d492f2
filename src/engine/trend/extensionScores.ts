/**
 * Extension scores for the S2/S3 regimes
 *
 * OX:  how overextended price is above its rails (trim pressure)
 * DX:  how attractive the current pullback into the EMA144→EMA333 hallway is
 * EDX: how exhausted the trend is; raises OX and suppresses DX
 *
 * All three are in [0, 1].
 */

import { DX_WEIGHTS, EDX_WEIGHTS, OX_WEIGHTS, TREND_CONFIG } from '../../config/trendConfig';
import type { IndicatorSnapshot, PriceBar } from '../../types';
import { calculateMovingAverage, clamp, sigmoid } from '../../utils/math';

const EPSILON = 1e-9;

export interface ExtensionScores {
    ox: number;
    dx: number;
    edx: number;
    components: Record<string, number>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EDX
// ═══════════════════════════════════════════════════════════════════════════════

function structureFailure(bars: PriceBar[], ema60: number): number {
    if (bars.length === 0) return sigmoid(-2.5) * 0.5 + sigmoid(-2) * 0.5;

    const belowMid = ema60 > 0
        ? bars.filter(b => b.close < ema60).length / bars.length
        : 0;

    let lowerLows = 0;
    for (let i = 1; i < bars.length; i++) {
        if (bars[i].low < bars[i - 1].low) lowerLows++;
    }
    const llRatio = bars.length >= 2 ? lowerLows / (bars.length - 1) : 0;

    return 0.5 * sigmoid((llRatio - 0.5) / 0.2) + 0.5 * sigmoid((belowMid - 0.4) / 0.2);
}

/**
 * Down-bar true range versus up-bar true range.
 */
function volatilityAsymmetry(bars: PriceBar[]): number {
    const ups: number[] = [];
    const downs: number[] = [];
    const all: number[] = [];

    for (let i = 1; i < bars.length; i++) {
        const prevClose = bars[i - 1].close;
        const bar = bars[i];
        const tr = Math.max(bar.high - bar.low, Math.abs(bar.high - prevClose), Math.abs(prevClose - bar.low));
        all.push(tr);
        if (bar.close >= prevClose) ups.push(tr); else downs.push(tr);
    }

    const fallback = calculateMovingAverage(all);
    const upAvg = ups.length > 0 ? calculateMovingAverage(ups) : fallback;
    const downAvg = downs.length > 0 ? calculateMovingAverage(downs) : fallback;

    if (upAvg <= 0) return 0;
    return sigmoid((downAvg / upAvg - 1) / 0.2);
}

export function computeEdx(snapshot: IndicatorSnapshot, bars: PriceBar[]): { edx: number; components: Record<string, number> } {
    const slowDown =
        0.5 * sigmoid(-snapshot.slopes.ema250 / TREND_CONFIG.EDX_SLOW_K) +
        0.5 * sigmoid(-snapshot.slopes.ema333 / TREND_CONFIG.EDX_SLOW_333_K);
    const structure = structureFailure(bars, snapshot.ema.ema60);
    const participationDecay = sigmoid(-snapshot.volumeZ);
    const asymmetry = volatilityAsymmetry(bars);
    const geometryRoll =
        0.6 * sigmoid(-snapshot.dsepMid5 / TREND_CONFIG.EXP_MID_K) +
        0.4 * sigmoid(-snapshot.dsepFast5 / TREND_CONFIG.EXP_FAST_K);

    const edx = clamp(
        EDX_WEIGHTS.slowDown * slowDown +
        EDX_WEIGHTS.structure * structure +
        EDX_WEIGHTS.participationDecay * participationDecay +
        EDX_WEIGHTS.asymmetry * asymmetry +
        EDX_WEIGHTS.geometryRoll * geometryRoll
    );

    return {
        edx,
        components: { edxSlowDown: slowDown, edxStructure: structure, edxParticipation: participationDecay, edxAsymmetry: asymmetry, edxGeometry: geometryRoll },
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// OX
// ═══════════════════════════════════════════════════════════════════════════════

export function computeOx(price: number, snapshot: IndicatorSnapshot, edx: number): { ox: number; components: Record<string, number> } {
    const { ema, atr } = snapshot;
    const atrMean = snapshot.atrMean20 > 0 ? snapshot.atrMean20 : (atr > 0 ? atr : 1);

    const rail = (anchor: number, k: number): number =>
        atr > 0 ? sigmoid((price - anchor) / Math.max(atr * k, EPSILON)) : 0;

    const railFast = rail(ema.ema20, TREND_CONFIG.RAIL_FAST_K);
    const railMid = rail(ema.ema60, TREND_CONFIG.RAIL_MID_K);
    const rail144 = rail(ema.ema144, TREND_CONFIG.RAIL_144_K);
    const rail250 = rail(ema.ema250, TREND_CONFIG.RAIL_250_K);
    const expFast = sigmoid(snapshot.dsepFast5 / TREND_CONFIG.EXP_FAST_K);
    const expMid = sigmoid(snapshot.dsepMid5 / TREND_CONFIG.EXP_MID_K);
    const atrSurge = sigmoid(atr / Math.max(atrMean, EPSILON) - 1);
    const fragility = sigmoid(-snapshot.slopes.ema20 / TREND_CONFIG.CURVATURE_K);

    const oxBase =
        OX_WEIGHTS.railFast * railFast +
        OX_WEIGHTS.railMid * railMid +
        OX_WEIGHTS.rail144 * rail144 +
        OX_WEIGHTS.rail250 * rail250 +
        OX_WEIGHTS.expFast * expFast +
        OX_WEIGHTS.expMid * expMid +
        OX_WEIGHTS.atrSurge * atrSurge +
        OX_WEIGHTS.fragility * fragility;

    const edxBoost = clamp(edx - 0.5, 0, 0.5);
    const ox = clamp(oxBase * (1 + TREND_CONFIG.OX_EDX_BOOST * edxBoost));

    return {
        ox,
        components: { oxRailFast: railFast, oxRailMid: railMid, oxRail144: rail144, oxRail250: rail250, oxExpFast: expFast, oxExpMid: expMid, oxAtrSurge: atrSurge, oxFragility: fragility },
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DX
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Position of price inside the EMA144→EMA333 hallway: 0 at EMA333, 1 at EMA144.
 */
export function hallwayPosition(price: number, ema144: number, ema333: number): number {
    if (ema144 > ema333) {
        return clamp((price - ema333) / Math.max(ema144 - ema333, EPSILON));
    }
    if (ema333 > ema144) {
        return clamp((price - ema144) / Math.max(ema333 - ema144, EPSILON));
    }
    return price <= ema144 ? 1 : 0;
}

export function computeDx(price: number, snapshot: IndicatorSnapshot, edx: number): { dx: number; components: Record<string, number> } {
    const { ema, atr } = snapshot;
    const atrMean = snapshot.atrMean20 > 0 ? snapshot.atrMean20 : (atr > 0 ? atr : 1);

    const x = hallwayPosition(price, ema.ema144, ema.ema333);
    const bandWidth = ema.ema144 !== ema.ema333
        ? Math.abs(ema.ema144 - ema.ema333)
        : Math.max(ema.ema144, ema.ema333) * 0.01;

    const compression = sigmoid((0.03 - bandWidth / Math.max(price, EPSILON)) / 0.02);
    const location = Math.exp(-TREND_CONFIG.DX_HALLWAY_DECAY * x) * (1 + TREND_CONFIG.DX_COMPRESSION_WEIGHT * compression);
    const exhaustion = sigmoid(-snapshot.volumeZ);
    const atrRelief = sigmoid((atr / Math.max(atrMean, EPSILON) - 0.9) / 0.05);
    const rsiRelief = sigmoid(snapshot.rsiSlope10 / TREND_CONFIG.RSI_K);
    const adxRelief = snapshot.adx >= TREND_CONFIG.ADX_FLOOR ? sigmoid(snapshot.adxSlope10 / TREND_CONFIG.ADX_K) : 0;
    const relief = 0.5 * atrRelief + 0.5 * (0.5 * rsiRelief + 0.5 * adxRelief);
    const curl = snapshot.slopes.dEma144 > 0 ? 1 : 0;

    const dxBase =
        DX_WEIGHTS.location * location +
        DX_WEIGHTS.exhaustion * exhaustion +
        DX_WEIGHTS.relief * relief +
        DX_WEIGHTS.curl * curl;

    const suppression = clamp(edx - 0.6, 0, 0.4);
    const dx = clamp(dxBase * (1 - 0.5 * suppression));

    return {
        dx,
        components: { dxLocation: location, dxExhaustion: exhaustion, dxRelief: relief, dxCurl: curl, dxCompression: compression },
    };
}

/**
 * DX threshold after exhaustion suppression and hallway-position adjustment.
 * Buying is easiest near EMA333 and gets harder as EDX rises.
 */
export function dipBuyThreshold(price: number, snapshot: IndicatorSnapshot, edx: number): number {
    let edxSuppression = 0;
    if (edx >= 0.7) {
        edxSuppression = 0.15;
    } else if (edx >= 0.5) {
        edxSuppression = (edx - 0.5) * 0.5;
    }

    let positionBoost = 0;
    const { ema144, ema333 } = snapshot.ema;
    if (price <= ema144 && ema144 > ema333) {
        const towards333 = 1 - hallwayPosition(price, ema144, ema333);
        positionBoost = towards333 * TREND_CONFIG.DX_POSITION_BOOST_NEAR_333 -
            (1 - towards333) * TREND_CONFIG.DX_POSITION_PENALTY_NEAR_144;
    }

    return Math.max(0, TREND_CONFIG.DX_BUY_THRESHOLD + edxSuppression - positionBoost);
}

export function computeExtensionScores(price: number, snapshot: IndicatorSnapshot, bars: PriceBar[]): ExtensionScores {
    const edx = computeEdx(snapshot, bars);
    const ox = computeOx(price, snapshot, edx.edx);
    const dx = computeDx(price, snapshot, edx.edx);
    return {
        ox: ox.ox,
        dx: dx.dx,
        edx: edx.edx,
        components: { ...edx.components, ...ox.components, ...dx.components },
    };
}
