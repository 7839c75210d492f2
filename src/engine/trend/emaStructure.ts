/**
 * EMA band structure predicates
 *
 * Fast band: EMA20, EMA30. Mid: EMA60. Slow band: EMA144, EMA250, EMA333.
 */

import type { EmaSet } from '../../types';

/** Full bearish stack: fast band under EMA60, slow band descending to EMA333 on top. */
export function isBearishOrder(ema: EmaSet): boolean {
    return (
        ema.ema20 < ema.ema60 &&
        ema.ema30 < ema.ema60 &&
        ema.ema60 < ema.ema144 &&
        ema.ema144 < ema.ema250 &&
        ema.ema250 < ema.ema333
    );
}

/** Full bullish stack, the mirror of the bearish one. */
export function isBullishOrder(ema: EmaSet): boolean {
    return (
        ema.ema20 > ema.ema60 &&
        ema.ema30 > ema.ema60 &&
        ema.ema60 > ema.ema144 &&
        ema.ema144 > ema.ema250 &&
        ema.ema250 > ema.ema333
    );
}

export function isFastBandAboveEma60(ema: EmaSet): boolean {
    return ema.ema20 > ema.ema60 && ema.ema30 > ema.ema60;
}

/**
 * Fast band below every slower average. Structural invalidation in any state.
 */
export function isFastBandAtBottom(ema: EmaSet): boolean {
    const bottom = Math.min(ema.ema60, ema.ema144, ema.ema250, ema.ema333);
    return ema.ema20 < bottom && ema.ema30 < bottom;
}

export function allBelowEma333(ema: EmaSet): boolean {
    return (
        ema.ema20 < ema.ema333 &&
        ema.ema30 < ema.ema333 &&
        ema.ema60 < ema.ema333 &&
        ema.ema144 < ema.ema333 &&
        ema.ema250 < ema.ema333
    );
}

export function hasUsableEmas(ema: EmaSet): boolean {
    return [ema.ema20, ema.ema30, ema.ema60, ema.ema144, ema.ema250, ema.ema333]
        .every(v => Number.isFinite(v) && v > 0);
}
