import type { Holdings, SizingTier } from '../../types';

export interface AllocationRiskContext {
    allocationCap: number;
    holdings: Holdings;
    /** Latest price, when known. Needed to tell whether the position is underwater. */
    price: number | null;
}

export interface SizeResult {
    tier: SizingTier;
    baseFraction: number;
    multiplier: number;
    /** Entries: fraction of allocation cap. Trims: fraction of holdings. */
    fraction: number;
}
