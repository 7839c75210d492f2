/**
 * Market-data / indicator provider
 *
 * Read-only view over bars and indicator snapshots that external ingestion
 * jobs keep fresh. Tables: price_bars, indicator_snapshots.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { getSupabaseClient } from '../integrations/supabaseClient';
import { parseIndicatorSnapshot, parsePriceBarRow } from '../storage/codec';
import type { IndicatorSnapshot, PositionKey, PriceBar } from '../types';
import { assertNoDbError } from './db';

export interface MarketDataProvider {
    getIndicatorSnapshot(key: PositionKey): Promise<IndicatorSnapshot | null>;
    /** Most recent `limit` bars, oldest first */
    getRecentBars(key: PositionKey, limit: number): Promise<PriceBar[]>;
    getLatestPrice(key: PositionKey): Promise<number | null>;
}

export class SupabaseMarketDataProvider implements MarketDataProvider {
    constructor(private readonly client: SupabaseClient = getSupabaseClient()) {}

    async getIndicatorSnapshot(key: PositionKey): Promise<IndicatorSnapshot | null> {
        const { data, error } = await this.client
            .from('indicator_snapshots')
            .select('payload')
            .eq('instrument', key.instrument)
            .eq('venue', key.venue)
            .eq('timeframe', key.timeframe)
            .order('timestamp', { ascending: false })
            .limit(1)
            .maybeSingle();
        assertNoDbError('indicator_snapshots', { op: 'GET_SNAPSHOT', details: { ...key } }, error);

        const row: unknown = data;
        if (row === null || typeof row !== 'object' || !('payload' in row)) {
            return null;
        }
        return parseIndicatorSnapshot(row.payload);
    }

    async getRecentBars(key: PositionKey, limit: number): Promise<PriceBar[]> {
        const { data, error } = await this.client
            .from('price_bars')
            .select('timestamp, open, high, low, close, volume')
            .eq('instrument', key.instrument)
            .eq('venue', key.venue)
            .eq('timeframe', key.timeframe)
            .order('timestamp', { ascending: false })
            .limit(limit);
        assertNoDbError('price_bars', { op: 'GET_BARS', details: { ...key } }, error);

        const rows: unknown[] = data ?? [];
        return rows.map(parsePriceBarRow).reverse();
    }

    async getLatestPrice(key: PositionKey): Promise<number | null> {
        const bars = await this.getRecentBars(key, 1);
        const last = bars[bars.length - 1];
        return last && last.close > 0 ? last.close : null;
    }
}

/**
 * Fixed data keyed by instrument/venue/timeframe. Used by tests and replays.
 */
export class StaticMarketDataProvider implements MarketDataProvider {
    private readonly snapshots = new Map<string, IndicatorSnapshot>();
    private readonly bars = new Map<string, PriceBar[]>();
    private readonly prices = new Map<string, number>();

    private static keyOf(key: PositionKey): string {
        return `${key.instrument}|${key.venue}|${key.timeframe}`;
    }

    set(key: PositionKey, data: { snapshot?: IndicatorSnapshot; bars?: PriceBar[]; price?: number }): void {
        const k = StaticMarketDataProvider.keyOf(key);
        if (data.snapshot) this.snapshots.set(k, data.snapshot);
        if (data.bars) this.bars.set(k, data.bars);
        if (data.price !== undefined) this.prices.set(k, data.price);
    }

    async getIndicatorSnapshot(key: PositionKey): Promise<IndicatorSnapshot | null> {
        return this.snapshots.get(StaticMarketDataProvider.keyOf(key)) ?? null;
    }

    async getRecentBars(key: PositionKey, limit: number): Promise<PriceBar[]> {
        return (this.bars.get(StaticMarketDataProvider.keyOf(key)) ?? []).slice(-limit);
    }

    async getLatestPrice(key: PositionKey): Promise<number | null> {
        const k = StaticMarketDataProvider.keyOf(key);
        const explicit = this.prices.get(k);
        if (explicit !== undefined) return explicit;
        const bars = this.bars.get(k) ?? [];
        return bars.length > 0 ? bars[bars.length - 1].close : null;
    }
}
