/**
 * Trend Engine Job Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Per-timeframe evaluation over the repository: live vs bootstrap mode,
 * missing data, persisted outputs, transition counting.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { createTrendOptions } from '../src/config/trendConfig';
import { evaluateTrend } from '../src/engine/trend';
import { TrendEngineJob } from '../src/engine/trendEngineJob';
import { StaticMarketDataProvider } from '../src/services/marketData';
import { InMemoryPositionRepository } from '../src/storage/memoryPositionRepository';
import {
    BEARISH_EMAS,
    BULLISH_EMAS,
    RECOVERY_EMAS,
    T0,
    createPosition,
    createSnapshot,
    createTrendInput,
} from './helpers/fixtures';

const WATCH_ID = 'a1b2c3d4-0000-4000-8000-000000000001';
const DORMANT_ID = 'a1b2c3d4-0000-4000-8000-000000000002';
const NO_DATA_ID = 'a1b2c3d4-0000-4000-8000-000000000003';

function setup() {
    const repository = new InMemoryPositionRepository(() => T0);
    const marketData = new StaticMarketDataProvider();
    const job = new TrendEngineJob({ repository, marketData, clock: () => T0 }, createTrendOptions(), 2);
    return { repository, marketData, job };
}

describe('TrendEngineJob', () => {
    test('evaluates live and dormant positions, skips missing data', async () => {
        const { repository, marketData, job } = setup();
        repository.seed(createPosition({ id: WATCH_ID }));
        repository.seed(createPosition({ id: DORMANT_ID, instrument: 'DORMANT-ASSET', status: 'dormant', barsCount: 10 }));
        repository.seed(createPosition({ id: NO_DATA_ID, instrument: 'NO-DATA-ASSET' }));

        const bullish = { snapshot: createSnapshot({ ema: BULLISH_EMAS }), price: 101 };
        marketData.set({ instrument: 'TEST-ASSET', venue: 'test-venue', timeframe: '1h' }, bullish);
        marketData.set({ instrument: 'DORMANT-ASSET', venue: 'test-venue', timeframe: '1h' }, bullish);

        const summary = await job.run('1h');

        expect(summary).toEqual({ timeframe: '1h', evaluated: 2, skipped: 1, failed: 0, transitions: 0 });

        const live = await repository.getPosition(WATCH_ID);
        expect(live?.features.trend?.state).toBe('S3');
        expect(live?.features.trend?.mode).toBe('live');
        expect(live?.features.indicators?.ema).toEqual(BULLISH_EMAS);
        expect(live?.features.version).toBe(1);

        const boot = await repository.getPosition(DORMANT_ID);
        expect(boot?.features.trend?.mode).toBe('bootstrap');
        expect(boot?.features.trend?.state).toBe('S3');
        expect(boot?.features.trend?.tradable).toBe(false);

        expect((await repository.getPosition(NO_DATA_ID))?.features.trend).toBeUndefined();
    });

    test('snapshot without a price is skipped', async () => {
        const { repository, marketData, job } = setup();
        repository.seed(createPosition());
        marketData.set(
            { instrument: 'TEST-ASSET', venue: 'test-venue', timeframe: '1h' },
            { snapshot: createSnapshot() }
        );

        const summary = await job.run('1h');

        expect(summary.skipped).toBe(1);
        expect(summary.evaluated).toBe(0);
    });

    test('state change against the stored output counts as a transition', async () => {
        const { repository, marketData, job } = setup();
        const previous = evaluateTrend(
            createTrendInput({ snapshot: createSnapshot({ ema: BEARISH_EMAS }), price: 79 }),
            null,
            createTrendOptions()
        );
        repository.seed(createPosition({ features: { version: 3, trend: previous } }));
        marketData.set(
            { instrument: 'TEST-ASSET', venue: 'test-venue', timeframe: '1h' },
            { snapshot: createSnapshot({ ema: RECOVERY_EMAS }), price: 95 }
        );

        const summary = await job.run('1h');

        expect(summary.transitions).toBe(1);
        expect(summary.evaluated).toBe(1);
        const stored = await repository.getPosition(createPosition().id);
        expect(stored?.features.trend?.state).toBe('S1');
        expect(stored?.features.trend?.previousState).toBe('S0');
        expect(stored?.features.trend?.flags.buySignal).toBe(true);
        expect(stored?.features.version).toBe(4);
    });
});
