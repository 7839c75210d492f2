/**
 * Status Server Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Read-only HTTP views over loops and positions, served in-process.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import axios from 'axios';
import type { Server } from 'http';
import { createStatusServer } from '../src/dashboard/server';
import { TimeframeLoop } from '../src/runtime/timeframeLoop';
import { createTestEngine } from './helpers/engine';
import { createPosition, createRiskScores, createTrendOutput } from './helpers/fixtures';
import { closeServer, listenOnFreePort } from './helpers/listen';

describe('Status server', () => {
    let server: Server;
    let baseUrl: string;
    let loop: TimeframeLoop;

    beforeAll(async () => {
        const engine = createTestEngine();
        engine.repository.seed(createPosition({
            features: { version: 2, trend: createTrendOutput(), riskScores: createRiskScores() },
        }));
        engine.repository.seed(createPosition({
            id: 'a1b2c3d4-0000-4000-8000-000000000002',
            instrument: 'DORMANT-ASSET',
            status: 'dormant',
            barsCount: 12,
        }));

        loop = new TimeframeLoop(engine.trendJob, engine.orchestrator, { timeframe: '1h', runMode: 'dry_run' });
        const app = createStatusServer({ repository: engine.repository, loops: [loop] });
        ({ server, baseUrl } = await listenOnFreePort(app));
    });

    afterAll(async () => {
        await closeServer(server);
    });

    test('GET /health lists loops', async () => {
        const res = await axios.get(`${baseUrl}/health`);

        expect(res.status).toBe(200);
        expect(res.data).toEqual({
            status: 'ok',
            loops: [{ timeframe: '1h', runMode: 'dry_run', running: false }],
        });
    });

    test('GET /positions/:timeframe returns eligible then dormant positions', async () => {
        const res = await axios.get(`${baseUrl}/positions/1h`);

        expect(res.status).toBe(200);
        expect(res.data.timeframe).toBe('1h');
        expect(res.data.positions).toHaveLength(2);

        const [watch, dormant] = res.data.positions;
        expect(watch.status).toBe('watchlist');
        expect(watch.trend).toEqual({
            state: 'S1',
            mode: 'live',
            tradable: true,
            provisional: false,
            flags: {
                buySignal: false,
                buyFlag: false,
                firstDipBuyFlag: false,
                trimFlag: false,
                emergencyExit: false,
                exitPosition: false,
                reclaimedEma333: false,
            },
            evaluatedAt: '2026-01-05T12:00:00.000Z',
        });
        expect(watch.riskScores).toEqual({ aggression: 0.5, exitPressure: 0.5 });
        expect(dormant.status).toBe('dormant');
        expect(dormant.trend).toBeNull();
    });

    test('GET /positions/:timeframe rejects unknown timeframes', async () => {
        const res = await axios.get(`${baseUrl}/positions/2h`, { validateStatus: () => true });

        expect(res.status).toBe(400);
        expect(res.data).toEqual({ error: 'unknown timeframe: 2h' });
    });

    test('GET /ticks returns last cycle reports', async () => {
        const empty = await axios.get(`${baseUrl}/ticks`);
        expect(empty.data).toEqual({ reports: [] });

        await loop.runCycle();
        const res = await axios.get(`${baseUrl}/ticks`);

        expect(res.data.reports).toHaveLength(1);
        expect(res.data.reports[0].timeframe).toBe('1h');
        expect(res.data.reports[0].runMode).toBe('dry_run');
    });
});
