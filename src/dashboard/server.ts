import express from 'express';
import type { Server } from 'http';
import { isTimeframe } from '../storage/codec';
import type { PositionRepository } from '../storage/positionRepository';
import type { CycleReport, TimeframeLoop } from '../runtime/timeframeLoop';
import type { Position } from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

/**
 * Read-only status endpoints:
 *   GET /health               loop states
 *   GET /positions/:timeframe tracked positions with their latest signal
 *   GET /ticks                last cycle report per timeframe
 */

export interface StatusServerDeps {
  repository: PositionRepository;
  loops: TimeframeLoop[];
}

function positionView(p: Position) {
  const trend = p.features.trend;
  return {
    id: p.id,
    instrument: p.instrument,
    venue: p.venue,
    timeframe: p.timeframe,
    status: p.status,
    allocationCap: p.allocationCap,
    holdings: p.holdings,
    barsCount: p.barsCount,
    lastExecutionAt: p.lastExecutionAt,
    trend: trend
      ? {
          state: trend.state,
          mode: trend.mode,
          tradable: trend.tradable,
          provisional: trend.meta.provisional,
          flags: trend.flags,
          evaluatedAt: trend.evaluatedAt,
        }
      : null,
    riskScores: p.features.riskScores
      ? { aggression: p.features.riskScores.aggression, exitPressure: p.features.riskScores.exitPressure }
      : null,
  };
}

export function createStatusServer(deps: StatusServerDeps): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      loops: deps.loops.map(l => ({
        timeframe: l.timeframe,
        runMode: l.runMode,
        running: l.isLoopRunning(),
      })),
    });
  });

  app.get('/positions/:timeframe', async (req, res) => {
    const { timeframe } = req.params;
    if (!isTimeframe(timeframe)) {
      res.status(400).json({ error: `unknown timeframe: ${timeframe}` });
      return;
    }

    try {
      const [eligible, dormant] = await Promise.all([
        deps.repository.getEligiblePositions(timeframe),
        deps.repository.getBootstrapPositions(timeframe),
      ]);
      res.json({ timeframe, positions: [...eligible, ...dormant].map(positionView) });
    } catch (err: unknown) {
      logger.error(`[STATUS-HTTP] positions lookup failed tf=${timeframe}: ${errorMessage(err)}`);
      res.status(500).json({ error: 'position lookup failed' });
    }
  });

  app.get('/ticks', (_req, res) => {
    const reports: CycleReport[] = [];
    for (const loop of deps.loops) {
      const report = loop.lastReport();
      if (report) reports.push(report);
    }
    res.json({ reports });
  });

  return app;
}

export function startStatusServer(app: express.Express, port: number): Promise<Server> {
  return new Promise(resolve => {
    const server = app.listen(port, () => {
      logger.info(`[STATUS-HTTP] listening on port ${port}`);
      resolve(server);
    });
  });
}
