import { Router } from 'express';
import type { Clock } from '../collector/clock.js';
import type { FetchLike } from '../collector/apiClient.js';
import { runCollector } from '../collector/collector.js';
import type { Settings } from '../config/env.js';
import { sendError } from './respond.js';

export interface CollectorRouteDeps {
  fetch?: FetchLike;
  clock?: Clock;
}

/** POST /api/collector/run: one full Collector run, answered when the snapshot is written. */
export function collectorRouter(settings: Settings, deps: CollectorRouteDeps = {}): Router {
  const router = Router();
  let running = false;

  router.post('/run', async (_req, res) => {
    if (running) {
      return res.status(409).json({ error: 'A collector run is already in progress' });
    }
    running = true;
    try {
      const result = await runCollector(settings, { fetch: deps.fetch, clock: deps.clock });
      res.json({
        runId: result.runId,
        snapshotPath: result.snapshotPath,
        succeeded: result.summary.succeeded.length,
        failed: result.summary.failed,
      });
    } catch (err) {
      sendError(res, 'collector', err);
    } finally {
      running = false;
    }
  });

  return router;
}
