import { Router } from 'express';
import { z } from 'zod';
import type { Settings } from '../config/env.js';
import { readByRunId, readLatestRuns } from '../storage/runLog.js';

const RunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

/** Run log readers: GET /api/runs?limit=N and GET /api/runs/:runId */
export function runsRouter(settings: Settings): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const query = RunsQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'Invalid query', details: query.error.flatten().fieldErrors });
    }
    res.json({ events: readLatestRuns(settings.dataDir, query.data.limit) });
  });

  router.get('/:runId', (req, res) => {
    const events = readByRunId(settings.dataDir, req.params.runId);
    if (events.length === 0) {
      return res.status(404).json({ error: 'Run not found' });
    }
    res.json({ runId: req.params.runId, events });
  });

  return router;
}
