import { Router } from 'express';
import { join } from 'node:path';
import { z } from 'zod';
import type { Settings } from '../config/env.js';
import { listSnapshots } from '../storage/snapshotStore.js';
import { runGeneration } from '../template/synchronizer.js';
import { sendError } from './respond.js';

const GenerateBodySchema = z.object({
  /** Snapshot file name inside DATA_DIR, e.g. "2024-03-01_projects.json" */
  snapshot: z.string().optional(),
  tolerance: z.number().positive().optional(),
  epsilon: z.number().nonnegative().optional(),
});

/** POST /api/deck/generate: build the deck from a snapshot (latest by default). */
export function deckRouter(settings: Settings): Router {
  const router = Router();

  router.post('/generate', async (req, res) => {
    const parsed = GenerateBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', details: parsed.error.flatten().fieldErrors });
    }
    const { snapshot, tolerance, epsilon } = parsed.data;

    try {
      // only names the store lists, never arbitrary paths
      if (snapshot !== undefined && !listSnapshots(settings.dataDir).includes(snapshot)) {
        return res.status(404).json({ error: `Unknown snapshot ${snapshot}` });
      }

      const result = await runGeneration(settings, {
        snapshotPath: snapshot !== undefined ? join(settings.dataDir, snapshot) : undefined,
        tolerance,
        epsilon,
      });
      res.json({
        runId: result.runId,
        output: result.outputPath,
        status: result.report.status,
        slideCount: result.report.slideCount,
        matchRate: result.report.verification.matchRate,
        warnings: result.report.warnings,
        slides: result.report.slides,
      });
    } catch (err) {
      sendError(res, 'deck', err);
    }
  });

  return router;
}
