/**
 * Snapshot browsing.
 * GET /api/snapshots         file names, oldest first
 * GET /api/snapshots/latest  the most recent snapshot, parsed
 */

import { Router } from 'express';
import { basename } from 'node:path';
import type { Settings } from '../config/env.js';
import { findLatestSnapshot, listSnapshots, readSnapshot } from '../storage/snapshotStore.js';
import { sendError } from './respond.js';

export function snapshotsRouter(settings: Settings): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    try {
      res.json({ snapshots: listSnapshots(settings.dataDir) });
    } catch (err) {
      sendError(res, 'snapshots', err);
    }
  });

  router.get('/latest', (_req, res) => {
    try {
      const latest = findLatestSnapshot(settings.dataDir);
      if (!latest) {
        return res.status(404).json({ error: 'No snapshot yet; run the collector first' });
      }
      res.json({ file: basename(latest), snapshot: readSnapshot(latest) });
    } catch (err) {
      sendError(res, 'snapshots', err);
    }
  });

  return router;
}
