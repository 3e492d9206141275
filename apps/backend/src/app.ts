import express, { type Express } from 'express';
import cors from 'cors';
import type { Settings } from './config/env.js';
import { requestLogger } from './middleware/logger.js';
import { collectorRouter, type CollectorRouteDeps } from './routes/collector.js';
import { deckRouter } from './routes/deck.js';
import { healthRouter } from './routes/health.js';
import { runsRouter } from './routes/runs.js';
import { snapshotsRouter } from './routes/snapshots.js';
import { templateRouter } from './routes/template.js';

export function createApp(settings: Settings, deps: CollectorRouteDeps = {}): Express {
  const app = express();

  // ─── Middleware ──────────────────────────────────────────
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // ─── Routes ─────────────────────────────────────────────
  app.use('/', healthRouter(settings));
  app.use('/api/snapshots', snapshotsRouter(settings));
  app.use('/api/collector', collectorRouter(settings, deps));
  app.use('/api/template', templateRouter(settings));
  app.use('/api/deck', deckRouter(settings));
  app.use('/api/runs', runsRouter(settings));

  return app;
}
