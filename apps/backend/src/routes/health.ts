import { Router } from 'express';
import { existsSync } from 'node:fs';
import type { Settings } from '../config/env.js';
import { positionMapPath } from '../config/files.js';
import { findLatestSnapshot } from '../storage/snapshotStore.js';

export function healthRouter(settings: Settings): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const configured = {
      apiBaseUrl: settings.api.baseUrl !== '',
      apiToken: settings.api.token !== '',
      template: existsSync(settings.templatePath),
      positionMap: existsSync(positionMapPath(settings.configDir)),
    };
    const allOk = Object.values(configured).every(Boolean);
    const latest = findLatestSnapshot(settings.dataDir);

    res.json({
      status: allOk ? 'ok' : 'degraded',
      uptime: process.uptime(),
      service: 'flash-deck-backend',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      configured,
      latestSnapshot: latest,
    });
  });

  return router;
}
