/**
 * Template inspection. Read-only: nothing here touches positions.json.
 * GET /api/template/analyze  every shape with its geometry
 * GET /api/template/verify   VerificationReport against positions.json
 */

import { Router } from 'express';
import { z } from 'zod';
import type { Settings } from '../config/env.js';
import { loadPositionMap, positionMapPath } from '../config/files.js';
import { analyze } from '../template/analyze.js';
import { readTemplateFile } from '../template/pptx/package.js';
import { verify } from '../template/verify.js';
import { sendError } from './respond.js';

const VerifyQuerySchema = z.object({
  tolerance: z.coerce.number().positive().optional(),
  epsilon: z.coerce.number().nonnegative().optional(),
});

export function templateRouter(settings: Settings): Router {
  const router = Router();

  router.get('/analyze', async (_req, res) => {
    try {
      const template = await readTemplateFile(settings.templatePath);
      res.json({ template: template.source, slideCount: template.slides.length, shapes: analyze(template) });
    } catch (err) {
      sendError(res, 'template', err);
    }
  });

  router.get('/verify', async (req, res) => {
    const query = VerifyQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'Invalid query', details: query.error.flatten().fieldErrors });
    }
    try {
      const positionMap = loadPositionMap(positionMapPath(settings.configDir));
      const template = await readTemplateFile(settings.templatePath);
      res.json(verify(template, positionMap, query.data));
    } catch (err) {
      sendError(res, 'template', err);
    }
  });

  return router;
}
