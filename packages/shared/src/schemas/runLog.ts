import { z } from 'zod';

// ─── Run Log Schemas ─────────────────────────────────────

export const RunEventTypeSchema = z.enum([
  'COLLECT_START',
  'COLLECT_DONE',
  'COLLECT_ABORTED',
  'ENTITY_FAILED',
  'SNAPSHOT_WRITTEN',
  'TEMPLATE_VERIFIED',
  'GENERATE_DONE',
  'POSITION_MAP_SYNCED',
  'ERROR',
]);

export const RunLevelSchema = z.enum(['INFO', 'WARN', 'ERROR']);

export const RunEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: RunEventTypeSchema,
  runId: z.string().optional(),
  payload: z.unknown(),
  level: RunLevelSchema,
});
