import { z } from 'zod';
import { ReferenceSetSchema } from './reference.js';
import { EntityRecordSchema } from './entity.js';
import { zISOTimestamp } from './validators.js';

// ─── Snapshot Schemas ────────────────────────────────────

export const FetchFailureSchema = z.object({
  id: z.string(),
  error: z.string(),
});

export const FetchSummarySchema = z.object({
  succeeded: z.array(z.string()),
  failed: z.array(FetchFailureSchema),
});

/**
 * One Collector run, as persisted to `<date>_projects.json`.
 * `summary` is absent on snapshots written by older tooling.
 */
export const SnapshotSchema = z.object({
  fetched_at: zISOTimestamp,
  reference_data: ReferenceSetSchema,
  projects: z.array(EntityRecordSchema),
  summary: FetchSummarySchema.optional(),
});

export type FetchFailure = z.infer<typeof FetchFailureSchema>;
export type FetchSummary = z.infer<typeof FetchSummarySchema>;
export type Snapshot = z.infer<typeof SnapshotSchema>;
