import { z } from 'zod';

// ─── Reference Data Schemas ──────────────────────────────

/**
 * One entry of a reference enumeration (mood, status or risk).
 * Unknown keys are kept so the snapshot mirrors the API payload.
 */
export const ReferenceItemSchema = z
  .object({
    code: z.string(),
    name: z.string().nullish(),
    name_fr: z.string().nullish(),
    color: z.string().nullish(),
  })
  .passthrough();

export const ReferenceSetSchema = z.object({
  moods: z.array(ReferenceItemSchema),
  statuses: z.array(ReferenceItemSchema),
  risks: z.array(ReferenceItemSchema),
});

export const ReferenceCategorySchema = z.enum(['moods', 'statuses', 'risks']);

export type ReferenceItem = z.infer<typeof ReferenceItemSchema>;
export type ReferenceSet = z.infer<typeof ReferenceSetSchema>;
export type ReferenceCategory = z.infer<typeof ReferenceCategorySchema>;
