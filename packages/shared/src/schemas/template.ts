import { z } from 'zod';
import { zInches } from './validators.js';

// ─── Template Contract Schemas ───────────────────────────

/** Expected geometry of one placeholder role (inches). */
export const ExpectedPositionSchema = z.object({
  x: zInches,
  y: zInches,
  width: zInches,
  height: zInches,
  slide: z.number().int().nonnegative().optional(),
});

/** role → expected geometry; persisted as config/positions.json */
export const PositionMapSchema = z.record(ExpectedPositionSchema);

export const FIELD_TRANSFORMS = [
  'text',
  'title',
  'date',
  'mood_status',
  'scope_summary',
  'description_bullets',
  'pending_decisions',
  'completed_milestones',
  'risk_summary',
  'budget_summary',
] as const;

export const FieldTransformSchema = z.enum(FIELD_TRANSFORMS);

/**
 * ok      → populate from `source`
 * clear   → empty the shape (layout overlaps another populated shape)
 * missing → no data in the API for this field, leave the template text
 * manual  → filled in by hand after generation, leave the template text
 */
export const FieldStatusSchema = z.enum(['ok', 'missing', 'manual', 'clear']);

export const FieldMappingSchema = z.object({
  source: z.string(),
  transform: FieldTransformSchema.optional(),
  status: FieldStatusSchema,
});

export const SlideMappingSchema = z.record(FieldMappingSchema);

/** config/mapping.json */
export const MappingFileSchema = z.object({
  slides: z.record(SlideMappingSchema),
  missing_fields: z.array(z.string()).default([]),
});

export type ExpectedPosition = z.infer<typeof ExpectedPositionSchema>;
export type PositionMap = z.infer<typeof PositionMapSchema>;
export type FieldTransform = z.infer<typeof FieldTransformSchema>;
export type FieldStatus = z.infer<typeof FieldStatusSchema>;
export type FieldMapping = z.infer<typeof FieldMappingSchema>;
export type SlideMapping = z.infer<typeof SlideMappingSchema>;
export type MappingFile = z.infer<typeof MappingFileSchema>;
