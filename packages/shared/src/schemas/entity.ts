import { z } from 'zod';

// ─── Entity (project) Schemas ────────────────────────────
// The API returns far more keys than the renderer reads; the known ones are
// typed, everything else passes through untouched.

const zNullableString = z.string().nullish();
const zNullableNumber = z.number().nullish();

export const OwnerSchema = z
  .object({
    name: zNullableString,
  })
  .passthrough();

export const ProjectDetailSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    short_id: zNullableString,
    name: zNullableString,
    status: zNullableString,
    mood: zNullableString,
    risk: zNullableString,
    start_date: zNullableString,
    end_date: zNullableString,
    progress: zNullableNumber,
    description_text: zNullableString,
    owner: OwnerSchema.nullish(),
    budget_capex_initial: zNullableNumber,
    budget_capex_used: zNullableNumber,
    budget_capex_landing: zNullableNumber,
  })
  .passthrough();

export const MilestoneSchema = z
  .object({
    name: zNullableString,
    status: zNullableString,
    date: zNullableString,
  })
  .passthrough();

export const DecisionSchema = z
  .object({
    title: zNullableString,
    name: zNullableString,
    status: zNullableString,
    date: zNullableString,
  })
  .passthrough();

export const AttentionPointSchema = z
  .object({
    title: zNullableString,
    status: zNullableString,
    date: zNullableString,
  })
  .passthrough();

export const RelatedCollectionSchema = z.enum(['milestones', 'decisions', 'attention_points']);

export const CollectionErrorSchema = z.object({
  collection: RelatedCollectionSchema,
  message: z.string(),
});

export const ResolvedLabelsSchema = z.object({
  mood: z.string().nullable(),
  status: z.string().nullable(),
  risk: z.string().nullable(),
});

export const EntityRecordSchema = z.object({
  id: z.string(),
  project: ProjectDetailSchema,
  resolved: ResolvedLabelsSchema,
  milestones: z.array(MilestoneSchema),
  decisions: z.array(DecisionSchema),
  attention_points: z.array(AttentionPointSchema),
  errors: z.array(CollectionErrorSchema).default([]),
});

export type Owner = z.infer<typeof OwnerSchema>;
export type ProjectDetail = z.infer<typeof ProjectDetailSchema>;
export type Milestone = z.infer<typeof MilestoneSchema>;
export type Decision = z.infer<typeof DecisionSchema>;
export type AttentionPoint = z.infer<typeof AttentionPointSchema>;
export type RelatedCollection = z.infer<typeof RelatedCollectionSchema>;
export type CollectionError = z.infer<typeof CollectionErrorSchema>;
export type ResolvedLabels = z.infer<typeof ResolvedLabelsSchema>;
export type EntityRecord = z.infer<typeof EntityRecordSchema>;
