// ─── @flash-deck/shared barrel export ────────────────────

// Types
export type {
  ShapeKind,
  Rect,
  ShapePosition,
  RoleMatch,
  RoleMissing,
  VerificationStatus,
  VerificationReport,
  SlideFill,
  UnfilledField,
  GenerationReport,
} from './types/template.js';

export type { RunEventType, RunLevel, RunEvent } from './types/runLog.js';

// Schemas
export {
  ReferenceItemSchema,
  ReferenceSetSchema,
  ReferenceCategorySchema,
} from './schemas/reference.js';
export type { ReferenceItem, ReferenceSet, ReferenceCategory } from './schemas/reference.js';

export {
  OwnerSchema,
  ProjectDetailSchema,
  MilestoneSchema,
  DecisionSchema,
  AttentionPointSchema,
  RelatedCollectionSchema,
  CollectionErrorSchema,
  ResolvedLabelsSchema,
  EntityRecordSchema,
} from './schemas/entity.js';
export type {
  Owner,
  ProjectDetail,
  Milestone,
  Decision,
  AttentionPoint,
  RelatedCollection,
  CollectionError,
  ResolvedLabels,
  EntityRecord,
} from './schemas/entity.js';

export { FetchFailureSchema, FetchSummarySchema, SnapshotSchema } from './schemas/snapshot.js';
export type { FetchFailure, FetchSummary, Snapshot } from './schemas/snapshot.js';

export {
  ExpectedPositionSchema,
  PositionMapSchema,
  FIELD_TRANSFORMS,
  FieldTransformSchema,
  FieldStatusSchema,
  FieldMappingSchema,
  SlideMappingSchema,
  MappingFileSchema,
} from './schemas/template.js';
export type {
  ExpectedPosition,
  PositionMap,
  FieldTransform,
  FieldStatus,
  FieldMapping,
  SlideMapping,
  MappingFile,
} from './schemas/template.js';

export { RunEventTypeSchema, RunLevelSchema, RunEventSchema } from './schemas/runLog.js';

// ─── Validators ──────────────────────────────────────────
export { zISOTimestamp, zInches, zEntityId } from './schemas/validators.js';

// Constants
export * from './constants/index.js';
