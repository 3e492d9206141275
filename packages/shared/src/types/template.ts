// ─── Template Geometry & Verification Types ──────────────

import type { ExpectedPosition } from '../schemas/template.js';

/** Top-level element kinds found in a slide's shape tree. */
export type ShapeKind = 'sp' | 'pic' | 'graphicFrame' | 'grpSp' | 'cxnSp';

/** Axis-aligned rectangle in inches; x/y is the top-left corner. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * One shape as seen by the analyzer.
 * `name` is informational only: it is not stable across slide duplication.
 */
export interface ShapePosition extends Rect {
  slide: number; // 0-based, presentation order
  name: string;
  kind: ShapeKind;
  text: string; // paragraphs joined with "\n"
  hasText: boolean;
  isPlaceholder: boolean;
}

export interface RoleMatch {
  role: string;
  expected: ExpectedPosition;
  actual: ShapePosition;
  offset: number; // center distance, inches
}

export interface RoleMissing {
  role: string;
  expected: ExpectedPosition;
}

export type VerificationStatus = 'ok' | 'degraded';

export interface VerificationReport {
  status: VerificationStatus;
  matched: RoleMatch[];
  drifted: RoleMatch[];
  missing: RoleMissing[];
  /** Live text shapes not claimed by any role. */
  newShapes: ShapePosition[];
  totalRoles: number;
  /** (matched + drifted) / totalRoles, 1 when the map is empty */
  matchRate: number;
  lowCoverage: boolean;
  tolerance: number;
  epsilon: number;
}

export interface SlideFill {
  entityId: string;
  filled: string[];
  cleared: string[];
  notFound: string[];
  skipped: string[];
}

export interface UnfilledField {
  project: string;
  field: string;
  reason: string;
}

export interface GenerationReport {
  status: VerificationStatus;
  verification: VerificationReport;
  slideCount: number;
  slides: SlideFill[];
  unfilled: UnfilledField[];
  warnings: string[];
}
