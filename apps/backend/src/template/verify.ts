import {
  DEFAULT_COVERAGE_THRESHOLD,
  DEFAULT_MATCH_EPSILON,
  DEFAULT_POSITION_TOLERANCE,
  type PositionMap,
  type RoleMatch,
  type RoleMissing,
  type ShapePosition,
  type VerificationReport,
} from '@flash-deck/shared';
import { analyze } from './analyze.js';
import { center, distance, findShapeByPosition } from './geometry.js';
import type { PptxTemplate } from './pptx/package.js';

export interface VerifyOptions {
  tolerance?: number;
  epsilon?: number;
  coverageThreshold?: number;
}

/**
 * Compare live shapes against the PositionMap.
 *
 * Roles are taken in PositionMap key order; each claims the nearest
 * unclaimed text-frame shape on its slide (ties: slide order). A shape is
 * claimed at most once. Text-frame shapes left unclaimed are reported as new.
 */
export function verifyShapes(
  shapes: readonly ShapePosition[],
  positionMap: PositionMap,
  options: VerifyOptions = {},
): VerificationReport {
  const tolerance = options.tolerance ?? DEFAULT_POSITION_TOLERANCE;
  const epsilon = options.epsilon ?? DEFAULT_MATCH_EPSILON;
  const threshold = options.coverageThreshold ?? DEFAULT_COVERAGE_THRESHOLD;

  const candidates = shapes.filter((s) => s.hasText);
  const claimed = new Set<ShapePosition>();
  const matched: RoleMatch[] = [];
  const drifted: RoleMatch[] = [];
  const missing: RoleMissing[] = [];

  for (const [role, expected] of Object.entries(positionMap)) {
    const slide = expected.slide ?? 0;
    const target = center(expected);
    const open = candidates.filter((s) => s.slide === slide && !claimed.has(s));
    const best = findShapeByPosition(open, target.x, target.y, tolerance);

    if (best === null) {
      missing.push({ role, expected });
      continue;
    }
    claimed.add(best);
    const bestDistance = distance(center(best), target);
    const entry: RoleMatch = { role, expected, actual: best, offset: Math.round(bestDistance * 1000) / 1000 };
    if (bestDistance <= epsilon) matched.push(entry);
    else drifted.push(entry);
  }

  const mappedSlides = new Set(Object.values(positionMap).map((p) => p.slide ?? 0));
  const newShapes = candidates.filter((s) => !claimed.has(s) && mappedSlides.has(s.slide));

  const totalRoles = Object.keys(positionMap).length;
  const matchRate = totalRoles === 0 ? 1 : (matched.length + drifted.length) / totalRoles;

  return {
    status: matched.length === totalRoles ? 'ok' : 'degraded',
    matched,
    drifted,
    missing,
    newShapes,
    totalRoles,
    matchRate,
    lowCoverage: matchRate < threshold,
    tolerance,
    epsilon,
  };
}

/** verifyShapes() over a freshly analyzed template. Pure: nothing is persisted. */
export function verify(
  template: PptxTemplate,
  positionMap: PositionMap,
  options: VerifyOptions = {},
): VerificationReport {
  return verifyShapes(analyze(template), positionMap, options);
}

/** One-screen summary used by the CLI and the generation warnings. */
export function formatVerification(report: VerificationReport): string[] {
  const pct = (report.matchRate * 100).toFixed(0);
  const lines = [
    `Template ${report.status.toUpperCase()}: ${report.matched.length} matched, ${report.drifted.length} drifted, ` +
      `${report.missing.length} missing, ${report.newShapes.length} new (match rate ${pct}%)`,
  ];
  for (const d of report.drifted) {
    lines.push(
      `  drifted  ${d.role}: expected (${d.expected.x}, ${d.expected.y}) → found (${d.actual.x}, ${d.actual.y}), offset ${d.offset}in`,
    );
  }
  for (const m of report.missing) {
    lines.push(`  missing  ${m.role}: nothing within ${report.tolerance}in of (${m.expected.x}, ${m.expected.y})`);
  }
  for (const s of report.newShapes) {
    lines.push(`  new      slide ${s.slide} (${s.x}, ${s.y}) ${s.width}×${s.height} "${s.text.slice(0, 30)}"`);
  }
  if (report.lowCoverage) {
    lines.push(`  match rate below coverage threshold; output will have misplaced or template text`);
  }
  return lines;
}
