import { existsSync, mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { PositionMap, ShapePosition, VerificationReport } from '@flash-deck/shared';
import { SnapshotIOError } from '../errors.js';

/**
 * PositionMap with every drifted role moved to the geometry it was found at.
 * Matched and missing roles are copied unchanged. Returns a new map.
 */
export function resyncPositionMap(map: PositionMap, report: VerificationReport): PositionMap {
  const next: PositionMap = {};
  for (const [role, expected] of Object.entries(map)) {
    next[role] = { ...expected };
  }
  for (const d of report.drifted) {
    const current = next[d.role];
    if (!current) continue;
    next[d.role] = {
      x: d.actual.x,
      y: d.actual.y,
      width: d.actual.width,
      height: d.actual.height,
      ...(current.slide !== undefined ? { slide: current.slide } : {}),
    };
  }
  return next;
}

function writeJsonAtomic(path: string, value: unknown): void {
  const tmp = `${path}.tmp`;
  try {
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(tmp, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    renameSync(tmp, path);
  } catch (err) {
    throw new SnapshotIOError('write', path, err);
  }
}

/** Persist a PositionMap. Only explicit operator commands call this. */
export function savePositionMap(path: string, map: PositionMap): void {
  writeJsonAtomic(path, map);
}

/** `--export-mapping`: the analyzed shapes, grouped by slide. */
export function exportShapes(path: string, source: string, shapes: readonly ShapePosition[]): void {
  const slides: Record<string, ShapePosition[]> = {};
  for (const s of shapes) {
    (slides[String(s.slide)] ??= []).push(s);
  }
  writeJsonAtomic(path, {
    template: source,
    exported_at: new Date().toISOString(),
    slide_count: new Set(shapes.map((s) => s.slide)).size,
    slides,
  });
}
