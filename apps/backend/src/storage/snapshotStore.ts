import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { SNAPSHOT_SUFFIX, SnapshotSchema, type Snapshot } from '@flash-deck/shared';
import { SnapshotIOError } from '../errors.js';
import { calendarDate } from '../util/dates.js';

// ─── Snapshot files ──────────────────────────────────────
// One file per calendar day: <dir>/<YYYY-MM-DD>_projects.json.
// A second run on the same day replaces the earlier file wholesale.

const SNAPSHOT_NAME = /^\d{4}-\d{2}-\d{2}_projects\.json$/;

export function snapshotPath(dir: string, date: Date | string = new Date()): string {
  const day = typeof date === 'string' ? date : calendarDate(date);
  return join(dir, `${day}${SNAPSHOT_SUFFIX}`);
}

/** Write via a temp file + rename so readers never observe a partial snapshot. */
export function writeSnapshot(dir: string, snapshot: Snapshot, date: Date | string = new Date()): string {
  const path = snapshotPath(dir, date);
  const tmp = `${path}.tmp`;
  try {
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(tmp, JSON.stringify(snapshot, null, 2) + '\n', 'utf-8');
    renameSync(tmp, path);
  } catch (err) {
    throw new SnapshotIOError('write', path, err);
  }
  return path;
}

export function readSnapshot(path: string): Snapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new SnapshotIOError('read', path, err);
  }
  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new SnapshotIOError(
      'parse',
      path,
      new Error(`${first?.path.join('.') || '(root)'}: ${first?.message ?? 'invalid snapshot'}`),
    );
  }
  return parsed.data;
}

/** Snapshot file names in the directory, oldest first. Missing dir → []. */
export function listSnapshots(dir: string): string[] {
  if (!existsSync(dir)) return [];
  let names: string[];
  try {
    names = readdirSync(dir);
  } catch (err) {
    throw new SnapshotIOError('list', dir, err);
  }
  return names.filter((n) => SNAPSHOT_NAME.test(n)).sort();
}

/** Most recent snapshot by file name (dates sort lexicographically), or null. */
export function findLatestSnapshot(dir: string): string | null {
  const names = listSnapshots(dir);
  const latest = names[names.length - 1];
  return latest ? join(dir, latest) : null;
}
