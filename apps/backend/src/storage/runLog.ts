import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';
import { RunEventSchema, type RunEvent, type RunEventType, type RunLevel } from '@flash-deck/shared';

// ─── Config ──────────────────────────────────────────────

const RUN_LOG_FILE = 'runs.jsonl';

export function runLogPath(dataDir: string): string {
  return join(dataDir, RUN_LOG_FILE);
}

function ensureDir(dataDir: string): void {
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}

// ─── Public API ──────────────────────────────────────────

export function appendRunEvent(dataDir: string, event: RunEvent): void {
  ensureDir(dataDir);
  appendFileSync(runLogPath(dataDir), JSON.stringify(event) + '\n', 'utf-8');
}

export function createRunEvent(
  type: RunEventType,
  payload: unknown,
  level: RunLevel = 'INFO',
  runId?: string,
): RunEvent {
  return {
    id: crypto.randomUUID(),
    timestamp: Date.now(),
    type,
    runId,
    payload,
    level,
  };
}

/** Bound logger for one run: every event carries the same runId. */
export function runLogger(dataDir: string, runId: string = crypto.randomUUID()) {
  return {
    runId,
    log(type: RunEventType, payload: unknown, level: RunLevel = 'INFO'): void {
      appendRunEvent(dataDir, createRunEvent(type, payload, level, runId));
    },
  };
}

export type RunLogger = ReturnType<typeof runLogger>;

function parseLines(lines: string[]): RunEvent[] {
  const events: RunEvent[] = [];
  for (const line of lines) {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      continue; // torn write
    }
    const parsed = RunEventSchema.safeParse(raw);
    if (parsed.success) events.push(parsed.data);
  }
  return events;
}

export function readLatestRuns(dataDir: string, limit = 100): RunEvent[] {
  const file = runLogPath(dataDir);
  if (!existsSync(file)) return [];

  const lines = readFileSync(file, 'utf-8').split('\n').filter(Boolean);
  return parseLines(lines.slice(Math.max(0, lines.length - limit)));
}

export function readByRunId(dataDir: string, runId: string): RunEvent[] {
  const file = runLogPath(dataDir);
  if (!existsSync(file)) return [];
  return parseLines(readFileSync(file, 'utf-8').split('\n').filter(Boolean)).filter(
    (e) => e.runId === runId,
  );
}
