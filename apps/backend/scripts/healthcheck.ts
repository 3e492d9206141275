#!/usr/bin/env node
// ─── HTTP Surface Health Harness ─────────────────────────
// Checks a running backend's read-only endpoints against the shared schemas.
//
// Usage:
//   BACKEND_URL=http://localhost:4000 npx tsx apps/backend/scripts/healthcheck.ts
//
// Exit code 0 = all passed, 1 = failures detected, 2 = harness error.

import { z } from 'zod';
import { RunEventSchema, SnapshotSchema } from '@flash-deck/shared';

const BACKEND_URL = process.env.BACKEND_URL || 'http://localhost:4000';
const TIMEOUT_MS = 10_000;

const HealthSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  service: z.string(),
  timestamp: z.string(),
  version: z.string(),
  configured: z.record(z.boolean()),
  latestSnapshot: z.string().nullable(),
});

const ShapeSchema = z.object({
  slide: z.number(),
  name: z.string(),
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
  hasText: z.boolean(),
}).passthrough();

const VerificationSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  matched: z.array(z.object({ role: z.string() }).passthrough()),
  drifted: z.array(z.object({ role: z.string() }).passthrough()),
  missing: z.array(z.object({ role: z.string() }).passthrough()),
  newShapes: z.array(ShapeSchema),
  totalRoles: z.number(),
  matchRate: z.number().min(0).max(1),
  lowCoverage: z.boolean(),
});

interface CheckResult {
  name: string;
  endpoint: string;
  passed: boolean;
  skipped?: boolean;
  detail?: string;
}

const results: CheckResult[] = [];

class NotFound extends Error {}

async function fetchJSON(path: string): Promise<unknown> {
  const res = await fetch(`${BACKEND_URL}${path}`, {
    signal: AbortSignal.timeout(TIMEOUT_MS),
    headers: { Accept: 'application/json' },
  });
  if (res.status === 404) throw new NotFound(await res.text());
  if (!res.ok) throw new Error(`HTTP ${res.status}: ${await res.text()}`);
  return await res.json();
}

async function runCheck(name: string, endpoint: string, fn: () => Promise<void>) {
  try {
    await fn();
    results.push({ name, endpoint, passed: true });
  } catch (err: unknown) {
    if (err instanceof NotFound) {
      results.push({ name, endpoint, passed: true, skipped: true, detail: 'nothing there yet' });
      return;
    }
    const msg = err instanceof Error ? err.message : String(err);
    results.push({ name, endpoint, passed: false, detail: msg });
  }
}

// ─── Checks ─────────────────────────────────────────────

async function main() {
  console.log(`\nFlash deck health check`);
  console.log(`   Backend: ${BACKEND_URL}\n`);

  await runCheck('Health endpoint', 'GET /health', async () => {
    HealthSchema.parse(await fetchJSON('/health'));
  });

  await runCheck('Snapshot list', 'GET /api/snapshots', async () => {
    z.object({ snapshots: z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}_projects\.json$/)) }).parse(
      await fetchJSON('/api/snapshots'),
    );
  });

  await runCheck('Latest snapshot', 'GET /api/snapshots/latest', async () => {
    z.object({ file: z.string(), snapshot: SnapshotSchema }).parse(await fetchJSON('/api/snapshots/latest'));
  });

  await runCheck('Template analysis', 'GET /api/template/analyze', async () => {
    z.object({ template: z.string(), slideCount: z.number(), shapes: z.array(ShapeSchema) }).parse(
      await fetchJSON('/api/template/analyze'),
    );
  });

  await runCheck('Template verification', 'GET /api/template/verify', async () => {
    VerificationSchema.parse(await fetchJSON('/api/template/verify'));
  });

  await runCheck('Run log', 'GET /api/runs', async () => {
    z.object({ events: z.array(RunEventSchema) }).parse(await fetchJSON('/api/runs?limit=5'));
  });

  // ─── Report ──────────────────────────────────────────
  console.log('─'.repeat(60));
  let failed = 0;
  for (const r of results) {
    const icon = r.skipped ? '-' : r.passed ? '✓' : '✗';
    console.log(`  ${icon}  ${r.name.padEnd(26)} ${r.endpoint}`);
    if (r.detail) {
      const lines = r.detail.split('\n').slice(0, 5).join('\n    ');
      console.log(`       ${lines}`);
    }
    if (!r.passed) failed++;
  }
  console.log('─'.repeat(60));
  console.log(`\n  Total: ${results.length}  Passed: ${results.length - failed}  Failed: ${failed}\n`);

  process.exit(failed > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
