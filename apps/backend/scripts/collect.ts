#!/usr/bin/env node
// ─── Collector CLI ───────────────────────────────────────
// Fetches reference data and every configured project, then writes
// <DATA_DIR>/<YYYY-MM-DD>_projects.json.
//
// Usage:
//   npx tsx apps/backend/scripts/collect.ts [--ids 12,15,31]
//
// Exit code 0 = all projects fetched, 1 = some projects failed or run
// aborted (Ctrl-C), 2 = fatal (configuration, reference data).

import 'dotenv/config';
import { parseArgs } from 'node:util';
import { runCollector } from '../src/collector/collector.js';
import { loadSettings } from '../src/config/env.js';
import { ConfigError, errorMessage } from '../src/errors.js';

const { values } = parseArgs({
  options: {
    ids: { type: 'string' },
    help: { type: 'boolean', short: 'h' },
  },
});

if (values.help) {
  console.log('Usage: collect.ts [--ids <id,id,...>]   (default: config/projects.json)');
  process.exit(0);
}

async function main(): Promise<number> {
  const settings = loadSettings();
  const ids = values.ids
    ?.split(',')
    .map((id) => id.trim())
    .filter(Boolean);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('\n[collector] interrupt received; finishing in-flight requests');
    controller.abort();
  });

  const result = await runCollector(settings, { ids, signal: controller.signal });
  if (result.aborted) return 1;

  for (const failure of result.summary.failed) {
    console.warn(`  ✗ ${failure.id}: ${failure.error}`);
  }
  return result.summary.failed.length > 0 ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error('[collector] fatal:', errorMessage(err));
    }
    process.exit(2);
  });
