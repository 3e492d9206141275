#!/usr/bin/env node
// ─── Template Synchronizer CLI ───────────────────────────
//
// Usage:
//   npx tsx apps/backend/scripts/deck.ts                 generate from the latest snapshot
//   npx tsx apps/backend/scripts/deck.ts --snapshot <file>
//   npx tsx apps/backend/scripts/deck.ts --analyze       list every shape with its geometry
//   npx tsx apps/backend/scripts/deck.ts --verify        compare the template with positions.json
//   npx tsx apps/backend/scripts/deck.ts --export-mapping [out.json]
//   npx tsx apps/backend/scripts/deck.ts --sync          move drifted roles in positions.json
//
// Options: --template <pptx>, --tolerance <in>, --epsilon <in>
// Exit code 0 = ok, 1 = degraded template, 2 = fatal.

import 'dotenv/config';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { loadSettings, type Settings } from '../src/config/env.js';
import { loadPositionMap, positionMapPath } from '../src/config/files.js';
import { ConfigError, errorMessage } from '../src/errors.js';
import { runLogger } from '../src/storage/runLog.js';
import { analyze, formatAnalysis } from '../src/template/analyze.js';
import { readTemplateFile } from '../src/template/pptx/package.js';
import { exportShapes, resyncPositionMap, savePositionMap } from '../src/template/positionMap.js';
import { runGeneration } from '../src/template/synchronizer.js';
import { formatVerification, verify, type VerifyOptions } from '../src/template/verify.js';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    analyze: { type: 'boolean' },
    verify: { type: 'boolean' },
    'export-mapping': { type: 'boolean' },
    sync: { type: 'boolean' },
    snapshot: { type: 'string' },
    template: { type: 'string' },
    tolerance: { type: 'string' },
    epsilon: { type: 'string' },
    help: { type: 'boolean', short: 'h' },
  },
});

if (values.help) {
  console.log(
    'Usage: deck.ts [--analyze | --verify | --export-mapping [out] | --sync] [--snapshot f] [--template f] [--tolerance n] [--epsilon n]',
  );
  process.exit(0);
}

function inches(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) throw new ConfigError([`--${flag} must be a non-negative number, got "${raw}"`]);
  return n;
}

// ─── Commands ───────────────────────────────────────────

async function analyzeCommand(templatePath: string): Promise<number> {
  const template = await readTemplateFile(templatePath);
  console.log(formatAnalysis(analyze(template)));
  return 0;
}

async function verifyCommand(settings: Settings, templatePath: string, options: VerifyOptions): Promise<number> {
  const template = await readTemplateFile(templatePath);
  const report = verify(template, loadPositionMap(positionMapPath(settings.configDir)), options);
  for (const line of formatVerification(report)) console.log(line);
  return report.status === 'ok' ? 0 : 1;
}

async function exportCommand(settings: Settings, templatePath: string, out: string | undefined): Promise<number> {
  const template = await readTemplateFile(templatePath);
  const target = out ?? join(settings.outputDir, 'template_shapes.json');
  exportShapes(target, template.source, analyze(template));
  console.log(`[template] shapes exported → ${target}`);
  return 0;
}

async function syncCommand(settings: Settings, templatePath: string, options: VerifyOptions): Promise<number> {
  const path = positionMapPath(settings.configDir);
  const map = loadPositionMap(path);
  const report = verify(await readTemplateFile(templatePath), map, options);
  for (const line of formatVerification(report)) console.log(line);

  if (report.drifted.length === 0) {
    console.log('[template] nothing drifted; positions.json unchanged');
  } else {
    savePositionMap(path, resyncPositionMap(map, report));
    runLogger(settings.dataDir).log('POSITION_MAP_SYNCED', {
      path,
      roles: report.drifted.map((d) => d.role),
    });
    console.log(`[template] ${report.drifted.length} role(s) re-synced → ${path}`);
  }
  // missing roles cannot be re-synced
  return report.missing.length === 0 ? 0 : 1;
}

async function main(): Promise<number> {
  const settings = loadSettings();
  const templatePath = values.template ?? settings.templatePath;
  const options: VerifyOptions = {
    tolerance: inches('tolerance', values.tolerance),
    epsilon: inches('epsilon', values.epsilon),
  };

  if (values.analyze) return analyzeCommand(templatePath);
  if (values.verify) return verifyCommand(settings, templatePath, options);
  if (values['export-mapping']) return exportCommand(settings, templatePath, positionals[0]);
  if (values.sync) return syncCommand(settings, templatePath, options);

  const { report } = await runGeneration(settings, {
    ...options,
    templatePath,
    snapshotPath: values.snapshot,
  });
  return report.status === 'ok' ? 0 : 1;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error('[deck] fatal:', errorMessage(err));
    }
    process.exit(2);
  });
