import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';
import { DECK_SUFFIX, type GenerationReport, type MappingFile, type PositionMap } from '@flash-deck/shared';
import type { Settings } from '../config/env.js';
import { loadMapping, loadPositionMap, mappingPath, positionMapPath } from '../config/files.js';
import { SnapshotIOError, errorMessage } from '../errors.js';
import { runLogger } from '../storage/runLog.js';
import { findLatestSnapshot, readSnapshot } from '../storage/snapshotStore.js';
import { calendarDate } from '../util/dates.js';
import { generate, type GenerateOptions } from './generate.js';
import { readTemplateFile } from './pptx/package.js';

/**
 * Generation run:
 *
 *   LOAD_TEMPLATE → VERIFY → GENERATE                 (ok)
 *                          → GENERATE_WITH_WARNING    (degraded)
 *                 → SAVE
 *
 * A degraded template never stops the run; only a missing template, snapshot
 * or configuration file (or a failed write) does.
 */

export type GenerationStage = 'LOAD_TEMPLATE' | 'VERIFY' | 'GENERATE' | 'GENERATE_WITH_WARNING' | 'SAVE';

export interface GenerationRunOptions extends GenerateOptions {
  /** Snapshot file; defaults to the latest one in DATA_DIR */
  snapshotPath?: string;
  templatePath?: string;
  positionMap?: PositionMap;
  mapping?: MappingFile;
}

export interface GenerationRunResult {
  runId: string;
  outputPath: string;
  snapshotPath: string;
  report: GenerationReport;
}

export function deckPath(outputDir: string, date: Date = new Date()): string {
  return join(outputDir, `${calendarDate(date)}${DECK_SUFFIX}`);
}

function enter(stage: GenerationStage, detail = ''): void {
  console.log(`[deck] ${stage}${detail ? `: ${detail}` : ''}`);
}

export async function runGeneration(
  settings: Settings,
  options: GenerationRunOptions = {},
): Promise<GenerationRunResult> {
  const runLog = runLogger(settings.dataDir, crypto.randomUUID());
  const today = options.today ?? new Date();

  try {
    const snapshotFile = options.snapshotPath ?? findLatestSnapshot(settings.dataDir);
    if (snapshotFile === null) {
      throw new SnapshotIOError('list', settings.dataDir, new Error('no snapshot found; run the collector first'));
    }
    const snapshot = readSnapshot(snapshotFile);
    const positionMap = options.positionMap ?? loadPositionMap(positionMapPath(settings.configDir));
    const mapping = options.mapping ?? loadMapping(mappingPath(settings.configDir));

    const templatePath = options.templatePath ?? settings.templatePath;
    enter('LOAD_TEMPLATE', templatePath);
    const template = await readTemplateFile(templatePath);

    enter('VERIFY', `${Object.keys(positionMap).length} role(s)`);
    const { document, report } = await generate(snapshot, mapping, positionMap, template, { ...options, today });
    const verification = report.verification;
    runLog.log(
      'TEMPLATE_VERIFIED',
      {
        status: verification.status,
        matched: verification.matched.length,
        drifted: verification.drifted.length,
        missing: verification.missing.length,
        newShapes: verification.newShapes.length,
        matchRate: verification.matchRate,
      },
      verification.status === 'ok' ? 'INFO' : 'WARN',
    );

    if (report.status === 'ok') {
      enter('GENERATE', `${snapshot.projects.length} project(s)`);
    } else {
      enter('GENERATE_WITH_WARNING', `${snapshot.projects.length} project(s)`);
      for (const warning of report.warnings) console.warn(`[deck] ${warning}`);
    }

    const outputPath = deckPath(settings.outputDir, today);
    enter('SAVE', outputPath);
    try {
      if (!existsSync(settings.outputDir)) mkdirSync(settings.outputDir, { recursive: true });
      writeFileSync(outputPath, document);
    } catch (err) {
      throw new SnapshotIOError('write', outputPath, err);
    }

    runLog.log(
      'GENERATE_DONE',
      {
        output: outputPath,
        snapshot: snapshotFile,
        status: report.status,
        slideCount: report.slideCount,
        warnings: report.warnings.length,
      },
      report.status === 'ok' ? 'INFO' : 'WARN',
    );
    const pct = (verification.matchRate * 100).toFixed(0);
    console.log(`[deck] wrote ${report.slideCount} slide(s) → ${outputPath} (match rate ${pct}%)`);
    return { runId: runLog.runId, outputPath, snapshotPath: snapshotFile, report };
  } catch (err) {
    runLog.log('ERROR', { stage: 'generate', error: errorMessage(err) }, 'ERROR');
    throw err;
  }
}
