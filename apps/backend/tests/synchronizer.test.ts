/**
 * K. Generation runs
 * - The deck is written to OUTPUT_DIR as <date>_portfolio.pptx
 * - Verification and completion are recorded in the run log
 * - No snapshot, no deck
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { copyFileSync, existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PositionMap } from '@flash-deck/shared';
import type { Settings } from '../src/config/env.js';
import { loadPositionMap } from '../src/config/files.js';
import { SnapshotIOError, TemplateLoadError } from '../src/errors.js';
import { readLatestRuns } from '../src/storage/runLog.js';
import { writeSnapshot } from '../src/storage/snapshotStore.js';
import { deckPath, runGeneration } from '../src/template/synchronizer.js';
import { testSettings } from './helpers/fakeApi.js';
import { buildPptx, cardShapes } from './helpers/pptx.js';
import { fullRecord, snapshotOf } from './helpers/records.js';

const CONFIG_DIR = fileURLToPath(new URL('../../../config', import.meta.url));
const TODAY = new Date(2024, 2, 1);

let dir: string;
let settings: Settings;
let positions: PositionMap;

beforeEach(async () => {
  dir = mkdtempSync(join(tmpdir(), 'deck-'));
  settings = testSettings(dir);
  mkdirSync(settings.configDir, { recursive: true });
  for (const name of ['positions.json', 'mapping.json']) {
    copyFileSync(join(CONFIG_DIR, name), join(settings.configDir, name));
  }
  positions = loadPositionMap(join(CONFIG_DIR, 'positions.json'));
  writeFileSync(settings.templatePath, await buildPptx([{ shapes: cardShapes(positions) }]));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('K. runGeneration', () => {
  it('writes the deck for the latest snapshot', async () => {
    writeSnapshot(settings.dataDir, snapshotOf([]), '2024-02-28');
    const latest = writeSnapshot(settings.dataDir, snapshotOf([fullRecord()]), '2024-02-29');

    const result = await runGeneration(settings, { today: TODAY });

    expect(result.outputPath).toBe(join(dir, 'outputs', '2024-03-01_portfolio.pptx'));
    expect(result.snapshotPath).toBe(latest);
    expect(existsSync(result.outputPath)).toBe(true);
    expect(result.report.status).toBe('ok');
    expect(result.report.slideCount).toBe(3);

    const events = readLatestRuns(settings.dataDir);
    expect(events.map((e) => [e.type, e.level])).toEqual([
      ['TEMPLATE_VERIFIED', 'INFO'],
      ['GENERATE_DONE', 'INFO'],
    ]);
    expect(events.every((e) => e.runId === result.runId)).toBe(true);
  });

  it('reports the match rate when the template is intact', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    writeSnapshot(settings.dataDir, snapshotOf([fullRecord()]), '2024-02-29');

    const result = await runGeneration(settings, { today: TODAY });

    expect(log).toHaveBeenLastCalledWith(`[deck] wrote 3 slide(s) → ${result.outputPath} (match rate 100%)`);
  });

  it('uses the snapshot it is given', async () => {
    const older = writeSnapshot(settings.dataDir, snapshotOf([fullRecord(), fullRecord({ id: '8' })]), '2024-01-01');
    writeSnapshot(settings.dataDir, snapshotOf([]), '2024-02-01');

    const result = await runGeneration(settings, { today: TODAY, snapshotPath: older });
    expect(result.report.slideCount).toBe(4);
  });

  it('logs a degraded template as a warning and still saves', async () => {
    writeSnapshot(settings.dataDir, snapshotOf([fullRecord()]), '2024-02-29');
    const positionMap = { ...positions, footer: { x: 0.4, y: 5.2, width: 9, height: 0.3, slide: 0 } };

    const result = await runGeneration(settings, { today: TODAY, positionMap });

    expect(result.report.status).toBe('degraded');
    expect(existsSync(result.outputPath)).toBe(true);
    expect(readLatestRuns(settings.dataDir).map((e) => [e.type, e.level])).toEqual([
      ['TEMPLATE_VERIFIED', 'WARN'],
      ['GENERATE_DONE', 'WARN'],
    ]);
  });

  it('reports the match rate of a degraded template', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeSnapshot(settings.dataDir, snapshotOf([fullRecord()]), '2024-02-29');
    // 11 of 12 roles found
    const positionMap = { ...positions, footer: { x: 0.4, y: 5.2, width: 9, height: 0.3, slide: 0 } };

    const result = await runGeneration(settings, { today: TODAY, positionMap });

    expect(log).toHaveBeenLastCalledWith(`[deck] wrote 3 slide(s) → ${result.outputPath} (match rate 92%)`);
  });

  it('fails without a snapshot', async () => {
    await expect(runGeneration(settings, { today: TODAY })).rejects.toBeInstanceOf(SnapshotIOError);
    const events = readLatestRuns(settings.dataDir);
    expect(events.map((e) => e.type)).toEqual(['ERROR']);
    expect(events[0].payload).toMatchObject({ stage: 'generate' });
  });

  it('fails without a template', async () => {
    writeSnapshot(settings.dataDir, snapshotOf([fullRecord()]), '2024-02-29');
    await expect(
      runGeneration(settings, { today: TODAY, templatePath: join(dir, 'missing.pptx') }),
    ).rejects.toBeInstanceOf(TemplateLoadError);
    expect(existsSync(deckPath(settings.outputDir, TODAY))).toBe(false);
  });
});

describe('K. deckPath', () => {
  it('names the deck by calendar day', () => {
    expect(deckPath('/out', TODAY)).toBe(join('/out', '2024-03-01_portfolio.pptx'));
  });
});
