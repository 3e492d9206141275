/**
 * M. HTTP surface
 * The Express app is started on an ephemeral port with a fake upstream API.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { copyFileSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import type { Server } from 'node:http';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createApp } from '../src/app.js';
import type { Settings } from '../src/config/env.js';
import { loadPositionMap } from '../src/config/files.js';
import { writeSnapshot } from '../src/storage/snapshotStore.js';
import { FakeClock, REFERENCE_ROUTES, fakeApi, projectRoutes, relatedRoutes, testSettings } from './helpers/fakeApi.js';
import { buildPptx, cardShapes } from './helpers/pptx.js';
import { fullRecord, snapshotOf } from './helpers/records.js';

const CONFIG_DIR = fileURLToPath(new URL('../../../config', import.meta.url));

let dir: string;
let server: Server | undefined;

async function start(settings: Settings): Promise<string> {
  const api = fakeApi({ ...REFERENCE_ROUTES, ...projectRoutes('1'), ...relatedRoutes() }, new FakeClock());
  const app = createApp(settings, { fetch: api.fetch, clock: new FakeClock() });
  const listening = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  server = listening;
  const address = listening.address();
  if (address === null || typeof address === 'string') throw new Error('server has no TCP address');
  return `http://127.0.0.1:${address.port}`;
}

async function getJson(url: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
  const res = await fetch(url, init);
  return { status: res.status, body: await res.json() };
}

function post(body: unknown): RequestInit {
  return { method: 'POST', headers: { 'content-type': 'application/json' }, body: JSON.stringify(body) };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'routes-'));
});

afterEach(async () => {
  const s = server;
  server = undefined;
  if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
  rmSync(dir, { recursive: true, force: true });
});

describe('M. GET /health', () => {
  it('reports what is configured', async () => {
    const base = await start(testSettings(dir));
    const { status, body } = await getJson(`${base}/health`);
    expect(status).toBe(200);
    expect(body).toMatchObject({
      status: 'degraded',
      service: 'flash-deck-backend',
      version: '0.1.0',
      configured: { apiBaseUrl: true, apiToken: true, template: false, positionMap: false },
      latestSnapshot: null,
    });
  });
});

describe('M. snapshots', () => {
  it('answers 404 before any run', async () => {
    const base = await start(testSettings(dir));
    expect(await getJson(`${base}/api/snapshots`)).toEqual({ status: 200, body: { snapshots: [] } });
    expect(await getJson(`${base}/api/snapshots/latest`)).toEqual({
      status: 404,
      body: { error: 'No snapshot yet; run the collector first' },
    });
  });

  it('serves the latest snapshot', async () => {
    const settings = testSettings(dir);
    writeSnapshot(settings.dataDir, snapshotOf([fullRecord()]), '2024-03-01');
    const base = await start(settings);
    const { status, body } = await getJson(`${base}/api/snapshots/latest`);
    expect(status).toBe(200);
    expect(body).toMatchObject({ file: '2024-03-01_projects.json', snapshot: { projects: [{ id: '7' }] } });
  });
});

describe('M. POST /api/collector/run', () => {
  it('collects the configured projects', async () => {
    const settings = testSettings(dir);
    mkdirSync(settings.configDir, { recursive: true });
    writeFileSync(join(settings.configDir, 'projects.json'), JSON.stringify(['1']));
    const base = await start(settings);

    const { status, body } = await getJson(`${base}/api/collector/run`, { method: 'POST' });
    expect(status).toBe(200);
    expect(body).toMatchObject({ succeeded: 1, failed: [] });

    const snapshots = await getJson(`${base}/api/snapshots`);
    expect(snapshots.body).toMatchObject({ snapshots: [expect.stringMatching(/^\d{4}-\d{2}-\d{2}_projects\.json$/)] });

    const runId = typeof body === 'object' && body !== null && 'runId' in body ? String(body.runId) : '';
    const run = await getJson(`${base}/api/runs/${runId}`);
    expect(run.status).toBe(200);
    expect(run.body).toMatchObject({ runId });
  });

  it('answers 400 with the violations when credentials are missing', async () => {
    const base = await start(testSettings(dir, { api: { ...testSettings(dir).api, token: '' } }));
    expect(await getJson(`${base}/api/collector/run`, { method: 'POST' })).toEqual({
      status: 400,
      body: { error: 'Invalid configuration', violations: ['API_TOKEN is not set.'] },
    });
  });
});

describe('M. template and deck', () => {
  async function withTemplate(): Promise<Settings> {
    const settings = testSettings(dir);
    mkdirSync(settings.configDir, { recursive: true });
    for (const name of ['positions.json', 'mapping.json']) {
      copyFileSync(join(CONFIG_DIR, name), join(settings.configDir, name));
    }
    const positions = loadPositionMap(join(CONFIG_DIR, 'positions.json'));
    writeFileSync(settings.templatePath, await buildPptx([{ shapes: cardShapes(positions) }]));
    return settings;
  }

  it('analyzes and verifies the template', async () => {
    const base = await start(await withTemplate());
    const analyzed = await getJson(`${base}/api/template/analyze`);
    expect(analyzed.status).toBe(200);
    expect(analyzed.body).toMatchObject({ slideCount: 1 });

    const verified = await getJson(`${base}/api/template/verify?tolerance=0.2`);
    expect(verified.status).toBe(200);
    expect(verified.body).toMatchObject({ status: 'ok', totalRoles: 11, matchRate: 1, tolerance: 0.2 });
  });

  it('rejects a bad verify query', async () => {
    const base = await start(await withTemplate());
    expect((await getJson(`${base}/api/template/verify?tolerance=-1`)).status).toBe(400);
  });

  it('answers 422 when the template cannot be read', async () => {
    const base = await start(testSettings(dir));
    expect((await getJson(`${base}/api/template/analyze`)).status).toBe(422);
  });

  it('generates a deck from the latest snapshot', async () => {
    const settings = await withTemplate();
    writeSnapshot(settings.dataDir, snapshotOf([fullRecord()]), '2024-03-01');
    const base = await start(settings);

    const { status, body } = await getJson(`${base}/api/deck/generate`, post({}));
    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', slideCount: 3, matchRate: 1, warnings: [] });
  });

  it('refuses snapshot names the store does not list', async () => {
    const base = await start(await withTemplate());
    expect(await getJson(`${base}/api/deck/generate`, post({ snapshot: '../../etc/passwd' }))).toEqual({
      status: 404,
      body: { error: 'Unknown snapshot ../../etc/passwd' },
    });
  });

  it('answers 404 when the snapshot store cannot be listed', async () => {
    const settings = await withTemplate();
    writeFileSync(settings.dataDir, 'not a directory');
    const base = await start(settings);

    const { status, body } = await getJson(`${base}/api/deck/generate`, post({ snapshot: '2024-03-01_projects.json' }));
    expect(status).toBe(404);
    expect(body).toMatchObject({ error: expect.stringMatching(/^Failed to list /) });
  });

  it('answers 404 when there is no snapshot yet', async () => {
    const base = await start(await withTemplate());
    expect((await getJson(`${base}/api/deck/generate`, post({}))).status).toBe(404);
  });

  it('validates the request body', async () => {
    const base = await start(await withTemplate());
    expect((await getJson(`${base}/api/deck/generate`, post({ tolerance: -1 }))).status).toBe(400);
  });
});

describe('M. runs', () => {
  it('validates the limit and answers 404 for unknown runs', async () => {
    const base = await start(testSettings(dir));
    expect(await getJson(`${base}/api/runs`)).toEqual({ status: 200, body: { events: [] } });
    expect((await getJson(`${base}/api/runs?limit=0`)).status).toBe(400);
    expect(await getJson(`${base}/api/runs/nope`)).toEqual({ status: 404, body: { error: 'Run not found' } });
  });
});
