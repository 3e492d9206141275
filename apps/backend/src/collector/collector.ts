/**
 * Collector: reference data + per-project fetches → one Snapshot per day.
 *
 * Failure policy
 *   reference data     any failure aborts the run
 *   project detail     the project is recorded as failed, the run continues
 *   related collection empty list + an entry in the record's `errors`
 */

import crypto from 'node:crypto';
import { z } from 'zod';
import {
  AttentionPointSchema,
  DecisionSchema,
  MilestoneSchema,
  ProjectDetailSchema,
  ReferenceItemSchema,
  type CollectionError,
  type EntityRecord,
  type FetchSummary,
  type ReferenceCategory,
  type ReferenceItem,
  type ReferenceSet,
  type RelatedCollection,
  type Snapshot,
} from '@flash-deck/shared';
import { RateLimitExceededError, UpstreamError, errorMessage } from '../errors.js';
import { requireApiCredentials, tokenWarnings, type Settings } from '../config/env.js';
import { loadCollectorLayout, loadProjectIds, type CollectorLayout } from '../config/files.js';
import { runLogger } from '../storage/runLog.js';
import { writeSnapshot } from '../storage/snapshotStore.js';
import { ApiClient, type FetchLike } from './apiClient.js';
import { systemClock, type Clock } from './clock.js';
import { RateGate } from './rateGate.js';
import { runPool } from './workerPool.js';

// ─── Types ──────────────────────────────────────────────

export type EntityOutcome =
  | { ok: true; record: EntityRecord }
  | { ok: false; id: string; error: string };

export interface FetchAllOptions {
  concurrency: number;
  signal?: AbortSignal;
  /** Called as each project settles (completion order). */
  onOutcome?: (outcome: EntityOutcome) => void;
}

export interface FetchAllResult {
  snapshot: Snapshot;
  summary: FetchSummary;
  aborted: boolean;
}

export interface CollectorRunOptions {
  fetch?: FetchLike;
  clock?: Clock;
  signal?: AbortSignal;
  /** Overrides config/projects.json */
  ids?: string[];
  /** Overrides config/collector.json */
  layout?: CollectorLayout;
  /** Snapshot date; defaults to today */
  date?: Date;
}

export interface CollectorRunResult {
  runId: string;
  snapshotPath: string | null;
  summary: FetchSummary;
  aborted: boolean;
}

const REFERENCE_ENDPOINTS = {
  moods: 'moods',
  statuses: 'statuses',
  risks: 'risks',
} as const satisfies Record<ReferenceCategory, string>;

// ─── Label resolution ───────────────────────────────────

/**
 * Display label for a reference code: localized name, then name, then the
 * raw code when the ReferenceSet does not know it. No code → null.
 */
export function resolveLabel(items: readonly ReferenceItem[], code: string | null | undefined): string | null {
  if (!code) return null;
  const item = items.find((i) => i.code === code);
  return item?.name_fr || item?.name || code;
}

// ─── Operations ─────────────────────────────────────────

export async function fetchReferenceData(client: ApiClient): Promise<ReferenceSet> {
  const fetchCategory = async (category: ReferenceCategory): Promise<ReferenceItem[]> => {
    const path = client.endpoint(REFERENCE_ENDPOINTS[category]);
    let raw: unknown[];
    try {
      raw = await client.fetchAllPages(path);
    } catch (err) {
      if (err instanceof UpstreamError) {
        throw new UpstreamError(`Reference data "${category}" unavailable: ${err.message}`, {
          status: err.status,
          endpoint: err.endpoint,
          attempts: err.attempts,
          cause: err,
        });
      }
      throw err;
    }
    const parsed = z.array(ReferenceItemSchema).safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamError(`Reference data "${category}" has an unexpected shape: ${parsed.error.issues[0]?.message}`, {
        status: 200,
        endpoint: path,
        attempts: 1,
      });
    }
    return parsed.data;
  };

  const moods = await fetchCategory('moods');
  const statuses = await fetchCategory('statuses');
  const risks = await fetchCategory('risks');
  return { moods, statuses, risks };
}

const RELATED: ReadonlyArray<{
  collection: RelatedCollection;
  endpoint: 'milestones' | 'decisions' | 'attentionPoints';
  schema: z.ZodTypeAny;
}> = [
  { collection: 'milestones', endpoint: 'milestones', schema: MilestoneSchema },
  { collection: 'decisions', endpoint: 'decisions', schema: DecisionSchema },
  { collection: 'attention_points', endpoint: 'attentionPoints', schema: AttentionPointSchema },
];

async function fetchRelated(
  client: ApiClient,
  id: string,
  spec: (typeof RELATED)[number],
): Promise<{ items: unknown[]; error?: CollectionError }> {
  try {
    const raw = await client.fetchAllPages(client.endpoint(spec.endpoint), { project: id });
    const parsed = z.array(spec.schema).safeParse(raw);
    if (!parsed.success) {
      return {
        items: [],
        error: { collection: spec.collection, message: `unexpected shape: ${parsed.error.issues[0]?.message}` },
      };
    }
    return { items: parsed.data };
  } catch (err) {
    if (err instanceof UpstreamError || err instanceof RateLimitExceededError) {
      return { items: [], error: { collection: spec.collection, message: err.message } };
    }
    throw err;
  }
}

/**
 * Detail + related collections for one project. Never throws for an
 * upstream failure: the detail call failing makes the outcome `failed`.
 */
export async function fetchEntity(client: ApiClient, id: string, refs: ReferenceSet): Promise<EntityOutcome> {
  let detailRaw: unknown;
  try {
    detailRaw = await client.get(client.endpoint('project', id), {
      expand: client.layout.expand.length > 0 ? client.layout.expand.join(',') : undefined,
    });
  } catch (err) {
    if (err instanceof UpstreamError) return { ok: false, id, error: err.forEntity(id).message };
    if (err instanceof RateLimitExceededError) return { ok: false, id, error: `[entity ${id}] ${err.message}` };
    throw err;
  }

  const detail = ProjectDetailSchema.safeParse(detailRaw);
  if (!detail.success) {
    return { ok: false, id, error: `[entity ${id}] project detail has an unexpected shape` };
  }

  const [milestones, decisions, attention] = await Promise.all(RELATED.map((spec) => fetchRelated(client, id, spec)));
  const errors = [milestones, decisions, attention].flatMap((r) => (r.error ? [r.error] : []));
  for (const e of errors) {
    console.warn(`[collector] project ${id}: ${e.collection} unavailable (${e.message})`);
  }

  const project = detail.data;
  const record: EntityRecord = {
    id,
    project,
    resolved: {
      mood: resolveLabel(refs.moods, project.mood),
      status: resolveLabel(refs.statuses, project.status),
      risk: resolveLabel(refs.risks, project.risk),
    },
    milestones: z.array(MilestoneSchema).parse(milestones.items),
    decisions: z.array(DecisionSchema).parse(decisions.items),
    attention_points: z.array(AttentionPointSchema).parse(attention.items),
    errors,
  };
  return { ok: true, record };
}

/**
 * All projects through a bounded worker pool, folded into
 * `{ succeeded, failed }` in input order.
 */
export async function fetchAll(
  client: ApiClient,
  ids: readonly string[],
  refs: ReferenceSet,
  options: FetchAllOptions,
): Promise<FetchAllResult> {
  const fetchedAt = new Date().toISOString();
  const outcomes = await runPool(
    ids,
    options.concurrency,
    async (id) => {
      let outcome: EntityOutcome;
      try {
        outcome = await fetchEntity(client, id, refs);
      } catch (err) {
        if (!options.signal?.aborted) throw err;
        outcome = { ok: false, id, error: `[entity ${id}] aborted` };
      }
      options.onOutcome?.(outcome);
      return outcome;
    },
    options.signal,
  );

  const summary: FetchSummary = { succeeded: [], failed: [] };
  const projects: EntityRecord[] = [];
  outcomes.forEach((outcome, i) => {
    if (outcome === undefined) {
      summary.failed.push({ id: ids[i], error: 'not started (run aborted)' });
    } else if (outcome.ok) {
      summary.succeeded.push(outcome.record.id);
      projects.push(outcome.record);
    } else {
      summary.failed.push({ id: outcome.id, error: outcome.error });
    }
  });

  return {
    snapshot: { fetched_at: fetchedAt, reference_data: refs, projects, summary },
    summary,
    aborted: options.signal?.aborted ?? false,
  };
}

/**
 * One Collector run: preflight, reference data, projects, snapshot.
 * Throws ConfigError before any request when configuration is incomplete.
 */
export async function runCollector(settings: Settings, options: CollectorRunOptions = {}): Promise<CollectorRunResult> {
  requireApiCredentials(settings.api);
  for (const warning of tokenWarnings(settings.api.token)) {
    console.warn(`[collector] ${warning}`);
  }
  const ids = options.ids ?? loadProjectIds(settings.configDir);
  const layout = options.layout ?? loadCollectorLayout(settings.configDir);

  const clock = options.clock ?? systemClock;
  const gate = new RateGate(settings.api.ratePerSecond, clock);
  const client = new ApiClient({
    ...settings.api,
    gate,
    layout,
    fetch: options.fetch,
    clock,
    signal: options.signal,
  });

  const runLog = runLogger(settings.dataDir, crypto.randomUUID());
  runLog.log('COLLECT_START', { projects: ids.length, baseUrl: settings.api.baseUrl });
  console.log(`[collector] run ${runLog.runId}: ${ids.length} project(s), concurrency ${settings.concurrency}`);

  let refs: ReferenceSet;
  try {
    refs = await fetchReferenceData(client);
  } catch (err) {
    runLog.log('ERROR', { stage: 'reference_data', error: errorMessage(err) }, 'ERROR');
    throw err;
  }
  console.log(
    `[collector] reference data: ${refs.moods.length} moods, ${refs.statuses.length} statuses, ${refs.risks.length} risks`,
  );

  const { snapshot, summary, aborted } = await fetchAll(client, ids, refs, {
    concurrency: settings.concurrency,
    signal: options.signal,
    onOutcome: (outcome) => {
      if (outcome.ok) {
        console.log(`[collector] ✓ ${outcome.record.id}`);
      } else {
        console.warn(`[collector] ✗ ${outcome.error}`);
        runLog.log('ENTITY_FAILED', { id: outcome.id, error: outcome.error }, 'WARN');
      }
    },
  });

  if (aborted) {
    runLog.log('COLLECT_ABORTED', summary, 'WARN');
    console.warn('[collector] run aborted; no snapshot written');
    return { runId: runLog.runId, snapshotPath: null, summary, aborted: true };
  }

  const path = writeSnapshot(settings.dataDir, snapshot, options.date);
  runLog.log('SNAPSHOT_WRITTEN', { path, projects: snapshot.projects.length });
  runLog.log(
    'COLLECT_DONE',
    { succeeded: summary.succeeded.length, failed: summary.failed.length },
    summary.failed.length > 0 ? 'WARN' : 'INFO',
  );
  console.log(
    `[collector] done: ${summary.succeeded.length} succeeded, ${summary.failed.length} failed → ${path}`,
  );
  return { runId: runLog.runId, snapshotPath: path, summary, aborted: false };
}
