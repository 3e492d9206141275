/**
 * Field transforms: EntityRecord → TextBlock for one mapped role.
 * A transform returns null when the record has nothing to show, in which
 * case the template text is left in place.
 */

import type { Decision, EntityRecord, FieldMapping, FieldTransform, Milestone, UnfilledField } from '@flash-deck/shared';
import { displayDate, formatApiDate } from '../util/dates.js';
import type { TextBlock } from './pptx/textBody.js';
import { FONT_SIZES, fitText, truncateText } from './textFit.js';

export interface FieldContext {
  role: string;
  today: Date;
}

type Transform = (record: EntityRecord, mapping: FieldMapping, ctx: FieldContext) => TextBlock | null;

const DONE = 'done';
const CLOSED_DECISION_STATUSES = new Set(['taken', 'actions-done']);

// ─── Helpers ────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Dotted-path lookup into a record, e.g. "project.owner.name". */
export function valueAt(root: unknown, path: string): unknown {
  let node: unknown = root;
  for (const key of path.split('.').filter(Boolean)) {
    if (!isRecord(node)) return undefined;
    node = node[key];
  }
  return node;
}

function scalarText(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  return null;
}

/** 1234567.4 → "1,234,567" */
export function formatAmount(value: number): string {
  const rounded = Math.round(Math.abs(value));
  const grouped = String(rounded).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return value < 0 && rounded !== 0 ? `-${grouped}` : grouped;
}

function decisionTitle(d: Decision): string {
  return d.title || d.name || '';
}

function bullets(items: string[], fontSizePt: number = FONT_SIZES.content, title?: string): TextBlock {
  return { title, items, bullets: 'on', fontSizePt };
}

/** Sentences of a free-text description, at most 3, each at most 60 chars. */
export function descriptionSentences(description: string): string[] {
  const sentences: string[] = [];
  for (const raw of description.replace(/\n/g, '. ').split('. ')) {
    let sentence = raw.trim();
    if (sentence.length <= 5) continue;
    if (sentence.length > 60) sentence = `${sentence.slice(0, 57)}...`;
    sentences.push(sentence);
    if (sentences.length >= 3) break;
  }
  return sentences.length > 0 ? sentences : [truncateText(description, 180)];
}

// ─── Transforms ─────────────────────────────────────────

const text: Transform = (record, mapping, ctx) => {
  const value = scalarText(valueAt(record, mapping.source));
  if (value === null) return null;
  const fitted = fitText(value, ctx.role);
  return { items: [fitted.text], bullets: 'keep', fontSizePt: fitted.fontSizePt };
};

const title: Transform = (record) => ({
  items: [`Project review : ${truncateText(record.project.name || 'Unknown Project', 60)}`],
  bullets: 'keep',
  fontSizePt: FONT_SIZES.title,
});

const date: Transform = (_record, _mapping, ctx) => ({
  items: [displayDate(ctx.today)],
  bullets: 'keep',
  fontSizePt: FONT_SIZES.date,
});

const moodStatus: Transform = (record, _mapping, ctx) => {
  const status = record.resolved.status ?? record.project.status;
  const mood = record.resolved.mood ?? record.project.mood;
  const comment = `Status: ${status ? truncateText(status, 40) : 'N/A'}\nMood: ${mood ? truncateText(mood, 40) : 'N/A'}`;
  const fitted = fitText(comment, ctx.role);
  return { items: [fitted.text], bullets: 'keep', fontSizePt: fitted.fontSizePt };
};

/** The layout's section title overlaps the top of this box, hence one empty leading paragraph. */
const scopeSummary: Transform = (record) => {
  const { milestones, project } = record;
  const done = milestones.filter((m) => m.status === DONE).length;
  const items = [`Milestones: ${done}/${milestones.length}`, `Progress: ${project.progress ?? 0}%`];
  if (project.start_date) items.push(`Start: ${formatApiDate(project.start_date)}`);
  if (project.end_date) items.push(`End: ${formatApiDate(project.end_date)}`);
  return { padding: 1, items, bullets: 'on', fontSizePt: FONT_SIZES.content };
};

const descriptionBullets: Transform = (record) => {
  const description = record.project.description_text;
  return bullets(description ? descriptionSentences(description) : ['No description available']);
};

/**
 * Open decisions first; when every decision is closed, the latest ones;
 * with no decisions at all, the milestones still to do.
 */
const pendingDecisions: Transform = (record) => {
  const { decisions, milestones } = record;
  const open = decisions.filter((d) => !CLOSED_DECISION_STATUSES.has(d.status ?? ''));
  let source: string[];
  if (open.length > 0) source = open.slice(0, 3).map(decisionTitle);
  else if (decisions.length > 0) source = decisions.slice(0, 3).map(decisionTitle);
  else source = milestones.filter((m: Milestone) => m.status !== DONE).slice(0, 3).map((m) => m.name ?? '');

  const items = source.filter(Boolean).map((t) => truncateText(t, 45));
  return bullets(items.length > 0 ? items : ['No pending decisions or milestones']);
};

const completedMilestones: Transform = (record) => {
  const items = record.milestones
    .filter((m) => m.status === DONE)
    .slice(0, 4)
    .map((m) => m.name ?? '')
    .filter(Boolean)
    .map((n) => truncateText(n, 40));
  return bullets(items.length > 0 ? items : ['No completed milestones yet'], FONT_SIZES.content, 'Made :');
};

const riskSummary: Transform = (record) => {
  const level = record.resolved.risk ?? record.project.risk ?? 'Not set';
  const items = [`Risk Level: ${truncateText(level, 35)}`];
  for (const ap of record.attention_points.slice(0, 2)) {
    if (ap.title) items.push(truncateText(ap.title, 40));
  }
  return bullets(items);
};

const budgetSummary: Transform = (record) => {
  const { budget_capex_initial: bac, budget_capex_used: actual, budget_capex_landing: eac } = record.project;
  const line = (label: string, v: number | null | undefined) =>
    v === null || v === undefined ? `${label}: N/A` : `${label}: ${formatAmount(v)} €`;
  return bullets([line('BAC', bac), line('Actual', actual), line('EAC', eac)], FONT_SIZES.content, 'Build');
};

const TRANSFORMS: Record<FieldTransform, Transform> = {
  text,
  title,
  date,
  mood_status: moodStatus,
  scope_summary: scopeSummary,
  description_bullets: descriptionBullets,
  pending_decisions: pendingDecisions,
  completed_milestones: completedMilestones,
  risk_summary: riskSummary,
  budget_summary: budgetSummary,
};

/** TextBlock for a mapping with status `ok`; null when there is nothing to write. */
export function renderField(record: EntityRecord, mapping: FieldMapping, ctx: FieldContext): TextBlock | null {
  return TRANSFORMS[mapping.transform ?? 'text'](record, mapping, ctx);
}

// ─── Data notes ─────────────────────────────────────────

/** Fields the API left empty for a project, listed on the Data Notes slide. */
export function unfilledFields(record: EntityRecord): UnfilledField[] {
  const { project } = record;
  const name = project.name || record.id;
  const out: UnfilledField[] = [];
  if (!project.description_text) out.push({ project: name, field: 'Description', reason: 'not provided' });
  if (!project.end_date) out.push({ project: name, field: 'End date', reason: 'not provided' });
  if (
    (project.budget_capex_initial === null || project.budget_capex_initial === undefined) &&
    (project.budget_capex_used === null || project.budget_capex_used === undefined)
  ) {
    out.push({ project: name, field: 'Budget', reason: 'not provided by the API' });
  }
  return out;
}
