import { SUMMARY_MAX_ROWS, type EntityRecord, type UnfilledField } from '@flash-deck/shared';
import { displayDate } from '../util/dates.js';
import { inchesToEmu } from './analyze.js';
import type { TextBox } from './pptx/slideXml.js';

// ─── Summary & Data Notes slide content ──────────────────

const HEADING = '003366';
const MUTED = '666666';
const ALERT = '993300';

function box(x: number, y: number, w: number, h: number, text: string, sizePt: number, style: Partial<TextBox> = {}): TextBox {
  return { x: inchesToEmu(x), y: inchesToEmu(y), cx: inchesToEmu(w), cy: inchesToEmu(h), text, sizePt, ...style };
}

function ownerShort(record: EntityRecord): string {
  const first = record.project.owner?.name?.trim().split(/\s+/)[0];
  return first || '-';
}

function projectName(record: EntityRecord): string {
  const name = record.project.name || 'Unknown';
  return name.length > 35 ? `${name.slice(0, 35)}...` : name;
}

const COLUMNS = [
  { header: 'ID', x: 0.3, w: 0.7 },
  { header: 'Project', x: 1.0, w: 2.8 },
  { header: 'Status', x: 3.8, w: 1.8 },
  { header: 'Mood', x: 5.8, w: 1.5 },
  { header: 'Owner', x: 7.5, w: 1.3 },
] as const;

/** Portfolio overview: one row per project, capped at SUMMARY_MAX_ROWS. */
export function summaryBoxes(records: readonly EntityRecord[], today: Date): TextBox[] {
  const boxes: TextBox[] = [
    box(0.4, 0.15, 9, 0.4, 'Portfolio Flash Report', 20, { bold: true, color: HEADING }),
    box(0.4, 0.5, 9, 0.25, `Portfolio review - ${displayDate(today)}`, 11, { color: MUTED }),
    box(0.4, 0.8, 9, 0.25, `${records.length} project${records.length === 1 ? '' : 's'}`, 10, { italic: true }),
  ];

  const headerY = 1.1;
  const rowHeight = 0.28;
  for (const col of COLUMNS) {
    boxes.push(box(col.x, headerY, col.w, 0.25, col.header, 8, { bold: true, color: HEADING }));
  }

  let y = headerY + rowHeight;
  for (const record of records.slice(0, SUMMARY_MAX_ROWS)) {
    const cells = [
      record.project.short_id ?? '',
      projectName(record),
      record.resolved.status ?? record.project.status ?? '-',
      record.resolved.mood ?? record.project.mood ?? '-',
      ownerShort(record),
    ];
    COLUMNS.forEach((col, i) => {
      boxes.push(box(col.x, y, col.w, rowHeight, cells[i], 7, i === 0 ? { bold: true } : {}));
    });
    y += rowHeight;
  }

  if (records.length > SUMMARY_MAX_ROWS) {
    boxes.push(box(0.3, y + 0.05, 9, 0.2, `... and ${records.length - SUMMARY_MAX_ROWS} more`, 7, { italic: true }));
  }
  return boxes;
}

const MAX_NOTE_PROJECTS = 6;
const MAX_NOTES_PER_PROJECT = 3;

/** Known API gaps (from mapping.json) and the per-project fields left empty. */
export function dataNotesBoxes(
  knownGaps: readonly string[],
  unfilled: readonly UnfilledField[],
  now: Date,
): TextBox[] {
  const boxes: TextBox[] = [
    box(0.4, 0.15, 9, 0.4, 'Data Notes', 20, { bold: true, color: HEADING }),
    box(0.4, 0.5, 9, 0.25, 'Fields not populated', 10, { color: MUTED }),
  ];

  let y = 0.85;
  if (knownGaps.length > 0) {
    boxes.push(box(0.4, y, 9, 0.25, 'Known API limitations:', 9, { bold: true, color: ALERT }));
    y += 0.28;
    for (const gap of knownGaps) {
      boxes.push(box(0.5, y, 9, 0.2, `• ${gap}: not available from the API`, 7));
      y += 0.2;
    }
    y += 0.15;
  }

  if (unfilled.length > 0) {
    boxes.push(box(0.4, y, 9, 0.25, 'Missing fields per project:', 9, { bold: true, color: ALERT }));
    y += 0.28;

    const byProject = new Map<string, string[]>();
    for (const u of unfilled) {
      const list = byProject.get(u.project) ?? [];
      list.push(`${u.field}: ${u.reason}`);
      byProject.set(u.project, list);
    }
    for (const [project, fields] of [...byProject].slice(0, MAX_NOTE_PROJECTS)) {
      boxes.push(box(0.5, y, 9, 0.18, `${project}:`, 7, { bold: true }));
      y += 0.18;
      for (const field of fields.slice(0, MAX_NOTES_PER_PROJECT)) {
        boxes.push(box(0.7, y, 8.5, 0.16, `- ${field}`, 6));
        y += 0.16;
      }
      y += 0.08;
    }
  }

  const stamp = `${now.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
  boxes.push(box(0.4, 5.2, 9, 0.2, `Generated: ${stamp}`, 6, { italic: true, color: '999999' }));
  return boxes;
}
