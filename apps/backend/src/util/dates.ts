// ─── Calendar helpers ────────────────────────────────────
// Snapshot and deck file names use the local calendar day of the run.

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** YYYY-MM-DD (local time) */
export function calendarDate(d: Date = new Date()): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

/** dd/mm/yyyy (local time) */
export function displayDate(d: Date = new Date()): string {
  return `${pad2(d.getDate())}/${pad2(d.getMonth() + 1)}/${d.getFullYear()}`;
}

/**
 * API date or datetime → dd/mm/yyyy.
 * A plain YYYY-MM-DD is taken as-is (no timezone shift); anything that does
 * not parse is returned unchanged.
 */
export function formatApiDate(value: string): string {
  const plain = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (plain) return `${plain[3]}/${plain[2]}/${plain[1]}`;
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) return value;
  return `${pad2(d.getUTCDate())}/${pad2(d.getUTCMonth() + 1)}/${d.getUTCFullYear()}`;
}
