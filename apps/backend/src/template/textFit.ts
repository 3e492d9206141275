// ─── Text fitting ────────────────────────────────────────
// Template boxes have fixed sizes; content is cut to per-role character and
// line budgets and the font is stepped down as a box fills up.

export const ELLIPSIS = '...';

export interface TextLimits {
  charsPerLine: number;
  lines: number;
  total: number;
}

/** Budgets for the project-card roles, sized from the template boxes at 9pt. */
export const TEXT_LIMITS: Readonly<Record<string, TextLimits>> = {
  title: { charsPerLine: 80, lines: 1, total: 80 },
  date: { charsPerLine: 10, lines: 1, total: 10 },
  mood_status: { charsPerLine: 50, lines: 3, total: 120 },
  scope: { charsPerLine: 50, lines: 4, total: 180 },
  achievements: { charsPerLine: 55, lines: 5, total: 250 },
  trends: { charsPerLine: 50, lines: 3, total: 120 },
  next_steps: { charsPerLine: 50, lines: 4, total: 180 },
  made: { charsPerLine: 50, lines: 5, total: 200 },
  risks: { charsPerLine: 50, lines: 4, total: 180 },
  budget: { charsPerLine: 45, lines: 6, total: 220 },
};

const DEFAULT_LIMITS: TextLimits = { charsPerLine: 50, lines: 4, total: 180 };

export const FONT_SIZES = {
  title: 14,
  date: 8,
  content: 9,
  contentSmall: 8,
  contentTiny: 7,
} as const;

/**
 * Cut `text` to at most `maxChars` including the ellipsis, preferring a
 * word boundary when one falls in the last 30% of the budget.
 */
export function truncateText(text: string | null | undefined, maxChars: number, ellipsis = ELLIPSIS): string {
  if (!text || text.length <= maxChars) return text ?? '';
  let cut = text.slice(0, Math.max(0, maxChars - ellipsis.length));
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > maxChars * 0.7) cut = cut.slice(0, lastSpace);
  return cut.trimEnd() + ellipsis;
}

/** Keep at most `maxLines` lines, each optionally cut to `maxCharsPerLine`. */
export function truncateLines(text: string, maxLines: number, maxCharsPerLine?: number): string {
  if (!text) return '';
  let lines = text.split('\n');
  if (maxCharsPerLine !== undefined) {
    lines = lines.map((l) => (l.length > maxCharsPerLine ? truncateText(l, maxCharsPerLine) : l));
  }
  if (lines.length > maxLines) {
    lines = lines.slice(0, maxLines);
    const last = lines[lines.length - 1].trimEnd();
    if (last && !last.endsWith(ELLIPSIS)) {
      lines[lines.length - 1] = last.length > ELLIPSIS.length ? last.slice(0, -ELLIPSIS.length) + ELLIPSIS : ELLIPSIS;
    }
  }
  return lines.join('\n');
}

export interface FittedText {
  text: string;
  fontSizePt: number;
}

/** Apply the role's budgets and pick a font size: 9pt, 8pt past 80% of the budget, 7pt past 95%. */
export function fitText(text: string | null | undefined, role: string): FittedText {
  if (!text) return { text: '', fontSizePt: FONT_SIZES.content };
  const limits = TEXT_LIMITS[role] ?? DEFAULT_LIMITS;

  let fitted = text.length > limits.total ? truncateText(text, limits.total) : text;
  fitted = truncateLines(fitted, limits.lines, limits.charsPerLine);

  let fontSizePt: number = FONT_SIZES.content;
  if (fitted.length > limits.total * 0.8) fontSizePt = FONT_SIZES.contentSmall;
  if (fitted.length > limits.total * 0.95) fontSizePt = FONT_SIZES.contentTiny;
  return { text: fitted, fontSizePt };
}
