// ─── Template geometry defaults ──────────────────────────

/** English Metric Units per inch (OOXML length unit). */
export const EMU_PER_INCH = 914_400;

/** Decimal places kept on inch values to absorb format noise. */
export const POSITION_PRECISION = 2;

/** Radius (inches) within which a live shape counts as the same placeholder. */
export const DEFAULT_POSITION_TOLERANCE = 0.15;

/** Offset (inches) below which a found placeholder counts as unchanged. */
export const DEFAULT_MATCH_EPSILON = 0.05;

/** Below this match rate a generation is flagged as low coverage. */
export const DEFAULT_COVERAGE_THRESHOLD = 0.6;

/** Slide (0-based) of the template cloned for every project. */
export const DEFAULT_TEMPLATE_SLIDE = 0;

/** Default slide type key inside mapping.json. */
export const PROJECT_SLIDE_TYPE = 'project_card';

/** Summary slide row limit. */
export const SUMMARY_MAX_ROWS = 14;

/** Output decks are named `<YYYY-MM-DD>${DECK_SUFFIX}`. */
export const DECK_SUFFIX = '_portfolio.pptx';
