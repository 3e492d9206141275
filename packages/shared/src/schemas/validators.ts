import { z } from 'zod';

// ─── Shared Validators ───────────────────────────────────
// Reusable Zod refinements for snapshot and template data.

/** ISO-8601 datetime string */
export const zISOTimestamp = z.string().datetime({ offset: true }).or(z.string().datetime());

/** Length in inches, as stored in position maps (non-negative, finite) */
export const zInches = z.number().finite().min(0);

/** Entity identifier: API ids are strings, numeric ids are accepted and normalised */
export const zEntityId = z
  .union([z.string().min(1), z.number().int().nonnegative()])
  .transform((v) => String(v));
