import type { Rect } from '@flash-deck/shared';

// ─── Nearest-center lookup ───────────────────────────────
// Shapes are identified by where they sit, never by name: duplicating a
// slide renames shapes but keeps their geometry.

export interface Point {
  x: number;
  y: number;
}

export function center(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Nearest shape whose center lies within `tolerance` of (x, y).
 * Exact ties go to the earliest shape in the input (slide order), so the
 * result is stable for a given input.
 */
export function findShapeByPosition<T extends Rect>(
  shapes: readonly T[],
  x: number,
  y: number,
  tolerance: number,
): T | null {
  const target = { x, y };
  let best: T | null = null;
  let bestDistance = Infinity;
  for (const shape of shapes) {
    const d = distance(center(shape), target);
    if (d <= tolerance && d < bestDistance) {
      best = shape;
      bestDistance = d;
    }
  }
  return best;
}
