import { EMU_PER_INCH, POSITION_PRECISION, type ShapePosition } from '@flash-deck/shared';
import type { PptxTemplate, TemplateSlide } from './pptx/package.js';
import { effectiveGeometry, scanShapes, type EmuRect, type RawShape } from './pptx/shapes.js';

// ─── Geometry conversion ─────────────────────────────────

const SCALE = 10 ** POSITION_PRECISION;

export function emuToInches(emu: number): number {
  return Math.round((emu / EMU_PER_INCH) * SCALE) / SCALE;
}

export function inchesToEmu(inches: number): number {
  return Math.round(inches * EMU_PER_INCH);
}

export function toShapePosition(slide: number, shape: RawShape, geometry: EmuRect | undefined): ShapePosition {
  const text = shape.paragraphs.join('\n');
  return {
    slide,
    name: shape.name,
    kind: shape.kind,
    x: emuToInches(geometry?.x ?? 0),
    y: emuToInches(geometry?.y ?? 0),
    width: emuToInches(geometry?.cx ?? 0),
    height: emuToInches(geometry?.cy ?? 0),
    text,
    hasText: shape.hasTextFrame,
    isPlaceholder: shape.placeholder !== undefined,
  };
}

/** Shapes of one slide paired with their resolved positions. */
export function slideShapes(slide: TemplateSlide): Array<{ raw: RawShape; position: ShapePosition }> {
  return slideShapesFromXml(slide.index, slide.xml, slide.layoutXml);
}

export function slideShapesFromXml(
  index: number,
  xml: string,
  layoutXml: string | undefined,
): Array<{ raw: RawShape; position: ShapePosition }> {
  const layoutShapes = layoutXml ? scanShapes(layoutXml) : [];
  return scanShapes(xml).map((raw) => ({
    raw,
    position: toShapePosition(index, raw, effectiveGeometry(raw, layoutShapes)),
  }));
}

/**
 * Every top-level shape on every slide, slide order then z-order.
 * Positions are inches rounded to POSITION_PRECISION decimals.
 */
export function analyze(template: PptxTemplate): ShapePosition[] {
  return template.slides.flatMap((slide) => slideShapes(slide).map((s) => s.position));
}

/** Human-readable dump for the CLI. */
export function formatAnalysis(shapes: readonly ShapePosition[]): string {
  const lines: string[] = [];
  let current = -1;
  for (const s of shapes) {
    if (s.slide !== current) {
      current = s.slide;
      lines.push(`\nSlide ${s.slide}`);
    }
    const flags = [s.kind, s.isPlaceholder ? 'placeholder' : '', s.hasText ? 'text' : '']
      .filter(Boolean)
      .join(', ');
    const preview = s.text.replace(/\n/g, ' | ').slice(0, 50);
    lines.push(
      `  (${s.x.toFixed(2)}, ${s.y.toFixed(2)}) ${s.width.toFixed(2)}×${s.height.toFixed(2)}  ${s.name} [${flags}]${preview ? `  "${preview}"` : ''}`,
    );
  }
  return lines.join('\n').trimStart();
}
