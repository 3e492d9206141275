/**
 * Deck generation: one cloned project card per EntityRecord, framed by a
 * Summary slide and a Data Notes slide.
 *
 * Roles are resolved to live shapes through the verification pass, so two
 * roles can never write into the same shape. Clones are byte copies of the
 * template slide, which means the shape offsets found there hold for every
 * clone.
 */

import {
  DEFAULT_TEMPLATE_SLIDE,
  PROJECT_SLIDE_TYPE,
  type GenerationReport,
  type MappingFile,
  type PositionMap,
  type ShapePosition,
  type SlideFill,
  type Snapshot,
  type UnfilledField,
} from '@flash-deck/shared';
import { ConfigError, TemplateLoadError } from '../errors.js';
import { slideShapes } from './analyze.js';
import { dataNotesBoxes, summaryBoxes } from './extraSlides.js';
import { renderField, unfilledFields } from './fields.js';
import { REL_TYPES, type PptxTemplate } from './pptx/package.js';
import type { RawShape } from './pptx/shapes.js';
import { buildTextSlide } from './pptx/slideXml.js';
import { CLEARED, replaceShapeText, type TextBlock } from './pptx/textBody.js';
import { DeckWriter, cloneableRels, type OutgoingRel } from './pptx/writer.js';
import { formatVerification, verifyShapes, type VerifyOptions } from './verify.js';

export interface GenerateOptions extends VerifyOptions {
  /** mapping.json slide type to use for project cards */
  slideType?: string;
  /** 0-based template slide cloned per project */
  templateSlide?: number;
  /** Date printed on the slides */
  today?: Date;
  summarySlide?: boolean;
  dataNotesSlide?: boolean;
}

export interface GenerateResult {
  document: Buffer;
  report: GenerationReport;
}

interface Edit {
  shape: RawShape;
  block: TextBlock;
}

/** Layout for the built slides: the template's blank layout, else the card's own layout. */
function extraSlideRels(template: PptxTemplate, cardLayout: string | undefined): OutgoingRel[] {
  const layout = template.layouts.find((l) => l.type === 'blank')?.path ?? cardLayout ?? template.layouts[0]?.path;
  if (!layout) throw new TemplateLoadError(template.source, 'no slide layout available');
  return [{ id: 'rId1', type: REL_TYPES.slideLayout, target: layout }];
}

function applyEdits(slideXml: string, edits: readonly Edit[]): string {
  let xml = slideXml;
  for (const { shape, block } of [...edits].sort((a, b) => b.shape.start - a.shape.start)) {
    xml = xml.slice(0, shape.start) + replaceShapeText(shape.xml, block) + xml.slice(shape.end);
  }
  return xml;
}

export async function generate(
  snapshot: Snapshot,
  mapping: MappingFile,
  positionMap: PositionMap,
  template: PptxTemplate,
  options: GenerateOptions = {},
): Promise<GenerateResult> {
  const today = options.today ?? new Date();
  const slideType = options.slideType ?? PROJECT_SLIDE_TYPE;
  const slideIndex = options.templateSlide ?? DEFAULT_TEMPLATE_SLIDE;

  const card = template.slides[slideIndex];
  if (!card) {
    throw new TemplateLoadError(template.source, `template has no slide ${slideIndex} (${template.slides.length} slide(s))`);
  }
  const roles = mapping.slides[slideType];
  if (!roles) {
    throw new ConfigError([`mapping.json has no "${slideType}" slide mapping`]);
  }

  // ── VERIFY ──
  const pairs = template.slides.flatMap((s) => slideShapes(s));
  const rawOf = new Map<ShapePosition, RawShape>(pairs.map((p) => [p.position, p.raw]));
  const verification = verifyShapes(
    pairs.map((p) => p.position),
    positionMap,
    options,
  );
  const shapeForRole = new Map<string, RawShape>();
  for (const hit of [...verification.matched, ...verification.drifted]) {
    const raw = rawOf.get(hit.actual);
    if (raw && hit.actual.slide === slideIndex) shapeForRole.set(hit.role, raw);
  }

  const warnings: string[] = [];
  if (verification.status === 'degraded') warnings.push(...formatVerification(verification));
  if (snapshot.projects.length === 0) warnings.push('snapshot has no projects; only the summary and notes slides are written');

  const unresolved = Object.entries(roles)
    .filter(([role, field]) => (field.status === 'ok' || field.status === 'clear') && !shapeForRole.has(role))
    .map(([role]) => role);
  for (const role of unresolved) {
    warnings.push(`role "${role}" has no shape on template slide ${slideIndex}; its field is not written`);
  }

  // ── GENERATE ──
  const writer = await DeckWriter.open(template);
  const cardRels = cloneableRels(card.rels);
  const plainRels = extraSlideRels(template, card.layoutPath);

  const fills: SlideFill[] = [];
  const unfilled: UnfilledField[] = [];
  const cards: string[] = [];

  for (const record of snapshot.projects) {
    const fill: SlideFill = { entityId: record.id, filled: [], cleared: [], notFound: [], skipped: [] };
    const edits: Edit[] = [];

    for (const [role, field] of Object.entries(roles)) {
      if (field.status === 'missing' || field.status === 'manual') {
        fill.skipped.push(role);
        continue;
      }
      const shape = shapeForRole.get(role);
      if (!shape || !shape.hasTextFrame) {
        fill.notFound.push(role);
        continue;
      }
      if (field.status === 'clear') {
        edits.push({ shape, block: CLEARED });
        fill.cleared.push(role);
        continue;
      }
      const block = renderField(record, field, { role, today });
      if (block === null) {
        fill.skipped.push(role);
        continue;
      }
      edits.push({ shape, block });
      fill.filled.push(role);
    }

    cards.push(applyEdits(card.xml, edits));
    fills.push(fill);
    unfilled.push(...unfilledFields(record));
  }

  if (options.summarySlide ?? true) {
    writer.addSlide(buildTextSlide(summaryBoxes(snapshot.projects, today)), plainRels);
  }
  for (const xml of cards) writer.addSlide(xml, cardRels);
  if (options.dataNotesSlide ?? true) {
    writer.addSlide(buildTextSlide(dataNotesBoxes(mapping.missing_fields, unfilled, today)), plainRels);
  }

  const slideCount = writer.slideCount;
  const document = await writer.toBuffer();

  return {
    document,
    report: {
      status: verification.status,
      verification,
      slideCount,
      slides: fills,
      unfilled,
      warnings,
    },
  };
}
