/**
 * OPC package access for .pptx files (jszip).
 *
 * loadTemplate() reads everything the analyzer needs up front (slide order,
 * slide XML, slide relationships, layout XML) so analysis is synchronous and
 * pure. The original bytes are kept so generation can reopen a pristine copy.
 */

import { readFile } from 'node:fs/promises';
import { posix } from 'node:path';
import JSZip from 'jszip';
import { TemplateLoadError, errorMessage } from '../../errors.js';
import { allElements, attr, firstElement, startTag } from './xml.js';

// ─── Constants ──────────────────────────────────────────

export const REL_TYPES = {
  slide: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide',
  slideLayout: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideLayout',
  notesSlide: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/notesSlide',
} as const;

export const SLIDE_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.presentationml.slide+xml';

export const PRESENTATION_PART = 'ppt/presentation.xml';
export const PRESENTATION_RELS_PART = 'ppt/_rels/presentation.xml.rels';
export const CONTENT_TYPES_PART = '[Content_Types].xml';

// ─── Types ──────────────────────────────────────────────

export interface Relationship {
  id: string;
  type: string;
  /** Target as written in the .rels file */
  target: string;
  /** Package path the target resolves to (external targets are kept as-is) */
  resolved: string;
  external: boolean;
}

export interface TemplateSlide {
  /** 0-based presentation order */
  index: number;
  path: string;
  xml: string;
  rels: Relationship[];
  layoutPath?: string;
  layoutXml?: string;
}

export interface TemplateLayout {
  path: string;
  xml: string;
  /** `type` attribute of <p:sldLayout>, e.g. "blank", "title" */
  type?: string;
}

export interface PptxTemplate {
  source: string;
  bytes: Uint8Array;
  slideSize: { cx: number; cy: number };
  slides: TemplateSlide[];
  layouts: TemplateLayout[];
}

// ─── Paths & relationships ──────────────────────────────

export function relsPathFor(partPath: string): string {
  return posix.join(posix.dirname(partPath), '_rels', `${posix.basename(partPath)}.rels`);
}

export function parseRels(xml: string, partPath: string): Relationship[] {
  const baseDir = posix.dirname(partPath);
  return allElements(xml, 'Relationship').map((el) => {
    const tag = startTag(el);
    const target = attr(tag, 'Target') ?? '';
    const external = attr(tag, 'TargetMode') === 'External';
    return {
      id: attr(tag, 'Id') ?? '',
      type: attr(tag, 'Type') ?? '',
      target,
      resolved: external ? target : posix.normalize(posix.join(baseDir, target)).replace(/^\//, ''),
      external,
    };
  });
}

export async function readPart(zip: JSZip, path: string): Promise<string | undefined> {
  const file = zip.file(path);
  return file ? file.async('string') : undefined;
}

async function requirePart(zip: JSZip, path: string, source: string): Promise<string> {
  const xml = await readPart(zip, path);
  if (xml === undefined) throw new TemplateLoadError(source, `missing part ${path}`);
  return xml;
}

// ─── Loader ─────────────────────────────────────────────

export async function loadTemplate(bytes: Uint8Array, source = '<buffer>'): Promise<PptxTemplate> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (err) {
    throw new TemplateLoadError(source, `not a zip archive (${errorMessage(err)})`, err);
  }

  const presXml = await requirePart(zip, PRESENTATION_PART, source);
  const presRels = parseRels(await requirePart(zip, PRESENTATION_RELS_PART, source), PRESENTATION_PART);

  const sldSz = firstElement(presXml, 'p:sldSz');
  const slideSize = {
    cx: Number(sldSz ? attr(sldSz, 'cx') : undefined) || 9_144_000,
    cy: Number(sldSz ? attr(sldSz, 'cy') : undefined) || 5_143_500,
  };

  const sldIdLst = firstElement(presXml, 'p:sldIdLst') ?? '';
  const slideRIds = allElements(sldIdLst, 'p:sldId').map((el) => attr(el, 'r:id') ?? '');

  const layoutCache = new Map<string, string>();
  const slides: TemplateSlide[] = [];
  for (const [index, rId] of slideRIds.entries()) {
    const rel = presRels.find((r) => r.id === rId && r.type === REL_TYPES.slide);
    if (!rel) throw new TemplateLoadError(source, `slide relationship ${rId} not found`);
    const xml = await requirePart(zip, rel.resolved, source);
    const relsXml = await readPart(zip, relsPathFor(rel.resolved));
    const rels = relsXml ? parseRels(relsXml, rel.resolved) : [];
    const layoutPath = rels.find((r) => r.type === REL_TYPES.slideLayout)?.resolved;
    let layoutXml: string | undefined;
    if (layoutPath) {
      layoutXml = layoutCache.get(layoutPath) ?? (await readPart(zip, layoutPath));
      if (layoutXml !== undefined) layoutCache.set(layoutPath, layoutXml);
    }
    slides.push({ index, path: rel.resolved, xml, rels, layoutPath, layoutXml });
  }

  const layouts: TemplateLayout[] = [];
  const layoutPaths = Object.keys(zip.files)
    .filter((p) => /^ppt\/slideLayouts\/slideLayout\d+\.xml$/.test(p))
    .sort((a, b) => layoutNumber(a) - layoutNumber(b));
  for (const path of layoutPaths) {
    const xml = layoutCache.get(path) ?? (await requirePart(zip, path, source));
    const root = firstElementStart(xml, 'p:sldLayout');
    layouts.push({ path, xml, type: root ? attr(root, 'type') : undefined });
  }

  return { source, bytes, slideSize, slides, layouts };
}

export async function readTemplateFile(path: string): Promise<PptxTemplate> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new TemplateLoadError(path, errorMessage(err), err);
  }
  return loadTemplate(bytes, path);
}

function layoutNumber(path: string): number {
  return Number(/(\d+)\.xml$/.exec(path)?.[1] ?? 0);
}

function firstElementStart(xml: string, name: string): string | undefined {
  return new RegExp(`<${name}(?=[\\s/>])[^>]*>`).exec(xml)?.[0];
}
