/**
 * Shape-tree scanner: top-level children of a slide's <p:spTree>.
 */

import type { ShapeKind } from '@flash-deck/shared';
import { allElements, attr, firstElement, runText } from './xml.js';

export interface EmuRect {
  x: number;
  y: number;
  cx: number;
  cy: number;
}

export interface PlaceholderRef {
  type?: string;
  idx?: string;
}

export interface RawShape {
  kind: ShapeKind;
  id: string;
  name: string;
  /** Own geometry; undefined when the shape inherits it from its layout */
  geometry?: EmuRect;
  placeholder?: PlaceholderRef;
  /** Whether the shape carries a text frame (<p:txBody>) */
  hasTextFrame: boolean;
  paragraphs: string[];
  /** Character offsets of the element inside the slide XML */
  start: number;
  end: number;
  xml: string;
}

const SHAPE_TAG = /<(\/?)(p:sp|p:pic|p:graphicFrame|p:grpSp|p:cxnSp)(?=[\s/>])[^>]*?(\/?)>/g;

function kindOf(tagName: string): ShapeKind {
  switch (tagName) {
    case 'p:pic':
      return 'pic';
    case 'p:graphicFrame':
      return 'graphicFrame';
    case 'p:grpSp':
      return 'grpSp';
    case 'p:cxnSp':
      return 'cxnSp';
    default:
      return 'sp';
  }
}

function readGeometry(xml: string): EmuRect | undefined {
  const xfrm = /<(?:a|p):xfrm\b[^>]*>([\s\S]*?)<\/(?:a|p):xfrm>/.exec(xml);
  if (!xfrm) return undefined;
  const off = /<a:off\b[^>]*?\bx="(-?\d+)"[^>]*?\by="(-?\d+)"/.exec(xfrm[1]);
  const ext = /<a:ext\b[^>]*?\bcx="(\d+)"[^>]*?\bcy="(\d+)"/.exec(xfrm[1]);
  if (!off || !ext) return undefined;
  return { x: Number(off[1]), y: Number(off[2]), cx: Number(ext[1]), cy: Number(ext[2]) };
}

function readPlaceholder(xml: string): PlaceholderRef | undefined {
  const nv = /<p:nvPr\b[^>]*?(?:\/>|>[\s\S]*?<\/p:nvPr>)/.exec(xml)?.[0];
  const ph = nv ? /<p:ph\b[^>]*?\/?>/.exec(nv)?.[0] : undefined;
  if (!ph) return undefined;
  return { type: attr(ph, 'type'), idx: attr(ph, 'idx') };
}

function parseShape(kind: ShapeKind, xml: string, start: number, end: number): RawShape {
  const cNvPr = /<p:cNvPr\b[^>]*?\/?>/.exec(xml)?.[0] ?? '';
  const txBody = kind === 'sp' ? firstElement(xml, 'p:txBody') : undefined;
  const paragraphs = txBody ? allElements(txBody, 'a:p').map(runText) : [];
  return {
    kind,
    id: attr(cNvPr, 'id') ?? '',
    name: attr(cNvPr, 'name') ?? '',
    geometry: readGeometry(xml),
    placeholder: kind === 'grpSp' ? undefined : readPlaceholder(xml),
    hasTextFrame: txBody !== undefined,
    paragraphs,
    start,
    end,
    xml,
  };
}

/** Top-level shapes of the first <p:spTree>, in document (z) order. */
export function scanShapes(slideXml: string): RawShape[] {
  const treeOpen = /<p:spTree\b[^>]*>/.exec(slideXml);
  if (!treeOpen) return [];
  const treeStart = treeOpen.index + treeOpen[0].length;
  const treeEnd = slideXml.indexOf('</p:spTree>', treeStart);
  const limit = treeEnd === -1 ? slideXml.length : treeEnd;

  const shapes: RawShape[] = [];
  const re = new RegExp(SHAPE_TAG.source, 'g');
  re.lastIndex = treeStart;

  let depth = 0;
  let openStart = 0;
  let openKind: ShapeKind = 'sp';
  let m: RegExpExecArray | null;
  while ((m = re.exec(slideXml)) !== null && m.index < limit) {
    const [tag, closing, name, selfClosing] = m;
    if (closing) {
      depth--;
      if (depth === 0) {
        const end = m.index + tag.length;
        shapes.push(parseShape(openKind, slideXml.slice(openStart, end), openStart, end));
      }
    } else if (selfClosing) {
      if (depth === 0) {
        const end = m.index + tag.length;
        shapes.push(parseShape(kindOf(name), tag, m.index, end));
      }
    } else {
      if (depth === 0) {
        openStart = m.index;
        openKind = kindOf(name);
      }
      depth++;
    }
  }
  return shapes;
}

/** Key used to pair a slide placeholder with its layout placeholder. */
function placeholderMatches(ph: PlaceholderRef, candidate: PlaceholderRef): boolean {
  if (ph.idx !== undefined) return candidate.idx === ph.idx;
  return (candidate.type ?? 'body') === (ph.type ?? 'body') && candidate.idx === undefined;
}

/**
 * Geometry for a shape, falling back to the layout placeholder with the
 * same idx (or the same type when the slide placeholder has no idx).
 */
export function effectiveGeometry(shape: RawShape, layoutShapes: readonly RawShape[]): EmuRect | undefined {
  if (shape.geometry) return shape.geometry;
  const ph = shape.placeholder;
  if (!ph) return undefined;
  const match =
    layoutShapes.find((l) => l.placeholder && placeholderMatches(ph, l.placeholder)) ??
    layoutShapes.find((l) => l.placeholder && (l.placeholder.type ?? 'body') === (ph.type ?? 'body'));
  return match?.geometry;
}
