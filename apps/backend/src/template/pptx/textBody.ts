/**
 * Rewrites the paragraphs of a shape's <p:txBody> while keeping the
 * template's look: each new paragraph copies the paragraph properties and
 * first-run properties of a template paragraph in the same box.
 */

import { allElements, escapeXml, firstElement, setAttr, startTag } from './xml.js';

export type BulletMode = 'on' | 'off' | 'keep';

export interface TextBlock {
  /** First paragraph, never bulleted */
  title?: string;
  /** Empty paragraphs placed before the items */
  padding?: number;
  /** One paragraph per item; "\n" inside an item is a line break */
  items: string[];
  bullets: BulletMode;
  fontSizePt?: number;
}

/** An empty box: one paragraph, no runs. */
export const CLEARED: TextBlock = { items: [], bullets: 'keep' };

const DEFAULT_BULLET = '<a:buChar char="▪"/>';
const BULLET_TYPE = /<a:(buNone|buAutoNum|buChar|buBlip)\b[^>]*?(?:\/>|>[\s\S]*?<\/a:\1>)/g;
const HAS_BULLET = /<a:(buAutoNum|buChar|buBlip)\b/;

interface Line {
  text: string;
  bullet: BulletMode;
  template: number;
}

function layout(block: TextBlock, templateCount: number): Line[] {
  const last = Math.max(0, templateCount - 1);
  const lines: Line[] = [];
  if (block.title !== undefined) lines.push({ text: block.title, bullet: 'off', template: 0 });
  const bodyStart = lines.length;
  for (let i = 0; i < (block.padding ?? 0); i++) {
    lines.push({ text: '', bullet: 'off', template: Math.min(bodyStart + i, last) });
  }
  block.items.forEach((item, i) => {
    lines.push({ text: item, bullet: block.bullets, template: Math.min(bodyStart + i, last) });
  });
  return lines;
}

function openElement(el: string, name: string): string {
  return el.endsWith('/>') ? `${el.slice(0, -2).trimEnd()}></${name}>` : el;
}

/** pPr with its bullet type replaced by `bullet`, kept in schema order. */
function withBulletType(pPr: string | undefined, bullet: string): string {
  const p = openElement(pPr ?? '<a:pPr/>', 'a:pPr').replace(BULLET_TYPE, '');
  const anchor = /<a:(tabLst|defRPr|extLst)\b/.exec(p);
  const at = anchor ? anchor.index : p.lastIndexOf('</a:pPr>');
  return p.slice(0, at) + bullet + p.slice(at);
}

function applyBullet(pPr: string | undefined, mode: BulletMode, bulletChar: string): string {
  switch (mode) {
    case 'keep':
      return pPr ?? '';
    case 'off':
      return withBulletType(pPr, '<a:buNone/>');
    case 'on':
      return pPr && HAS_BULLET.test(pPr) ? pPr : withBulletType(pPr, bulletChar);
  }
}

function withSize(el: string, fontSizePt: number | undefined): string {
  if (fontSizePt === undefined || !el) return el;
  const tag = startTag(el);
  return setAttr(tag, 'sz', String(Math.round(fontSizePt * 100))) + el.slice(tag.length);
}

function renamed(el: string, from: string, to: string): string {
  return el.replace(new RegExp(`^<${from}`), `<${to}`).replace(new RegExp(`</${from}>$`), `</${to}>`);
}

function paragraphXml(line: Line, templatePara: string, bulletChar: string, fontSizePt?: number): string {
  const pPr = applyBullet(firstElement(templatePara, 'a:pPr'), line.bullet, bulletChar);
  const endTemplate = firstElement(templatePara, 'a:endParaRPr');
  let rPr = firstElement(templatePara, 'a:rPr') ?? (endTemplate ? renamed(endTemplate, 'a:endParaRPr', 'a:rPr') : '');
  if (!rPr && fontSizePt !== undefined) rPr = '<a:rPr lang="en-US"/>';
  rPr = withSize(rPr, fontSizePt);
  const endParaRPr = withSize(endTemplate ?? (rPr ? renamed(rPr, 'a:rPr', 'a:endParaRPr') : ''), fontSizePt);

  const runs = line.text
    ? line.text
        .split('\n')
        .map((t) => `<a:r>${rPr}<a:t>${escapeXml(t)}</a:t></a:r>`)
        .join(rPr ? `<a:br>${rPr}</a:br>` : '<a:br/>')
    : '';
  return `<a:p>${pPr}${runs}${endParaRPr}</a:p>`;
}

/**
 * Shape XML with its text replaced by `block`. Shapes without a text frame
 * are returned unchanged.
 */
export function replaceShapeText(shapeXml: string, block: TextBlock): string {
  const txBody = firstElement(shapeXml, 'p:txBody');
  if (!txBody) return shapeXml;

  const bodyPr = firstElement(txBody, 'a:bodyPr') ?? '<a:bodyPr/>';
  const lstStyle = firstElement(txBody, 'a:lstStyle') ?? '';
  const templates = allElements(txBody, 'a:p');
  if (templates.length === 0) templates.push('<a:p/>');
  const bulletChar = /<a:buChar\b[^>]*?\/>/.exec(txBody)?.[0] ?? DEFAULT_BULLET;

  const lines = layout(block, templates.length);
  const paragraphs =
    lines.length > 0
      ? lines.map((l) => paragraphXml(l, templates[l.template], bulletChar, block.fontSizePt)).join('')
      : paragraphXml({ text: '', bullet: 'keep', template: 0 }, templates[0], bulletChar, block.fontSizePt);

  const rebuilt = `${startTag(txBody)}${bodyPr}${lstStyle}${paragraphs}</p:txBody>`;
  return shapeXml.replace(txBody, () => rebuilt);
}
