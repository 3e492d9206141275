import { escapeXml } from './xml.js';

// ─── Freshly built slides (summary, data notes) ─────────

export interface TextBox {
  /** EMU */
  x: number;
  y: number;
  cx: number;
  cy: number;
  text: string;
  sizePt: number;
  bold?: boolean;
  italic?: boolean;
  /** RRGGBB */
  color?: string;
}

const NS =
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" ' +
  'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships" ' +
  'xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"';

function textBoxXml(id: number, box: TextBox): string {
  const attrs = [
    'lang="en-US"',
    `sz="${Math.round(box.sizePt * 100)}"`,
    box.bold ? 'b="1"' : '',
    box.italic ? 'i="1"' : '',
    'dirty="0"',
  ]
    .filter(Boolean)
    .join(' ');
  const fill = box.color ? `<a:solidFill><a:srgbClr val="${box.color}"/></a:solidFill>` : '';
  const rPr = fill ? `<a:rPr ${attrs}>${fill}</a:rPr>` : `<a:rPr ${attrs}/>`;
  const run = box.text ? `<a:r>${rPr}<a:t>${escapeXml(box.text)}</a:t></a:r>` : '';

  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="TextBox ${id - 1}"/><p:cNvSpPr txBox="1"/><p:nvPr/></p:nvSpPr>` +
    `<p:spPr><a:xfrm><a:off x="${box.x}" y="${box.y}"/><a:ext cx="${box.cx}" cy="${box.cy}"/></a:xfrm>` +
    `<a:prstGeom prst="rect"><a:avLst/></a:prstGeom><a:noFill/></p:spPr>` +
    `<p:txBody><a:bodyPr wrap="square" rtlCol="0"><a:noAutofit/></a:bodyPr><a:lstStyle/>` +
    `<a:p>${run}<a:endParaRPr lang="en-US" sz="${Math.round(box.sizePt * 100)}" dirty="0"/></a:p></p:txBody></p:sp>`
  );
}

/** A slide holding only positioned text boxes (no placeholders). */
export function buildTextSlide(boxes: readonly TextBox[]): string {
  const shapes = boxes.map((b, i) => textBoxXml(i + 2, b)).join('');
  return (
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
    `<p:sld ${NS}><p:cSld><p:spTree><p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>` +
    `<p:grpSpPr><a:xfrm><a:off x="0" y="0"/><a:ext cx="0" cy="0"/><a:chOff x="0" y="0"/><a:chExt cx="0" cy="0"/></a:xfrm></p:grpSpPr>` +
    `${shapes}</p:spTree></p:cSld><p:clrMapOvr><a:masterClrMapping/></p:clrMapOvr></p:sld>`
  );
}
