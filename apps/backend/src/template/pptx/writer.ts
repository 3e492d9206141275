/**
 * Output deck assembly. Starts from a fresh copy of the template package,
 * removes every sample slide, then appends slides in the order given.
 */

import { posix } from 'node:path';
import JSZip from 'jszip';
import { TemplateLoadError } from '../../errors.js';
import {
  CONTENT_TYPES_PART,
  PRESENTATION_PART,
  PRESENTATION_RELS_PART,
  REL_TYPES,
  SLIDE_CONTENT_TYPE,
  readPart,
  relsPathFor,
  type PptxTemplate,
  type Relationship,
} from './package.js';
import { escapeXml } from './xml.js';

export interface OutgoingRel {
  type: string;
  /** Package path (internal) or URL (external) */
  target: string;
  external?: boolean;
  /** Keep the template's relationship id so r:id/r:embed references stay valid */
  id: string;
}

interface PendingSlide {
  xml: string;
  rels: OutgoingRel[];
}

const RELS_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';

function relsXml(partPath: string, rels: readonly OutgoingRel[]): string {
  const dir = posix.dirname(partPath);
  const body = rels
    .map((r) => {
      const target = r.external ? r.target : posix.relative(dir, r.target);
      const mode = r.external ? ' TargetMode="External"' : '';
      return `<Relationship Id="${escapeXml(r.id)}" Type="${escapeXml(r.type)}" Target="${escapeXml(target)}"${mode}/>`;
    })
    .join('');
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n<Relationships xmlns="${RELS_NS}">${body}</Relationships>`;
}

/** Relationships of a template slide to carry over to a clone (notes are dropped). */
export function cloneableRels(rels: readonly Relationship[]): OutgoingRel[] {
  return rels
    .filter((r) => r.type !== REL_TYPES.notesSlide)
    .map((r) => ({ id: r.id, type: r.type, target: r.resolved, external: r.external }));
}

export class DeckWriter {
  private readonly slides: PendingSlide[] = [];

  private constructor(
    private readonly zip: JSZip,
    private readonly source: string,
  ) {}

  static async open(template: PptxTemplate): Promise<DeckWriter> {
    const zip = await JSZip.loadAsync(template.bytes);
    return new DeckWriter(zip, template.source);
  }

  get slideCount(): number {
    return this.slides.length;
  }

  addSlide(xml: string, rels: OutgoingRel[]): void {
    this.slides.push({ xml, rels });
  }

  /** Remove sample slides and their notes, plus every reference to them. */
  private async cleanExistingSlides(): Promise<{ presRels: string; contentTypes: string }> {
    const presRels = await readPart(this.zip, PRESENTATION_RELS_PART);
    const contentTypes = await readPart(this.zip, CONTENT_TYPES_PART);
    if (presRels === undefined || contentTypes === undefined) {
      throw new TemplateLoadError(this.source, 'package relationships or content types are missing');
    }

    const doomed = Object.keys(this.zip.files).filter((f) =>
      /^ppt\/(slides\/slide|notesSlides\/notesSlide)\d+\.xml$/.test(f),
    );
    for (const f of doomed) {
      this.zip.remove(f);
      const rels = relsPathFor(f);
      if (this.zip.file(rels)) this.zip.remove(rels);
    }

    return {
      presRels: presRels.replace(/<Relationship\b[^>]*\bType="[^"]*\/relationships\/slide"[^>]*\/>/g, ''),
      contentTypes: contentTypes.replace(
        /<Override\b[^>]*\bPartName="\/ppt\/(?:slides\/slide|notesSlides\/notesSlide)\d+\.xml"[^>]*\/>/g,
        '',
      ),
    };
  }

  /** Write the package. Call once: it consumes the pending slides. */
  async toBuffer(): Promise<Buffer> {
    const presXml = await readPart(this.zip, PRESENTATION_PART);
    if (presXml === undefined) throw new TemplateLoadError(this.source, `missing part ${PRESENTATION_PART}`);
    const { presRels, contentTypes } = await this.cleanExistingSlides();

    let nextRId = 1 + Math.max(0, ...[...presRels.matchAll(/Id="rId(\d+)"/g)].map((m) => Number(m[1])));
    const entries = this.slides.map((slide, i) => {
      const path = `ppt/slides/slide${i + 1}.xml`;
      this.zip.file(path, slide.xml);
      this.zip.file(relsPathFor(path), relsXml(path, slide.rels));
      return { path, rId: `rId${nextRId++}`, sldId: 256 + i };
    });

    const sldIdLst = `<p:sldIdLst>${entries.map((e) => `<p:sldId id="${e.sldId}" r:id="${e.rId}"/>`).join('')}</p:sldIdLst>`;
    let newPres: string;
    if (/<p:sldIdLst\s*\/>/.test(presXml)) {
      newPres = presXml.replace(/<p:sldIdLst\s*\/>/, sldIdLst);
    } else if (presXml.includes('<p:sldIdLst>')) {
      newPres = presXml.replace(/<p:sldIdLst>[\s\S]*?<\/p:sldIdLst>/, sldIdLst);
    } else {
      // sldIdLst follows the master id lists
      const anchors = ['</p:sldMasterIdLst>', '</p:notesMasterIdLst>', '</p:handoutMasterIdLst>']
        .map((tag) => ({ tag, at: presXml.indexOf(tag) }))
        .filter((a) => a.at !== -1)
        .sort((a, b) => b.at - a.at);
      const last = anchors[0];
      if (!last) throw new TemplateLoadError(this.source, 'presentation.xml has no slide master list');
      const cut = last.at + last.tag.length;
      newPres = presXml.slice(0, cut) + sldIdLst + presXml.slice(cut);
    }
    this.zip.file(PRESENTATION_PART, newPres);

    const slideRels = entries
      .map(
        (e) =>
          `<Relationship Id="${e.rId}" Type="${REL_TYPES.slide}" Target="${posix.relative('ppt', e.path)}"/>`,
      )
      .join('');
    this.zip.file(PRESENTATION_RELS_PART, presRels.replace('</Relationships>', `${slideRels}</Relationships>`));

    const overrides = entries
      .map((e) => `<Override PartName="/${e.path}" ContentType="${SLIDE_CONTENT_TYPE}"/>`)
      .join('');
    this.zip.file(CONTENT_TYPES_PART, contentTypes.replace('</Types>', `${overrides}</Types>`));

    console.log(`[deck] assembled ${entries.length} slide(s)`);
    return this.zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }
}
