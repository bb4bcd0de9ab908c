/**
 * PDF Document Engine
 *
 * DocumentEngine over two libraries: pdfjs-dist reads (text items, fonts,
 * fill colors from the operator list) and pdf-lib writes (content stream
 * rewriting for redaction, drawText for insertion, save). The pdfjs view
 * is rebuilt from pdf-lib's bytes whenever the document has been edited.
 */

import { promises as fs } from 'fs';
import { PDFDocument, StandardFontEmbedder, rgb, type PDFFont, type PDFPage } from 'pdf-lib';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { FontNames } from '@pdf-lib/standard-fonts';
import { PDFJS_DOCUMENT_OPTIONS } from './pdfjsConfig';
import { buildTextColorMap, matchTextColor } from './textColorExtractor';
import { getCharWidths, mapToStandardFontName } from './standardFontMetrics';
import { loadPageFonts } from './contentStream/fontResources';
import { readPageContent, replacePageContent } from './contentStream/pageContent';
import { redactText, type UserRect } from './contentStream/TextRedactor';
import { getLogger } from '../utils/logger';
import { describeError } from '../errors';
import type {
  BoundingBox,
  DocumentEngine,
  DocumentHandle,
  Position,
  RawTextRun,
  RgbColor,
} from '../types';

type PdfjsDocument = Awaited<ReturnType<typeof getDocument>['promise']>;
type PdfjsPage = Awaited<ReturnType<PdfjsDocument['getPage']>>;
type PdfjsTextContent = Awaited<ReturnType<PdfjsPage['getTextContent']>>;

/** Ascent and descent of a run's box as fractions of its font size */
export const ASCENT_RATIO = 0.8;
export const DESCENT_RATIO = 0.2;
const FALLBACK_FAMILY = 'Helvetica';

const log = getLogger('pdfEngine');

/** drawText's own line handling: tabs widen to spaces, line breaks split lines */
function drawnLines(text: string): string[] {
  return text
    .replace(/\t|\u0085|\u2028|\u2029/g, '    ')
    .replace(/[\b\v]/g, '')
    .split(/[\n\f\r\u000B]/);
}

async function loadReader(bytes: Uint8Array): Promise<PdfjsDocument> {
  return getDocument({ ...PDFJS_DOCUMENT_OPTIONS, data: bytes.slice() }).promise;
}

export class PdfHandle implements DocumentHandle {
  private reader: PdfjsDocument | null;
  private stale = false;
  readonly fonts = new Map<FontNames, PDFFont>();

  constructor(
    readonly path: string,
    readonly doc: PDFDocument,
    reader: PdfjsDocument,
  ) {
    this.reader = reader;
  }

  /** The pdf-lib side changed; the pdfjs view must be rebuilt before reading */
  markEdited(): void {
    this.stale = true;
  }

  async readerPage(page: number): Promise<PdfjsPage> {
    let reader = this.reader;
    if (this.stale || reader === null) {
      this.reader = null;
      await reader?.destroy();
      reader = await loadReader(await this.doc.save());
      this.reader = reader;
      this.stale = false;
      log.debug('Reloaded reader after edit', { path: this.path });
    }
    return reader.getPage(page + 1);
  }

  async embedFont(name: FontNames): Promise<PDFFont> {
    let font = this.fonts.get(name);
    if (!font) {
      font = await this.doc.embedFont(name);
      this.fonts.set(name, font);
    }
    return font;
  }

  async close(): Promise<void> {
    const reader = this.reader;
    this.reader = null;
    await reader?.destroy();
  }
}

function resolveFontFamily(page: PdfjsPage, fontName: string, content: PdfjsTextContent): string {
  if (page.commonObjs.has(fontName)) {
    const font: unknown = page.commonObjs.get(fontName);
    if (typeof font === 'object' && font !== null && 'name' in font && typeof font.name === 'string' && font.name) {
      return font.name.replace(/^[A-Z]{6}\+/, '');
    }
  }
  return content.styles[fontName]?.fontFamily ?? FALLBACK_FAMILY;
}

function pageTop(page: PDFPage): number {
  const box = page.getCropBox();
  return box.y + box.height;
}

function toRgb(color: RgbColor) {
  const clamp = (v: number) => Math.min(1, Math.max(0, v));
  return rgb(clamp(color.r), clamp(color.g), clamp(color.b));
}

function sumWidths(text: string, font: FontNames): number {
  return getCharWidths(text, font).reduce((sum, w) => sum + w, 0);
}

export class PdfDocumentEngine implements DocumentEngine<PdfHandle> {
  async openDocument(path: string): Promise<PdfHandle> {
    const bytes = new Uint8Array(await fs.readFile(path));
    const doc = await PDFDocument.load(bytes);
    const reader = await loadReader(bytes);
    log.debug('Opened document', { path, pages: doc.getPageCount() });
    return new PdfHandle(path, doc, reader);
  }

  async closeDocument(handle: PdfHandle): Promise<void> {
    await handle.close();
  }

  getPageCount(handle: PdfHandle): number {
    return handle.doc.getPageCount();
  }

  private pdfPage(handle: PdfHandle, page: number): PDFPage {
    if (!Number.isInteger(page) || page < 0 || page >= handle.doc.getPageCount()) {
      throw new RangeError(`Page ${page} out of range (document has ${handle.doc.getPageCount()} pages)`);
    }
    return handle.doc.getPage(page);
  }

  private async readItems(handle: PdfHandle, page: number) {
    this.pdfPage(handle, page);
    const readerPage = await handle.readerPage(page);
    // Operator list first: it also resolves the page's fonts into commonObjs
    const colorMap = buildTextColorMap(await readerPage.getOperatorList());
    const content = await readerPage.getTextContent();
    const top = readerPage.view[3];

    // Marked-content entries carry no `str`
    const textItems = content.items.flatMap((item) => ('str' in item && item.str.trim() !== '' ? [item] : []));

    return textItems.map((item) => {
      const [a, b, , , x, baseline] = item.transform.map(Number);
      const fontSize = Math.hypot(a, b);
      const baselineTop = top - baseline;
      const fontFamily = resolveFontFamily(readerPage, item.fontName, content);
      return {
        item,
        fontFamily,
        fontSize,
        color: matchTextColor(x, baseline, fontSize, colorMap),
        boundingBox: {
          x1: x,
          y1: baselineTop - fontSize * ASCENT_RATIO,
          x2: x + item.width,
          y2: baselineTop + fontSize * DESCENT_RATIO,
        },
      };
    });
  }

  async getTextRuns(handle: PdfHandle, page: number): Promise<RawTextRun[]> {
    const items = await this.readItems(handle, page);
    return items.map(({ item, fontFamily, fontSize, color, boundingBox }) => ({
      text: item.str,
      boundingBox,
      fontFamily,
      fontSize,
      colorEncoding: color,
    }));
  }

  /**
   * Every place `literalText` appears inside a text item. Sub-item boxes
   * are placed proportionally to the standard-font widths of the item's
   * characters, scaled to the item's measured width.
   */
  async findTextOccurrences(handle: PdfHandle, page: number, literalText: string): Promise<BoundingBox[]> {
    if (!literalText) return [];
    const boxes: BoundingBox[] = [];

    for (const { item, fontFamily, boundingBox } of await this.readItems(handle, page)) {
      const font = mapToStandardFontName(fontFamily);
      const total = sumWidths(item.str, font);
      const scale = total > 0 ? item.width / total : 0;

      let index = item.str.indexOf(literalText);
      while (index !== -1) {
        const start = sumWidths(item.str.slice(0, index), font) * scale;
        const end = sumWidths(item.str.slice(0, index + literalText.length), font) * scale;
        boxes.push({ ...boundingBox, x1: boundingBox.x1 + start, x2: boundingBox.x1 + end });
        index = item.str.indexOf(literalText, index + 1);
      }
    }
    return boxes;
  }

  async redactRegion(
    handle: PdfHandle,
    page: number,
    boundingBox: BoundingBox,
    preserveNonTextGraphics: boolean,
  ): Promise<number> {
    const pdfPage = this.pdfPage(handle, page);
    const top = pageTop(pdfPage);
    const rect: UserRect = {
      xMin: Math.min(boundingBox.x1, boundingBox.x2),
      xMax: Math.max(boundingBox.x1, boundingBox.x2),
      yMin: top - Math.max(boundingBox.y1, boundingBox.y2),
      yMax: top - Math.min(boundingBox.y1, boundingBox.y2),
    };

    const result = redactText(readPageContent(pdfPage), loadPageFonts(pdfPage), rect, {
      coverGraphics: !preserveNonTextGraphics,
    });
    if (result.unmeasuredFonts.length > 0) {
      log.warn('No width table for fonts, using default glyph width', { page, fonts: result.unmeasuredFonts });
    }
    if (result.removed > 0) {
      replacePageContent(pdfPage, result.content);
      handle.markEdited();
    }
    log.debug('Redacted region', { page, rect, removed: result.removed });
    return result.removed;
  }

  async canInsert(_handle: PdfHandle, text: string, fontFamily: string): Promise<boolean> {
    // Detached from the document, so nothing gets embedded
    const embedder = StandardFontEmbedder.for(mapToStandardFontName(fontFamily));
    try {
      for (const line of drawnLines(text)) embedder.encodeText(line);
      return true;
    } catch (error) {
      log.debug('Text not encodable', { fontFamily, error: describeError(error) });
      return false;
    }
  }

  async insertStyledText(
    handle: PdfHandle,
    page: number,
    boundingBox: BoundingBox,
    text: string,
    fontSize: number,
    color: RgbColor,
    fontFamily: string,
  ): Promise<void> {
    const baseline = boundingBox.y1 + (boundingBox.y2 - boundingBox.y1) * ASCENT_RATIO;
    await this.draw(handle, page, { x: boundingBox.x1, y: baseline }, text, fontSize, fontFamily, color);
  }

  async insertPlainText(
    handle: PdfHandle,
    page: number,
    position: Position,
    text: string,
    fontSize: number,
    fontName: string,
    color: RgbColor,
  ): Promise<void> {
    await this.draw(handle, page, position, text, fontSize, fontName, color);
  }

  /** Draw with the baseline at `position` (top-left origin) */
  private async draw(
    handle: PdfHandle,
    page: number,
    position: Position,
    text: string,
    fontSize: number,
    fontName: string,
    color: RgbColor,
  ): Promise<void> {
    if (!Number.isFinite(fontSize) || fontSize <= 0) {
      throw new RangeError(`Invalid font size: ${fontSize}`);
    }
    const pdfPage = this.pdfPage(handle, page);
    const font = await handle.embedFont(mapToStandardFontName(fontName));

    // Throws before drawing when the font's encoding cannot represent a character
    pdfPage.drawText(text, {
      x: position.x,
      y: pageTop(pdfPage) - position.y,
      size: fontSize,
      font,
      color: toRgb(color),
    });
    handle.markEdited();
  }

  async saveDocument(handle: PdfHandle, path: string): Promise<void> {
    await fs.writeFile(path, await handle.doc.save());
  }
}
