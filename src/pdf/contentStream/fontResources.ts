import { PDFArray, PDFDict, PDFName, PDFNumber, type PDFPage } from 'pdf-lib';
import { DEFAULT_GLYPH_WIDTH, getCodeWidth, mapToStandardFontName } from '../standardFontMetrics';
import type { FontMetrics } from './types';

/**
 * Font widths for the fonts a page's content stream selects with Tf,
 * keyed by resource name (e.g. "F1").
 */

function numberAt(array: PDFArray, index: number): number | undefined {
  const value = array.lookup(index);
  return value instanceof PDFNumber ? value.asNumber() : undefined;
}

function nameOf(dict: PDFDict, key: string): string | undefined {
  const value = dict.lookup(PDFName.of(key));
  return value instanceof PDFName ? value.decodeText() : undefined;
}

function simpleFontMetrics(fontDict: PDFDict): FontMetrics {
  const baseFont = nameOf(fontDict, 'BaseFont') ?? 'Helvetica';
  const standard = mapToStandardFontName(baseFont);
  const widths = fontDict.lookup(PDFName.of('Widths'));
  const firstCharObj = fontDict.lookup(PDFName.of('FirstChar'));
  const firstChar = firstCharObj instanceof PDFNumber ? firstCharObj.asNumber() : 0;

  if (widths instanceof PDFArray) {
    const table = new Map<number, number>();
    for (let i = 0; i < widths.size(); i++) {
      const w = numberAt(widths, i);
      if (w !== undefined) table.set(firstChar + i, w);
    }
    return {
      twoByte: false,
      widthOf: (code) => table.get(code) ?? getCodeWidth(code, standard),
    };
  }
  return { twoByte: false, widthOf: (code) => getCodeWidth(code, standard) };
}

/** /W array: `c [w1 w2 ...]` or `cFirst cLast w` */
function parseCidWidths(w: PDFArray): Map<number, number> {
  const table = new Map<number, number>();
  let i = 0;
  while (i < w.size()) {
    const first = numberAt(w, i);
    const next = w.lookup(i + 1);
    if (first === undefined) break;

    if (next instanceof PDFArray) {
      for (let j = 0; j < next.size(); j++) {
        const width = numberAt(next, j);
        if (width !== undefined) table.set(first + j, width);
      }
      i += 2;
    } else {
      const last = numberAt(w, i + 1);
      const width = numberAt(w, i + 2);
      if (last === undefined || width === undefined) break;
      for (let cid = first; cid <= last; cid++) table.set(cid, width);
      i += 3;
    }
  }
  return table;
}

function type0FontMetrics(fontDict: PDFDict): FontMetrics {
  const descendants = fontDict.lookup(PDFName.of('DescendantFonts'));
  const descendant = descendants instanceof PDFArray ? descendants.lookup(0) : undefined;
  if (!(descendant instanceof PDFDict)) {
    return { twoByte: true, widthOf: () => 1000 };
  }

  const dwObj = descendant.lookup(PDFName.of('DW'));
  const defaultWidth = dwObj instanceof PDFNumber ? dwObj.asNumber() : 1000;
  const w = descendant.lookup(PDFName.of('W'));
  const table = w instanceof PDFArray ? parseCidWidths(w) : new Map<number, number>();
  // Identity encodings: code == CID
  return { twoByte: true, widthOf: (code) => table.get(code) ?? defaultWidth };
}

export function fontMetricsFor(fontDict: PDFDict): FontMetrics {
  return nameOf(fontDict, 'Subtype') === 'Type0'
    ? type0FontMetrics(fontDict)
    : simpleFontMetrics(fontDict);
}

export const FALLBACK_METRICS: FontMetrics = {
  twoByte: false,
  widthOf: () => DEFAULT_GLYPH_WIDTH,
};

export function loadPageFonts(page: PDFPage): Map<string, FontMetrics> {
  const fonts = new Map<string, FontMetrics>();
  const resources = page.node.Resources();
  const fontDict = resources?.lookup(PDFName.of('Font'));
  if (!(fontDict instanceof PDFDict)) return fonts;

  for (const [name, ref] of fontDict.entries()) {
    const dict = page.doc.context.lookup(ref);
    if (dict instanceof PDFDict) {
      fonts.set(name.decodeText(), fontMetricsFor(dict));
    }
  }
  return fonts;
}
