import { encodeFieldKey } from './fieldKey';
import type {
  ColorEncoding,
  DocumentEngine,
  DocumentHandle,
  ExtractOptions,
  RgbColor,
  TextRun,
} from '../types';

/** Components above 1 are in 0-255 range */
function normalizeComponent(v: number): number {
  return v > 1 ? v / 255 : v;
}

export function normalizeColor(encoding: ColorEncoding): RgbColor {
  if (typeof encoding === 'number') {
    return {
      r: ((encoding >> 16) & 0xff) / 255,
      g: ((encoding >> 8) & 0xff) / 255,
      b: (encoding & 0xff) / 255,
    };
  }
  return {
    r: normalizeComponent(encoding.r),
    g: normalizeComponent(encoding.g),
    b: normalizeComponent(encoding.b),
  };
}

/** Loose "marked in red" check, not a hue match. */
export function isRedColor({ r, g, b }: RgbColor): boolean {
  return r > 0.5 && g < 0.3 && b < 0.3;
}

/**
 * Orders by page, then visual line (rounded top edge absorbs sub-pixel
 * jitter), then left-to-right.
 */
export function compareRunsByPosition(a: TextRun, b: TextRun): number {
  return (
    a.page - b.page ||
    Math.round(a.boundingBox.y1) - Math.round(b.boundingBox.y1) ||
    a.boundingBox.x1 - b.boundingBox.x1
  );
}

/** Extract every non-empty run of every page, in document order. */
export async function extractRuns<H extends DocumentHandle>(
  engine: DocumentEngine<H>,
  handle: H,
  options: ExtractOptions = {},
): Promise<TextRun[]> {
  const runs: TextRun[] = [];
  const pageCount = engine.getPageCount(handle);

  for (let page = 0; page < pageCount; page++) {
    runs.push(...(await extractPageRuns(engine, handle, page, options)));
  }

  if (options.sortByPosition) {
    // Array.prototype.sort is stable, so equal positions keep document order
    runs.sort(compareRunsByPosition);
  }
  return runs;
}

export async function extractPageRuns<H extends DocumentHandle>(
  engine: DocumentEngine<H>,
  handle: H,
  page: number,
  options: Pick<ExtractOptions, 'colorFilter'> = {},
): Promise<TextRun[]> {
  const runs: TextRun[] = [];

  for (const raw of await engine.getTextRuns(handle, page)) {
    const text = raw.text.trim();
    if (!text) continue;

    const color = normalizeColor(raw.colorEncoding);
    if (options.colorFilter === 'red' && !isRedColor(color)) continue;

    const { x1, y1, x2, y2 } = raw.boundingBox;
    runs.push({
      key: encodeFieldKey(page, x1, y1, x2, y2, text),
      page,
      boundingBox: { ...raw.boundingBox },
      text,
      fontFamily: raw.fontFamily,
      fontSize: raw.fontSize,
      color,
    });
  }

  return runs;
}

export function uniqueTexts(runs: readonly TextRun[]): string[] {
  return [...new Set(runs.map((r) => r.text))].sort();
}
