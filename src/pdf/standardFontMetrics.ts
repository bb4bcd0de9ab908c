/**
 * Standard Font Metrics
 *
 * Glyph widths for the Standard 14 fonts via @pdf-lib/standard-fonts, used
 * wherever a font dictionary carries no /Widths of its own and to place
 * substrings inside a run.
 */

import { Encodings, Font, FontNames } from '@pdf-lib/standard-fonts';

export const DEFAULT_GLYPH_WIDTH = 500;

const fontObjectCache = new Map<FontNames, Font>();

function getFont(fontName: FontNames): Font {
  let cached = fontObjectCache.get(fontName);
  if (!cached) {
    cached = Font.load(fontName);
    fontObjectCache.set(fontName, cached);
  }
  return cached;
}

/**
 * Map any PDF font name to the closest Standard 14 font.
 * Handles subset prefixes (ABCDEF+FontName), common system fonts, and
 * bold/italic variants; anything unrecognized is Helvetica.
 */
export function mapToStandardFontName(pdfFontName: string): FontNames {
  const lower = pdfFontName.replace(/^[A-Z]{6}\+/, '').toLowerCase();

  const isBold = lower.includes('bold') || lower.includes('-bd') || lower.endsWith('bd');
  const isItalic = lower.includes('italic') || lower.includes('oblique') || lower.includes('-it');

  if (lower.includes('symbol')) return FontNames.Symbol;
  if (lower.includes('zapf') || lower.includes('dingbat')) return FontNames.ZapfDingbats;

  if (
    lower.includes('courier') || lower.includes('mono') ||
    lower.includes('consolas') || lower.includes('menlo') || lower.includes('monaco')
  ) {
    if (isBold && isItalic) return FontNames.CourierBoldOblique;
    if (isBold) return FontNames.CourierBold;
    if (isItalic) return FontNames.CourierOblique;
    return FontNames.Courier;
  }

  if (
    lower.includes('times') || lower.includes('georgia') ||
    lower.includes('garamond') || lower.includes('palatino') ||
    (lower.includes('serif') && !lower.includes('sans'))
  ) {
    if (isBold && isItalic) return FontNames.TimesRomanBoldItalic;
    if (isBold) return FontNames.TimesRomanBold;
    if (isItalic) return FontNames.TimesRomanItalic;
    return FontNames.TimesRoman;
  }

  if (isBold && isItalic) return FontNames.HelveticaBoldOblique;
  if (isBold) return FontNames.HelveticaBold;
  if (isItalic) return FontNames.HelveticaOblique;
  return FontNames.Helvetica;
}

/** Glyph name for a Unicode code point via WinAnsi encoding */
function glyphNameOf(codePoint: number): string | undefined {
  if (!Encodings.WinAnsi.canEncodeUnicodeCodePoint(codePoint)) return undefined;
  return Encodings.WinAnsi.encodeUnicodeCodePoint(codePoint).name;
}

function glyphWidth(font: Font, glyphName: string | undefined): number {
  if (!glyphName) return DEFAULT_GLYPH_WIDTH;
  return font.getWidthOfGlyph(glyphName) ?? DEFAULT_GLYPH_WIDTH;
}

/** Per-character widths in 1/1000 units */
export function getCharWidths(text: string, fontName: FontNames): number[] {
  const font = getFont(fontName);
  return Array.from(text, (ch) => glyphWidth(font, glyphNameOf(ch.codePointAt(0) ?? 0)));
}

export function measureTextWidth(text: string, fontName: FontNames, fontSize: number): number {
  const total = getCharWidths(text, fontName).reduce((sum, w) => sum + w, 0);
  return (total / 1000) * fontSize;
}

/**
 * Width of a single-byte character code in 1/1000 units. Codes in the
 * printable ASCII and Latin-1 ranges coincide with their WinAnsi code points.
 */
export function getCodeWidth(code: number, fontName: FontNames): number {
  const printable = (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff);
  if (!printable) return DEFAULT_GLYPH_WIDTH;
  return glyphWidth(getFont(fontName), glyphNameOf(code));
}
