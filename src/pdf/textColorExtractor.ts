/**
 * Text Color Extractor
 *
 * Scans a pdfjs operator list for fill color changes and text showing
 * operations, tracking the graphics state stack and text position, and
 * records the fill color in effect where each piece of text starts.
 * Text items from getTextContent() are then matched to the nearest entry.
 */

import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { IDENTITY, applyMatrix, multiplyMatrices, type Matrix } from './contentStream/types';
import type { RgbColor } from '../types';

export interface TextColorEntry {
  /** User space, origin bottom-left */
  x: number;
  y: number;
  color: RgbColor;
}

export interface OperatorListLike {
  fnArray: number[];
  argsArray: unknown[];
}

interface TextState {
  fontSize: number;
  charSpacing: number;
  wordSpacing: number;
  hScale: number;
  leading: number;
}

interface State {
  ctm: Matrix;
  fill: RgbColor;
  text: TextState;
}

const BLACK: RgbColor = { r: 0, g: 0, b: 0 };

/** Normalize a color component from pdfjs; values > 1 are 0-255 range */
function normalizeComponent(v: number): number {
  return v > 1 ? v / 255 : v;
}

function cmykToRgb(c: number, m: number, y: number, k: number): RgbColor {
  return {
    r: (1 - c) * (1 - k),
    g: (1 - m) * (1 - k),
    b: (1 - y) * (1 - k),
  };
}

function numbersOf(args: unknown): number[] {
  if (args instanceof Uint8ClampedArray || args instanceof Float32Array) {
    return Array.from(args);
  }
  if (!Array.isArray(args)) return [];
  return args.filter((v): v is number => typeof v === 'number');
}

/** pdfjs passes fill colors either as components or as a "#rrggbb" string */
export function parseFillColor(args: unknown): RgbColor | null {
  if (Array.isArray(args) && typeof args[0] === 'string') {
    const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(args[0]);
    if (!match) return null;
    return {
      r: parseInt(match[1], 16) / 255,
      g: parseInt(match[2], 16) / 255,
      b: parseInt(match[3], 16) / 255,
    };
  }
  const nums = numbersOf(args);
  if (nums.length === 1) {
    const g = normalizeComponent(nums[0]);
    return { r: g, g, b: g };
  }
  if (nums.length === 3) {
    return { r: normalizeComponent(nums[0]), g: normalizeComponent(nums[1]), b: normalizeComponent(nums[2]) };
  }
  if (nums.length === 4) {
    return cmykToRgb(nums[0], nums[1], nums[2], nums[3]);
  }
  return null;
}

function hasGlyphs(glyphs: unknown): boolean {
  return Array.isArray(glyphs) && glyphs.some((g) => typeof g === 'object' && g !== null);
}

/** Horizontal advance of a pdfjs glyph array in text space */
function glyphAdvance(glyphs: unknown, text: TextState): number {
  if (!Array.isArray(glyphs)) return 0;
  const scale = text.hScale;
  let tx = 0;
  for (const glyph of glyphs) {
    if (typeof glyph === 'number') {
      tx -= (glyph / 1000) * text.fontSize * scale;
    } else if (typeof glyph === 'object' && glyph !== null && 'width' in glyph && typeof glyph.width === 'number') {
      const isSpace = 'isSpace' in glyph && glyph.isSpace === true;
      tx += ((glyph.width / 1000) * text.fontSize + text.charSpacing + (isSpace ? text.wordSpacing : 0)) * scale;
    }
  }
  return tx;
}

/**
 * Build a text color map from a pdfjs operator list.
 */
export function buildTextColorMap(operatorList: OperatorListLike): TextColorEntry[] {
  const { fnArray, argsArray } = operatorList;
  const entries: TextColorEntry[] = [];

  const stack: State[] = [];
  let state: State = {
    ctm: { ...IDENTITY },
    fill: { ...BLACK },
    text: { fontSize: 0, charSpacing: 0, wordSpacing: 0, hScale: 1, leading: 0 },
  };
  let tm: Matrix = { ...IDENTITY };
  let tlm: Matrix = { ...IDENTITY };

  const moveLine = (tx: number, ty: number) => {
    tlm = multiplyMatrices({ a: 1, b: 0, c: 0, d: 1, e: tx, f: ty }, tlm);
    tm = { ...tlm };
  };

  for (let i = 0; i < fnArray.length; i++) {
    const op = fnArray[i];
    const args = argsArray[i];
    const nums = numbersOf(args);

    switch (op) {
      case OPS.save:
        stack.push({ ctm: { ...state.ctm }, fill: { ...state.fill }, text: { ...state.text } });
        break;
      case OPS.restore:
        state = stack.pop() ?? state;
        break;
      case OPS.transform:
        if (nums.length === 6) {
          const [a, b, c, d, e, f] = nums;
          state.ctm = multiplyMatrices({ a, b, c, d, e, f }, state.ctm);
        }
        break;
      case OPS.setFillRGBColor:
      case OPS.setFillGray:
      case OPS.setFillCMYKColor: {
        const color = parseFillColor(args);
        if (color) state.fill = color;
        break;
      }
      case OPS.beginText:
        tm = { ...IDENTITY };
        tlm = { ...IDENTITY };
        break;
      case OPS.setFont:
        if (Array.isArray(args) && typeof args[1] === 'number') state.text.fontSize = args[1];
        break;
      case OPS.setCharSpacing:
        state.text.charSpacing = nums[0] ?? 0;
        break;
      case OPS.setWordSpacing:
        state.text.wordSpacing = nums[0] ?? 0;
        break;
      case OPS.setHScale:
        state.text.hScale = (nums[0] ?? 100) / 100;
        break;
      case OPS.setLeading:
        state.text.leading = nums[0] ?? 0;
        break;
      case OPS.setTextMatrix:
        if (nums.length === 6) {
          const [a, b, c, d, e, f] = nums;
          tlm = { a, b, c, d, e, f };
          tm = { ...tlm };
        }
        break;
      case OPS.moveText:
        moveLine(nums[0] ?? 0, nums[1] ?? 0);
        break;
      case OPS.setLeadingMoveText:
        state.text.leading = -(nums[1] ?? 0);
        moveLine(nums[0] ?? 0, nums[1] ?? 0);
        break;
      case OPS.nextLine:
        moveLine(0, -state.text.leading);
        break;
      case OPS.nextLineShowText:
      case OPS.nextLineSetSpacingShowText:
      case OPS.showText:
      case OPS.showSpacedText: {
        if (op === OPS.nextLineShowText || op === OPS.nextLineSetSpacingShowText) {
          moveLine(0, -state.text.leading);
        }
        const glyphs = Array.isArray(args) ? args[args.length - 1] : undefined;
        // A redacted run leaves a show op of pure offsets; it paints nothing
        if (hasGlyphs(glyphs)) {
          const origin = applyMatrix(multiplyMatrices(tm, state.ctm), 0, 0);
          entries.push({ x: origin.x, y: origin.y, color: { ...state.fill } });
        }
        const tx = glyphAdvance(glyphs, state.text);
        tm = multiplyMatrices({ a: 1, b: 0, c: 0, d: 1, e: tx, f: 0 }, tm);
        break;
      }
    }
  }

  return entries;
}

/**
 * Match a text item to the closest color entry, within twice the font
 * size. Unmatched items are black.
 */
export function matchTextColor(
  x: number,
  y: number,
  fontSize: number,
  colorMap: readonly TextColorEntry[],
): RgbColor {
  const tolerance = Math.max(fontSize, 1) * 2;
  let bestDist = Infinity;
  let bestColor = BLACK;

  for (const entry of colorMap) {
    const dist = Math.hypot(x - entry.x, y - entry.y);
    if (dist < bestDist && dist <= tolerance) {
      bestDist = dist;
      bestColor = entry.color;
    }
  }
  return { ...bestColor };
}
