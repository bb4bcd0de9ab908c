/**
 * Text Redactor
 *
 * Walks a page content stream the way a renderer would (graphics state,
 * text state, text and line matrices) and drops every glyph whose advance
 * midpoint falls inside a rectangle given in user space. A show operator
 * that loses glyphs is rewritten as a TJ array where each removed glyph
 * becomes a positioning number of the same advance, so surrounding text
 * keeps its place.
 */

import { formatNumber, parseContentStream, toHexString } from './ContentStreamParser';
import { FALLBACK_METRICS } from './fontResources';
import { latin1Bytes } from './pageContent';
import {
  IDENTITY,
  applyMatrix,
  multiplyMatrices,
  type FontMetrics,
  type Matrix,
  type PDFOperator,
  type PDFValue,
  type TextState,
} from './types';

/** Rectangle in PDF user space (origin bottom-left) */
export interface UserRect {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
}

export interface RedactOptions {
  /** Also paint the rectangle white, covering vector graphics and images */
  coverGraphics?: boolean;
}

export interface RedactionResult {
  content: Uint8Array;
  removed: number;
  /** Tf resource names with no metrics; their glyphs were walked at the default width */
  unmeasuredFonts: string[];
}

interface GraphicsState {
  ctm: Matrix;
  text: TextState;
}

interface Splice {
  start: number;
  end: number;
  replacement: string;
}

type TJElement = { kind: 'bytes'; value: string } | { kind: 'shift'; value: number };

const EPSILON = 1e-6;

function translation(tx: number, ty: number): Matrix {
  return { a: 1, b: 0, c: 0, d: 1, e: tx, f: ty };
}

function num(operands: PDFValue[], index: number, fallback = 0): number {
  const value = operands[index];
  return value?.type === 'number' ? value.value : fallback;
}

export class TextRedactor {
  private stack: GraphicsState[] = [];
  private state: GraphicsState = TextRedactor.initialState();
  private tm: Matrix = { ...IDENTITY };
  private tlm: Matrix = { ...IDENTITY };
  private removed = 0;
  private readonly unmeasured = new Set<string>();

  constructor(
    private readonly fonts: ReadonlyMap<string, FontMetrics>,
    private readonly rect: UserRect,
  ) {}

  private static initialState(): GraphicsState {
    return {
      ctm: { ...IDENTITY },
      text: {
        charSpacing: 0,
        wordSpacing: 0,
        horizontalScale: 100,
        leading: 0,
        fontName: '',
        fontSize: 0,
        rise: 0,
      },
    };
  }

  redact(content: Uint8Array, options: RedactOptions = {}): RedactionResult {
    const splices: Splice[] = [];
    for (const op of parseContentStream(content)) {
      const replacement = this.execute(op);
      if (replacement !== null) {
        splices.push({ start: op.startOffset, end: op.endOffset, replacement });
      }
    }

    const unmeasuredFonts = [...this.unmeasured];
    if (this.removed === 0) {
      return { content, removed: 0, unmeasuredFonts };
    }
    const rewritten = applySplices(content, splices);
    return {
      content: options.coverGraphics ? this.withCover(rewritten) : rewritten,
      removed: this.removed,
      unmeasuredFonts,
    };
  }

  /** Returns replacement source for the operator, or null to keep it. */
  private execute(op: PDFOperator): string | null {
    const { operands } = op;
    const text = this.state.text;

    switch (op.operator) {
      case 'q':
        this.stack.push({ ctm: { ...this.state.ctm }, text: { ...text } });
        return null;
      case 'Q':
        this.state = this.stack.pop() ?? this.state;
        return null;
      case 'cm': {
        const m: Matrix = {
          a: num(operands, 0, 1), b: num(operands, 1), c: num(operands, 2),
          d: num(operands, 3, 1), e: num(operands, 4), f: num(operands, 5),
        };
        this.state.ctm = multiplyMatrices(m, this.state.ctm);
        return null;
      }

      case 'BT':
        this.tm = { ...IDENTITY };
        this.tlm = { ...IDENTITY };
        return null;

      case 'Tc': text.charSpacing = num(operands, 0); return null;
      case 'Tw': text.wordSpacing = num(operands, 0); return null;
      case 'Tz': text.horizontalScale = num(operands, 0, 100); return null;
      case 'TL': text.leading = num(operands, 0); return null;
      case 'Ts': text.rise = num(operands, 0); return null;
      case 'Tf': {
        const font = operands[0];
        text.fontName = font?.type === 'name' ? font.value : '';
        text.fontSize = num(operands, 1);
        return null;
      }

      case 'Td':
        this.moveLine(num(operands, 0), num(operands, 1));
        return null;
      case 'TD':
        text.leading = -num(operands, 1);
        this.moveLine(num(operands, 0), num(operands, 1));
        return null;
      case 'Tm':
        this.tlm = {
          a: num(operands, 0, 1), b: num(operands, 1), c: num(operands, 2),
          d: num(operands, 3, 1), e: num(operands, 4), f: num(operands, 5),
        };
        this.tm = { ...this.tlm };
        return null;
      case 'T*':
        this.moveLine(0, -text.leading);
        return null;

      case 'Tj': {
        const rewritten = this.showElements(operands.slice(0, 1));
        return rewritten === null ? null : `${rewritten} TJ`;
      }
      case "'": {
        this.moveLine(0, -text.leading);
        const rewritten = this.showElements(operands.slice(0, 1));
        return rewritten === null ? null : `T* ${rewritten} TJ`;
      }
      case '"': {
        const aw = num(operands, 0);
        const ac = num(operands, 1);
        text.wordSpacing = aw;
        text.charSpacing = ac;
        this.moveLine(0, -text.leading);
        const rewritten = this.showElements(operands.slice(2, 3));
        return rewritten === null
          ? null
          : `${formatNumber(aw)} Tw ${formatNumber(ac)} Tc T* ${rewritten} TJ`;
      }
      case 'TJ': {
        const array = operands[0];
        if (array?.type !== 'array') return null;
        const rewritten = this.showElements(array.value);
        return rewritten === null ? null : `${rewritten} TJ`;
      }

      default:
        return null;
    }
  }

  private moveLine(tx: number, ty: number): void {
    this.tlm = multiplyMatrices(translation(tx, ty), this.tlm);
    this.tm = { ...this.tlm };
  }

  private advance(tx: number): void {
    this.tm = multiplyMatrices(translation(tx, 0), this.tm);
  }

  /**
   * Show strings and positioning numbers, advancing the text matrix.
   * Returns a TJ array source when any glyph was dropped, otherwise null.
   */
  private showElements(elements: PDFValue[]): string | null {
    const text = this.state.text;
    let font = this.fonts.get(text.fontName);
    if (!font) {
      this.unmeasured.add(text.fontName);
      font = FALLBACK_METRICS;
    }
    const fontSize = text.fontSize;
    const scale = text.horizontalScale / 100;
    const out: TJElement[] = [];
    let dropped = false;

    for (const element of elements) {
      if (element.type === 'number') {
        this.advance(-(element.value / 1000) * fontSize * scale);
        out.push({ kind: 'shift', value: element.value });
        continue;
      }
      if (element.type !== 'string') continue;

      let kept = '';
      for (const glyph of glyphsOf(element.value, font)) {
        const w0 = font.widthOf(glyph.code) / 1000;
        const spacing = text.charSpacing + (!font.twoByte && glyph.code === 32 ? text.wordSpacing : 0);
        const tx = (w0 * fontSize + spacing) * scale;

        if (fontSize !== 0 && this.glyphInside(w0 * fontSize * scale)) {
          if (kept) out.push({ kind: 'bytes', value: kept });
          kept = '';
          out.push({ kind: 'shift', value: -(w0 * 1000 + (spacing * 1000) / fontSize) });
          this.removed++;
          dropped = true;
        } else {
          kept += glyph.bytes;
        }
        this.advance(tx);
      }
      if (kept) out.push({ kind: 'bytes', value: kept });
    }

    return dropped ? formatTJArray(out) : null;
  }

  private glyphInside(glyphWidth: number): boolean {
    const render = multiplyMatrices(this.tm, this.state.ctm);
    const rise = this.state.text.rise;
    const mid = applyMatrix(render, glyphWidth / 2, rise);
    const { xMin, xMax, yMin, yMax } = this.rect;
    return (
      mid.x >= xMin - EPSILON && mid.x <= xMax + EPSILON &&
      mid.y >= yMin - EPSILON && mid.y <= yMax + EPSILON
    );
  }

  /** Wrap the page in q/Q so the white fill is painted in default user space. */
  private withCover(content: Uint8Array): Uint8Array {
    const { xMin, yMin, xMax, yMax } = this.rect;
    const dims = [xMin, yMin, xMax - xMin, yMax - yMin].map(formatNumber).join(' ');
    return concatBytes([
      latin1Bytes('q\n'),
      content,
      latin1Bytes(`\nQ\nq 1 1 1 rg ${dims} re f Q\n`),
    ]);
  }
}

function* glyphsOf(bytes: string, font: FontMetrics): Generator<{ code: number; bytes: string }> {
  const step = font.twoByte ? 2 : 1;
  for (let i = 0; i + step <= bytes.length; i += step) {
    const chunk = bytes.slice(i, i + step);
    const code = font.twoByte
      ? (chunk.charCodeAt(0) << 8) | chunk.charCodeAt(1)
      : chunk.charCodeAt(0);
    yield { code, bytes: chunk };
  }
}

function formatTJArray(elements: TJElement[]): string {
  const parts = elements.map((el) =>
    el.kind === 'bytes' ? toHexString(el.value) : formatNumber(el.value),
  );
  return `[${parts.join(' ')}]`;
}

function applySplices(content: Uint8Array, splices: Splice[]): Uint8Array {
  const chunks: Uint8Array[] = [];
  let last = 0;
  for (const splice of [...splices].sort((a, b) => a.start - b.start)) {
    chunks.push(content.subarray(last, splice.start));
    chunks.push(latin1Bytes(splice.replacement));
    last = splice.end;
  }
  chunks.push(content.subarray(last));
  return concatBytes(chunks);
}

function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(chunks.reduce((sum, c) => sum + c.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function redactText(
  content: Uint8Array,
  fonts: ReadonlyMap<string, FontMetrics>,
  rect: UserRect,
  options: RedactOptions = {},
): RedactionResult {
  return new TextRedactor(fonts, rect).redact(content, options);
}
