/**
 * Content Stream Types
 * Low-level values and operators for PDF content stream parsing and rewriting
 */

export type PDFValue =
  | PDFNumber
  | PDFString
  | PDFName
  | PDFArray
  | PDFDict
  | PDFBoolean
  | PDFNull;

export interface PDFNumber {
  type: 'number';
  value: number;
}

export interface PDFString {
  type: 'string';
  /** One char per byte (codes 0-255) */
  value: string;
  encoding: 'literal' | 'hex';
}

export interface PDFName {
  type: 'name';
  value: string;
}

export interface PDFArray {
  type: 'array';
  value: PDFValue[];
}

export interface PDFDict {
  type: 'dict';
  value: Map<string, PDFValue>;
}

export interface PDFBoolean {
  type: 'boolean';
  value: boolean;
}

export interface PDFNull {
  type: 'null';
}

export interface PDFOperator {
  operator: string;
  operands: PDFValue[];
  /** Byte range of operands + operator in the source stream */
  startOffset: number;
  endOffset: number;
}

export interface Matrix {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

export const IDENTITY: Readonly<Matrix> = { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };

export interface TextState {
  charSpacing: number;      // Tc
  wordSpacing: number;      // Tw
  horizontalScale: number;  // Tz (percentage)
  leading: number;          // TL
  fontName: string;         // Tf font resource name
  fontSize: number;         // Tf size
  rise: number;             // Ts
}

/** What the redactor needs to know about a font to walk its glyphs */
export interface FontMetrics {
  /** Type0 fonts with 2-byte codes */
  twoByte: boolean;
  /** Glyph width in 1/1000 text space units */
  widthOf(code: number): number;
}

/** m1 applied first, then m2 (PDF convention) */
export function multiplyMatrices(m1: Matrix, m2: Matrix): Matrix {
  return {
    a: m1.a * m2.a + m1.b * m2.c,
    b: m1.a * m2.b + m1.b * m2.d,
    c: m1.c * m2.a + m1.d * m2.c,
    d: m1.c * m2.b + m1.d * m2.d,
    e: m1.e * m2.a + m1.f * m2.c + m2.e,
    f: m1.e * m2.b + m1.f * m2.d + m2.f,
  };
}

export function applyMatrix(m: Matrix, x: number, y: number): { x: number; y: number } {
  return { x: x * m.a + y * m.c + m.e, y: x * m.b + y * m.d + m.f };
}
