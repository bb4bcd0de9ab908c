/**
 * PDF Content Stream Parser
 *
 * Tokenizer and parser for PDF content streams. Every operator keeps the
 * byte range of its operands and keyword so callers can splice rewritten
 * operations back into the original stream.
 */

import type { PDFArray, PDFDict, PDFOperator, PDFValue } from './types';

type TokenType =
  | 'number'
  | 'string'
  | 'hexstring'
  | 'name'
  | 'keyword'
  | 'arrayStart'
  | 'arrayEnd'
  | 'dictStart'
  | 'dictEnd';

export interface Token {
  type: TokenType;
  /** Numbers are parsed; strings hold one char per byte */
  value: string | number;
  start: number;
  end: number;
}

/**
 * Lexer for PDF content streams
 */
export class ContentStreamLexer {
  private pos = 0;
  private readonly length: number;

  constructor(private readonly data: Uint8Array) {
    this.length = data.length;
  }

  get position(): number {
    return this.pos;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    let token: Token | null;
    while ((token = this.nextToken()) !== null) {
      tokens.push(token);
    }
    return tokens;
  }

  nextToken(): Token | null {
    while (true) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.length) {
        return null;
      }

      const start = this.pos;
      const ch = this.data[this.pos];

      if (ch === 0x28) { // '('
        return this.readStringLiteral(start);
      }

      if (ch === 0x3C) { // '<'
        if (this.data[this.pos + 1] === 0x3C) {
          this.pos += 2;
          return { type: 'dictStart', value: '<<', start, end: this.pos };
        }
        return this.readHexString(start);
      }

      if (ch === 0x3E && this.data[this.pos + 1] === 0x3E) {
        this.pos += 2;
        return { type: 'dictEnd', value: '>>', start, end: this.pos };
      }

      if (ch === 0x5B) { // '['
        this.pos++;
        return { type: 'arrayStart', value: '[', start, end: this.pos };
      }

      if (ch === 0x5D) { // ']'
        this.pos++;
        return { type: 'arrayEnd', value: ']', start, end: this.pos };
      }

      if (ch === 0x2F) { // '/'
        return this.readName(start);
      }

      if (isDigit(ch) || ch === 0x2D || ch === 0x2B || ch === 0x2E) {
        return this.readNumber(start);
      }

      if (isRegularChar(ch)) {
        return this.readKeyword(start);
      }

      // Stray delimiter such as '}' or a lone '>'
      this.pos++;
    }
  }

  /**
   * Skip inline image data following an `ID` keyword. Returns the end
   * offset of the closing `EI`, or the stream length if it never appears.
   */
  skipInlineImageData(): number {
    // Exactly one whitespace byte separates ID from the data
    this.pos++;
    while (this.pos + 1 < this.length) {
      if (
        this.data[this.pos] === 0x45 && // 'E'
        this.data[this.pos + 1] === 0x49 && // 'I'
        isWhitespace(this.data[this.pos - 1]) &&
        (this.pos + 2 >= this.length || isWhitespace(this.data[this.pos + 2]) || isDelimiter(this.data[this.pos + 2]))
      ) {
        this.pos += 2;
        return this.pos;
      }
      this.pos++;
    }
    this.pos = this.length;
    return this.pos;
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.length) {
      const ch = this.data[this.pos];
      if (isWhitespace(ch)) {
        this.pos++;
        continue;
      }
      if (ch === 0x25) { // '%'
        while (this.pos < this.length && this.data[this.pos] !== 0x0A && this.data[this.pos] !== 0x0D) {
          this.pos++;
        }
        continue;
      }
      break;
    }
  }

  private readStringLiteral(start: number): Token {
    this.pos++;
    let value = '';
    let depth = 1;

    while (this.pos < this.length && depth > 0) {
      const ch = this.data[this.pos];

      if (ch === 0x5C) { // '\'
        this.pos++;
        if (this.pos >= this.length) break;
        const escaped = this.data[this.pos];
        switch (escaped) {
          case 0x6E: value += '\n'; break;
          case 0x72: value += '\r'; break;
          case 0x74: value += '\t'; break;
          case 0x62: value += '\b'; break;
          case 0x66: value += '\f'; break;
          case 0x0A: break; // line continuation
          case 0x0D:
            if (this.data[this.pos + 1] === 0x0A) this.pos++;
            break;
          default:
            if (isOctalDigit(escaped)) {
              let octal = String.fromCharCode(escaped);
              while (octal.length < 3 && this.pos + 1 < this.length && isOctalDigit(this.data[this.pos + 1])) {
                this.pos++;
                octal += String.fromCharCode(this.data[this.pos]);
              }
              value += String.fromCharCode(parseInt(octal, 8) & 0xff);
            } else {
              // \( \) \\ and unknown escapes yield the char itself
              value += String.fromCharCode(escaped);
            }
        }
        this.pos++;
      } else {
        if (ch === 0x28) depth++;
        if (ch === 0x29) depth--;
        if (depth > 0) value += String.fromCharCode(ch);
        this.pos++;
      }
    }

    return { type: 'string', value, start, end: this.pos };
  }

  private readHexString(start: number): Token {
    this.pos++;
    let hex = '';
    while (this.pos < this.length) {
      const ch = this.data[this.pos];
      this.pos++;
      if (ch === 0x3E) break; // '>'
      if (isHexDigit(ch)) hex += String.fromCharCode(ch);
    }
    if (hex.length % 2 !== 0) {
      hex += '0';
    }

    let value = '';
    for (let i = 0; i < hex.length; i += 2) {
      value += String.fromCharCode(parseInt(hex.slice(i, i + 2), 16));
    }
    return { type: 'hexstring', value, start, end: this.pos };
  }

  private readName(start: number): Token {
    this.pos++;
    let name = '';
    while (this.pos < this.length) {
      const ch = this.data[this.pos];
      if (isWhitespace(ch) || isDelimiter(ch)) break;

      // #XX escape
      if (ch === 0x23 && this.pos + 2 < this.length) {
        const h1 = this.data[this.pos + 1];
        const h2 = this.data[this.pos + 2];
        if (isHexDigit(h1) && isHexDigit(h2)) {
          name += String.fromCharCode(parseInt(String.fromCharCode(h1, h2), 16));
          this.pos += 3;
          continue;
        }
      }
      name += String.fromCharCode(ch);
      this.pos++;
    }
    return { type: 'name', value: name, start, end: this.pos };
  }

  private readNumber(start: number): Token {
    let numStr = '';
    let hasDecimal = false;

    if (this.data[this.pos] === 0x2D || this.data[this.pos] === 0x2B) {
      numStr += String.fromCharCode(this.data[this.pos]);
      this.pos++;
    }
    while (this.pos < this.length) {
      const ch = this.data[this.pos];
      if (isDigit(ch)) {
        numStr += String.fromCharCode(ch);
      } else if (ch === 0x2E && !hasDecimal) {
        numStr += '.';
        hasDecimal = true;
      } else {
        break;
      }
      this.pos++;
    }

    const value = parseFloat(numStr);
    return { type: 'number', value: Number.isFinite(value) ? value : 0, start, end: this.pos };
  }

  private readKeyword(start: number): Token {
    let keyword = '';
    while (this.pos < this.length) {
      const ch = this.data[this.pos];
      if (isWhitespace(ch) || isDelimiter(ch)) break;
      keyword += String.fromCharCode(ch);
      this.pos++;
    }
    return { type: 'keyword', value: keyword, start, end: this.pos };
  }
}

/**
 * Parser for PDF content streams
 *
 * Inline images (BI ... ID <data> EI) come out as a single `BI` operator
 * with no operands covering the whole image.
 */
export class ContentStreamParser {
  private readonly lexer: ContentStreamLexer;
  private operandStack: PDFValue[] = [];
  private operandStart: number | null = null;

  constructor(data: Uint8Array) {
    this.lexer = new ContentStreamLexer(data);
  }

  parse(): PDFOperator[] {
    const operators: PDFOperator[] = [];
    let token: Token | null;

    while ((token = this.lexer.nextToken()) !== null) {
      if (token.type === 'keyword' && !isLiteralKeyword(token.value)) {
        const keyword = String(token.value);
        const startOffset = this.operandStart ?? token.start;
        const endOffset = keyword === 'BI' ? this.skipInlineImage() : token.end;

        operators.push({
          operator: keyword,
          operands: keyword === 'BI' ? [] : this.operandStack,
          startOffset,
          endOffset,
        });
        this.operandStack = [];
        this.operandStart = null;
        continue;
      }

      if (this.operandStart === null) {
        this.operandStart = token.start;
      }
      const value = this.readValue(token);
      if (value !== null) {
        this.operandStack.push(value);
      }
    }

    return operators;
  }

  private skipInlineImage(): number {
    let token: Token | null;
    while ((token = this.lexer.nextToken()) !== null) {
      if (token.type === 'keyword' && token.value === 'ID') {
        return this.lexer.skipInlineImageData();
      }
    }
    return this.lexer.position;
  }

  private readValue(token: Token): PDFValue | null {
    switch (token.type) {
      case 'number':
        return { type: 'number', value: Number(token.value) };
      case 'string':
      case 'hexstring':
        return {
          type: 'string',
          value: String(token.value),
          encoding: token.type === 'hexstring' ? 'hex' : 'literal',
        };
      case 'name':
        return { type: 'name', value: String(token.value) };
      case 'arrayStart':
        return this.parseArray();
      case 'dictStart':
        return this.parseDict();
      case 'keyword':
        if (token.value === 'true') return { type: 'boolean', value: true };
        if (token.value === 'false') return { type: 'boolean', value: false };
        if (token.value === 'null') return { type: 'null' };
        return null;
      default:
        // Unbalanced ']' or '>>'
        return null;
    }
  }

  private parseArray(): PDFArray {
    const arr: PDFValue[] = [];
    let token: Token | null;
    while ((token = this.lexer.nextToken()) !== null && token.type !== 'arrayEnd') {
      const value = this.readValue(token);
      if (value !== null) arr.push(value);
    }
    return { type: 'array', value: arr };
  }

  private parseDict(): PDFDict {
    const dict = new Map<string, PDFValue>();
    let key: string | null = null;
    let token: Token | null;

    while ((token = this.lexer.nextToken()) !== null && token.type !== 'dictEnd') {
      if (key === null) {
        if (token.type === 'name') key = String(token.value);
        continue;
      }
      const value = this.readValue(token);
      if (value !== null) {
        dict.set(key, value);
        key = null;
      }
    }
    return { type: 'dict', value: dict };
  }
}

export function parseContentStream(data: Uint8Array): PDFOperator[] {
  return new ContentStreamParser(data).parse();
}

function isLiteralKeyword(value: string | number): boolean {
  return value === 'true' || value === 'false' || value === 'null';
}

function isDigit(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x39;
}

function isOctalDigit(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x37;
}

function isHexDigit(ch: number): boolean {
  return (ch >= 0x30 && ch <= 0x39) ||
         (ch >= 0x41 && ch <= 0x46) ||
         (ch >= 0x61 && ch <= 0x66);
}

function isWhitespace(ch: number): boolean {
  return ch === 0x00 || ch === 0x09 || ch === 0x0A || ch === 0x0C || ch === 0x0D || ch === 0x20;
}

function isDelimiter(ch: number): boolean {
  return ch === 0x28 || ch === 0x29 || // '(' ')'
         ch === 0x3C || ch === 0x3E || // '<' '>'
         ch === 0x5B || ch === 0x5D || // '[' ']'
         ch === 0x7B || ch === 0x7D || // '{' '}'
         ch === 0x2F ||                // '/'
         ch === 0x25;                  // '%'
}

function isRegularChar(ch: number): boolean {
  return !isWhitespace(ch) && !isDelimiter(ch);
}

// ─── Serialization ───────────────────────────────────────────

export function formatNumber(n: number): string {
  if (Number.isInteger(n)) {
    return n.toString();
  }
  const fixed = n.toFixed(4).replace(/\.?0+$/, '');
  return fixed === '-0' ? '0' : fixed;
}

/** Byte string (one char per byte) as a PDF hex string */
export function toHexString(bytes: string): string {
  let hex = '';
  for (let i = 0; i < bytes.length; i++) {
    hex += (bytes.charCodeAt(i) & 0xff).toString(16).padStart(2, '0').toUpperCase();
  }
  return `<${hex}>`;
}
