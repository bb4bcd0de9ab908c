/**
 * Field Key Codec
 *
 * Serializes (page, bbox, text) into the key format
 *
 *   p{page}_x{x1}y{y1}a{x2}b{y2}_{escapedText}
 *
 * and parses it back. Coordinates are rounded to 3 decimals and printed in
 * their shortest form (10, not 10.0). Only digits, '.', '-' and an exponent
 * may appear between the markers, so everything after the '_' that closes
 * the coordinate segment is text, whatever characters it contains.
 */

import { MalformedKeyError } from '../errors';
import type { DecodedFieldKey, FieldKey } from '../types';

const COORD_PRECISION = 1000;

// Escape order matters: backslash first so later sequences are not doubled.
const ESCAPES: ReadonlyArray<readonly [string, string]> = [
  ['\\', '\\\\'],
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
  ['"', '\\"'],
  ["'", "\\'"],
];

const UNESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  "'": "'",
};

export function roundCoordinate(value: number): number {
  const rounded = Math.round(value * COORD_PRECISION) / COORD_PRECISION;
  // Avoid "-0" leaking into keys
  return rounded === 0 ? 0 : rounded;
}

export function escapeFieldText(text: string): string {
  let escaped = text;
  for (const [raw, replacement] of ESCAPES) {
    escaped = escaped.split(raw).join(replacement);
  }
  return escaped;
}

/**
 * Exact inverse of escapeFieldText. Scans left to right so that an escaped
 * backslash followed by a letter (`\\n`) is never read as a newline escape.
 * Unknown sequences are kept as written.
 */
export function unescapeFieldText(escaped: string): string {
  let out = '';
  for (let i = 0; i < escaped.length; i++) {
    const ch = escaped[i];
    if (ch === '\\' && i + 1 < escaped.length) {
      const mapped = UNESCAPES[escaped[i + 1]];
      if (mapped !== undefined) {
        out += mapped;
        i++;
        continue;
      }
    }
    out += ch;
  }
  return out;
}

export function encodeFieldKey(
  page: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  text: string,
): FieldKey {
  if (!Number.isInteger(page) || page < 0) {
    throw new MalformedKeyError(`p${page}`, 'page must be a non-negative integer');
  }
  const coords = [x1, y1, x2, y2].map((v) => {
    if (!Number.isFinite(v)) {
      throw new MalformedKeyError(`p${page}`, `coordinate ${v} is not finite`);
    }
    return roundCoordinate(v);
  });
  return `p${page}_x${coords[0]}y${coords[1]}a${coords[2]}b${coords[3]}_${escapeFieldText(text)}`;
}

const NUMBER_PATTERN = /-?\d+(?:\.\d+)?(?:e[+-]?\d+)?/y;
const PAGE_PATTERN = /\d+/y;

class KeyReader {
  private pos = 0;

  constructor(private readonly key: string) {}

  expect(marker: string): void {
    if (!this.key.startsWith(marker, this.pos)) {
      throw new MalformedKeyError(this.key, `expected '${marker}' at offset ${this.pos}`);
    }
    this.pos += marker.length;
  }

  read(pattern: RegExp, what: string): number {
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.key);
    if (!match) {
      throw new MalformedKeyError(this.key, `expected ${what} at offset ${this.pos}`);
    }
    this.pos += match[0].length;
    const value = Number(match[0]);
    if (!Number.isFinite(value)) {
      throw new MalformedKeyError(this.key, `${what} '${match[0]}' does not parse`);
    }
    return value;
  }

  rest(): string {
    return this.key.slice(this.pos);
  }
}

export function decodeFieldKey(key: FieldKey): DecodedFieldKey {
  const reader = new KeyReader(key);
  reader.expect('p');
  const page = reader.read(PAGE_PATTERN, 'page number');
  reader.expect('_x');
  const x1 = reader.read(NUMBER_PATTERN, 'x1');
  reader.expect('y');
  const y1 = reader.read(NUMBER_PATTERN, 'y1');
  reader.expect('a');
  const x2 = reader.read(NUMBER_PATTERN, 'x2');
  reader.expect('b');
  const y2 = reader.read(NUMBER_PATTERN, 'y2');
  reader.expect('_');
  return { page, x1, y1, x2, y2, text: unescapeFieldText(reader.rest()) };
}

export type DecodeResult =
  | { ok: true; value: DecodedFieldKey }
  | { ok: false; error: MalformedKeyError };

/** Non-throwing decode for keys that come from outside the engine. */
export function tryDecodeFieldKey(key: FieldKey): DecodeResult {
  try {
    return { ok: true, value: decodeFieldKey(key) };
  } catch (error) {
    if (error instanceof MalformedKeyError) {
      return { ok: false, error };
    }
    throw error;
  }
}
