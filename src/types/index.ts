/**
 * Shared types for the template field engine.
 *
 * Coordinates are document space with a top-left origin: y grows downward,
 * so y1 is the top edge of a box and y2 its bottom edge.
 */

export interface Position {
  x: number;
  y: number;
}

export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

/** Normalized 0-1 RGB color */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/**
 * Color as the document engine reports it: a packed 0xRRGGBB integer or a
 * component triple (components above 1 are read as 0-255).
 */
export type ColorEncoding = number | RgbColor;

export type ColorFilter = 'red';

/** One styled run as returned by the document engine, before keying */
export interface RawTextRun {
  text: string;
  boundingBox: BoundingBox;
  fontFamily: string;
  fontSize: number;
  colorEncoding: ColorEncoding;
}

/** Stable, position-derived identifier: p{page}_x{x1}y{y1}a{x2}b{y2}_{text} */
export type FieldKey = string;

export interface TextRun {
  key: FieldKey;
  page: number;
  boundingBox: BoundingBox;
  text: string;
  fontFamily: string;
  fontSize: number;
  color: RgbColor;
}

export interface DecodedFieldKey {
  page: number;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  text: string;
}

/** FieldKey -> replacement text. Aliases must be resolved before this point. */
export type ReplacementRequest = Readonly<Record<FieldKey, string>>;

export interface FieldTarget {
  key: FieldKey;
  page: number;
  boundingBox: BoundingBox;
  originalText: string;
  replacement: string;
}

export interface MatchedEdit {
  key: FieldKey;
  page: number;
  rect: BoundingBox;
  originalText: string;
  replacement: string;
  fontSize: number;
  fontFamily: string;
  color: RgbColor;
}

export type SkipReason =
  | 'malformed-key'
  | 'no-matching-run'
  | 'occurrence-not-found'
  | 'insert-failed';

export type EditOutcome =
  | { key: FieldKey; status: 'applied'; usedFallback: boolean }
  | { key: FieldKey; status: 'skipped'; reason: SkipReason; detail?: string };

export interface ApplyReport {
  requested: number;
  applied: number;
  outcomes: EditOutcome[];
}

export interface RemoveReport {
  success: boolean;
  removed: number;
}

export interface ExtractOptions {
  colorFilter?: ColorFilter;
  sortByPosition?: boolean;
}

/** Opaque handle to an open document */
export interface DocumentHandle {
  readonly path: string;
}

/**
 * Contract required from the underlying rendering/editing engine.
 * Pages are 0-based. Insert methods throw when the text cannot be placed.
 */
export interface DocumentEngine<H extends DocumentHandle = DocumentHandle> {
  openDocument(path: string): Promise<H>;
  closeDocument(handle: H): Promise<void>;
  getPageCount(handle: H): number;
  getTextRuns(handle: H, page: number): Promise<RawTextRun[]>;
  findTextOccurrences(handle: H, page: number, literalText: string): Promise<BoundingBox[]>;
  /** Returns the number of glyphs removed */
  redactRegion(
    handle: H,
    page: number,
    boundingBox: BoundingBox,
    preserveNonTextGraphics: boolean,
  ): Promise<number>;
  /** Whether the insert methods can encode `text` in `fontFamily`. Changes nothing. */
  canInsert(handle: H, text: string, fontFamily: string): Promise<boolean>;
  insertStyledText(
    handle: H,
    page: number,
    boundingBox: BoundingBox,
    text: string,
    fontSize: number,
    color: RgbColor,
    fontFamily: string,
  ): Promise<void>;
  insertPlainText(
    handle: H,
    page: number,
    position: Position,
    text: string,
    fontSize: number,
    fontName: string,
    color: RgbColor,
  ): Promise<void>;
  saveDocument(handle: H, path: string): Promise<void>;
}
