import {
  PDFArray,
  PDFFlateStream,
  PDFName,
  PDFRawStream,
  PDFStream,
  decodePDFRawStream,
  type PDFPage,
} from 'pdf-lib';
import * as pako from 'pako';

/**
 * Page content access: every stream under /Contents, decoded and joined,
 * and a way to put one rewritten stream back.
 */

export function getContentStreams(page: PDFPage): PDFStream[] {
  const { context } = page.doc;
  const contents = page.node.get(PDFName.of('Contents'));
  if (!contents) return [];

  const contentsObj = context.lookup(contents);
  const streams: PDFStream[] = [];
  if (contentsObj instanceof PDFArray) {
    for (let i = 0; i < contentsObj.size(); i++) {
      const stream = contentsObj.lookup(i);
      if (stream instanceof PDFStream) streams.push(stream);
    }
  } else if (contentsObj instanceof PDFStream) {
    streams.push(contentsObj);
  }
  return streams;
}

export function decodeStream(stream: PDFStream): Uint8Array {
  if (stream instanceof PDFRawStream) {
    try {
      return decodePDFRawStream(stream).decode();
    } catch {
      try {
        return pako.inflate(stream.contents);
      } catch {
        return stream.contents;
      }
    }
  }
  if (stream instanceof PDFFlateStream) {
    return stream.getUnencodedContents();
  }
  return stream.getContents();
}

/**
 * Concatenated decoded content of a page. Streams are joined with a newline
 * since a token may not span two streams.
 */
export function readPageContent(page: PDFPage): Uint8Array {
  const parts = getContentStreams(page).map(decodeStream);
  const total = parts.reduce((sum, p) => sum + p.length + 1, 0);
  const joined = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    joined.set(part, offset);
    offset += part.length;
    joined[offset++] = 0x0a;
  }
  return joined;
}

/**
 * Replace /Contents with a single FlateDecode stream holding `content`.
 * Kept as an array so later drawing can append streams to it.
 */
export function replacePageContent(page: PDFPage, content: Uint8Array): void {
  const { context } = page.doc;
  const ref = context.register(context.flateStream(content));
  page.node.set(PDFName.of('Contents'), context.obj([ref]));
}

export function latin1Bytes(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    bytes[i] = text.charCodeAt(i) & 0xff;
  }
  return bytes;
}
