/**
 * Shared pdfjs-dist configuration for document loading under Node.
 *
 * standardFontDataUrl points at the font files bundled with pdfjs-dist so
 * documents that reference the standard 14 fonts without embedding them
 * still resolve their metrics.
 */

import { createRequire } from 'module';
import * as path from 'path';
import { VerbosityLevel } from 'pdfjs-dist/legacy/build/pdf.mjs';

function bundledAssetUrl(dir: string): string | undefined {
  try {
    const require = createRequire(import.meta.url);
    const root = path.dirname(require.resolve('pdfjs-dist/package.json'));
    return path.join(root, dir) + path.sep;
  } catch {
    // Package layout unavailable (bundled build); pdfjs falls back to defaults
    return undefined;
  }
}

/** Base options to spread into every getDocument() call. */
export const PDFJS_DOCUMENT_OPTIONS = {
  standardFontDataUrl: bundledAssetUrl('standard_fonts'),
  cMapUrl: bundledAssetUrl('cmaps'),
  cMapPacked: true,
  disableFontFace: true,
  useSystemFonts: false,
  isEvalSupported: false,
  fontExtraProperties: true,
  verbosity: VerbosityLevel.ERRORS,
};
