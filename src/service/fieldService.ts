/**
 * Field Service
 *
 * Alias-aware list/set operations over a PDF, the surface a remote tool
 * wrapper calls. Fields are the red-marked runs, listed in reading order.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import { z } from 'zod';
import { InvalidPathError, InvalidRequestError } from '../errors';
import { displayName, loadAliasOverlay, resolveAliases } from '../engine/aliasOverlay';
import { unescapeFieldText } from '../engine/fieldKey';
import { withTemplateEditor, type TemplateEditorOptions } from '../engine/templateEditor';
import { getLogger } from '../utils/logger';
import type { ApplyReport, ColorFilter, FieldKey, RgbColor } from '../types';

const log = getLogger('fieldService');

export interface FieldListing {
  /** Alias when the overlay has one, otherwise the FieldKey */
  name: string;
  key: FieldKey;
  text: string;
}

export interface FieldServiceOptions extends TemplateEditorOptions {
  filterColor?: ColorFilter;
  textColor?: RgbColor;
}

const fieldsSchema = z
  .record(z.string().min(1), z.union([z.string(), z.number(), z.boolean()]))
  .refine((fields) => Object.keys(fields).length > 0, 'fields must be a non-empty mapping');

async function isAccessible(file: string, mode: number): Promise<boolean> {
  try {
    await fs.access(file, mode);
    return true;
  } catch {
    return false;
  }
}

export async function validatePdfPath(pdfPath: unknown): Promise<string> {
  if (typeof pdfPath !== 'string' || !pdfPath) {
    throw new InvalidPathError('pdf_path must be a non-empty string', String(pdfPath));
  }
  if (!pdfPath.toLowerCase().endsWith('.pdf')) {
    throw new InvalidPathError(`File must be a PDF: ${pdfPath}`, pdfPath);
  }
  if (!(await isAccessible(pdfPath, fsConstants.F_OK))) {
    throw new InvalidPathError(`PDF file not found: ${pdfPath}`, pdfPath);
  }
  if (!(await isAccessible(pdfPath, fsConstants.R_OK))) {
    throw new InvalidPathError(`Cannot read PDF file: ${pdfPath}`, pdfPath);
  }
  return pdfPath;
}

export async function listPdfFields(
  pdfPath: unknown,
  options: FieldServiceOptions = {},
): Promise<FieldListing[]> {
  const file = await validatePdfPath(pdfPath);
  log.info(`Listing fields for PDF: ${file}`);

  const overlay = await loadAliasOverlay(file);
  const runs = await withTemplateEditor(
    file,
    (editor) => editor.findFields({ colorFilter: options.filterColor ?? 'red', sortByPosition: true }),
    options,
  );

  log.info(`Found ${runs.length} template fields`);
  return runs.map((run) => ({ name: displayName(run.key, overlay), key: run.key, text: run.text }));
}

/** One `name: "text"` line per field */
export function formatFieldListing(fields: readonly FieldListing[]): string {
  return fields.map((f) => `${f.name}: ${JSON.stringify(f.text)}`).join('\n');
}

export async function setPdfFields(
  pdfPath: unknown,
  fields: unknown,
  options: FieldServiceOptions = {},
): Promise<ApplyReport> {
  const file = await validatePdfPath(pdfPath);
  const parsed = fieldsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new InvalidRequestError('fields must be a non-empty dictionary', parsed.error.issues);
  }
  if (!(await isAccessible(file, fsConstants.W_OK))) {
    throw new InvalidPathError(`Cannot write to PDF file: ${file}`, file);
  }
  log.info(`Setting fields in PDF: ${file}`);

  const overlay = await loadAliasOverlay(file);
  if (overlay.aliasToKey.size === 0) {
    log.warn(`No alias mapping found for ${file}. Using field names as coordinate keys.`);
  }
  const values = Object.fromEntries(
    Object.entries(parsed.data).map(([name, value]) => [name, unescapeFieldText(String(value))]),
  );
  const request = resolveAliases(values, overlay);

  const report = await withTemplateEditor(
    file,
    (editor) => editor.replaceFields(request, options.textColor),
    options,
  );
  log.info(`Updated ${report.applied} of ${report.requested} fields`);
  return report;
}
