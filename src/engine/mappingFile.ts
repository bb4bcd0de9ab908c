import { promises as fs } from 'fs';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { InvalidRequestError } from '../errors';
import { escapeFieldText, unescapeFieldText } from './fieldKey';
import type { ReplacementRequest, TextRun } from '../types';

/**
 * Mapping file: one `"<FieldKey>": "<escaped text>"` line per field, in
 * the order the runs are given. Users edit the values and feed the file
 * back to replace.
 */

const mappingSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()]),
);

export function formatMapping(runs: readonly TextRun[]): string {
  const data: Record<string, string> = {};
  for (const run of runs) {
    data[run.key] = escapeFieldText(run.text);
  }
  return stringify(data, {
    defaultStringType: 'QUOTE_DOUBLE',
    defaultKeyType: 'QUOTE_DOUBLE',
    lineWidth: 0,
  });
}

export async function writeMappingFile(file: string, runs: readonly TextRun[]): Promise<void> {
  await fs.writeFile(file, formatMapping(runs), 'utf8');
}

/** Parse mapping text into a replacement request; null values are dropped. */
export function parseMapping(source: string, origin = 'mapping'): ReplacementRequest {
  const raw: unknown = parse(source);
  if (raw === null || raw === undefined) {
    throw new InvalidRequestError(`Empty mapping file: ${origin}`);
  }
  const parsed = mappingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidRequestError(`Mapping file must be a key/value map: ${origin}`, parsed.error.issues);
  }

  const request: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    if (value === null) continue;
    request[key] = unescapeFieldText(String(value));
  }
  if (Object.keys(request).length === 0) {
    throw new InvalidRequestError(`No replacement values found in mapping file: ${origin}`);
  }
  return request;
}

export async function readMappingFile(file: string): Promise<ReplacementRequest> {
  return parseMapping(await fs.readFile(file, 'utf8'), file);
}
