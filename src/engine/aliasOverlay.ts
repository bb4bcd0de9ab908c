import { promises as fs } from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { describeError } from '../errors';
import { getLogger } from '../utils/logger';
import type { FieldKey, ReplacementRequest } from '../types';

const log = getLogger('aliasOverlay');

// On disk the overlay maps FieldKey -> alias
const aliasFileSchema = z.record(z.string(), z.string());

export interface AliasOverlay {
  aliasToKey: ReadonlyMap<string, FieldKey>;
  keyToAlias: ReadonlyMap<FieldKey, string>;
}

export const EMPTY_OVERLAY: AliasOverlay = { aliasToKey: new Map(), keyToAlias: new Map() };

/** `form.pdf` -> `form.alias.yaml` */
export function aliasFilePath(pdfPath: string): string {
  const parsed = path.parse(pdfPath);
  return path.join(parsed.dir, `${parsed.name}.alias.yaml`);
}

export function buildOverlay(entries: Record<FieldKey, string>): AliasOverlay {
  const aliasToKey = new Map<string, FieldKey>();
  const keyToAlias = new Map<FieldKey, string>();
  for (const [key, alias] of Object.entries(entries)) {
    aliasToKey.set(alias, key);
    keyToAlias.set(key, alias);
  }
  return { aliasToKey, keyToAlias };
}

/**
 * Load the overlay next to a document. A missing file is an empty overlay;
 * an unreadable or malformed one is logged and treated as empty.
 */
export async function loadAliasOverlay(pdfPath: string): Promise<AliasOverlay> {
  const file = aliasFilePath(pdfPath);
  let source: string;
  try {
    source = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return EMPTY_OVERLAY;
    }
    log.warn('Cannot read alias file', { file, error: describeError(error) });
    return EMPTY_OVERLAY;
  }

  try {
    const parsed = aliasFileSchema.safeParse(parse(source) ?? {});
    if (!parsed.success) {
      log.warn('Alias file is not a key/alias map', { file });
      return EMPTY_OVERLAY;
    }
    return buildOverlay(parsed.data);
  } catch (error) {
    log.warn('Cannot parse alias file', { file, error: describeError(error) });
    return EMPTY_OVERLAY;
  }
}

/** Translate alias names to FieldKeys; names that are not aliases pass through as keys. */
export function resolveAliases(
  fields: Readonly<Record<string, string>>,
  overlay: AliasOverlay,
): ReplacementRequest {
  const request: Record<FieldKey, string> = {};
  for (const [name, value] of Object.entries(fields)) {
    request[overlay.aliasToKey.get(name) ?? name] = value;
  }
  return request;
}

export function displayName(key: FieldKey, overlay: AliasOverlay): string {
  return overlay.keyToAlias.get(key) ?? key;
}
