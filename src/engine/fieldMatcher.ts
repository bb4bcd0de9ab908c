import { z } from 'zod';
import { InvalidRequestError } from '../errors';
import { tryDecodeFieldKey } from './fieldKey';
import type {
  BoundingBox,
  EditOutcome,
  FieldTarget,
  MatchedEdit,
  ReplacementRequest,
  TextRun,
} from '../types';

/** Max per-coordinate drift between a stored key and a re-extracted run */
export const MATCH_TOLERANCE = 10;

const requestSchema = z.record(z.string().min(1), z.string());

export interface ParsedRequest {
  targets: FieldTarget[];
  rejected: EditOutcome[];
}

/**
 * Validate a replacement request and decode its keys. Undecodable keys are
 * reported as skipped, never thrown; only an empty or non-mapping request is.
 */
export function parseReplacementRequest(request: unknown): ParsedRequest {
  const parsed = requestSchema.safeParse(request);
  if (!parsed.success) {
    throw new InvalidRequestError(
      'Replacement set must map field keys to strings',
      parsed.error.issues,
    );
  }
  const entries = Object.entries(parsed.data);
  if (entries.length === 0) {
    throw new InvalidRequestError('Replacement set is empty');
  }

  const targets: FieldTarget[] = [];
  const rejected: EditOutcome[] = [];
  for (const [key, replacement] of entries) {
    const decoded = tryDecodeFieldKey(key);
    if (!decoded.ok) {
      rejected.push({ key, status: 'skipped', reason: 'malformed-key', detail: decoded.error.message });
      continue;
    }
    const { page, x1, y1, x2, y2, text } = decoded.value;
    targets.push({
      key,
      page,
      boundingBox: { x1, y1, x2, y2 },
      originalText: text,
      replacement,
    });
  }
  return { targets, rejected };
}

export function boxesWithinTolerance(
  a: BoundingBox,
  b: BoundingBox,
  tolerance: number = MATCH_TOLERANCE,
): boolean {
  return (
    Math.abs(a.x1 - b.x1) <= tolerance &&
    Math.abs(a.y1 - b.y1) <= tolerance &&
    Math.abs(a.x2 - b.x2) <= tolerance &&
    Math.abs(a.y2 - b.y2) <= tolerance
  );
}

/** Geometry is fuzzy, text is not: text is what tells near-identical boxes apart. */
export function runMatchesTarget(run: TextRun, target: FieldTarget): boolean {
  return (
    run.page === target.page &&
    run.text === target.originalText &&
    boxesWithinTolerance(run.boundingBox, target.boundingBox)
  );
}

export interface MatchResult {
  edits: MatchedEdit[];
  unmatched: FieldTarget[];
}

/**
 * Pair runs with targets. Runs are visited in extraction order; the first run
 * that satisfies a target consumes it, and a run serves at most one target.
 */
export function matchRuns(
  pageRuns: readonly TextRun[],
  targets: readonly FieldTarget[],
): MatchResult {
  const pending = [...targets];
  const edits: MatchedEdit[] = [];

  for (const run of pageRuns) {
    const idx = pending.findIndex((target) => runMatchesTarget(run, target));
    if (idx === -1) continue;

    const [target] = pending.splice(idx, 1);
    edits.push({
      key: target.key,
      page: run.page,
      rect: { ...run.boundingBox },
      originalText: run.text,
      replacement: target.replacement,
      fontSize: run.fontSize,
      fontFamily: run.fontFamily,
      color: run.color,
    });
  }

  return { edits, unmatched: pending };
}

export function groupTargetsByPage(targets: readonly FieldTarget[]): Map<number, FieldTarget[]> {
  const byPage = new Map<number, FieldTarget[]>();
  for (const target of targets) {
    const list = byPage.get(target.page);
    if (list) {
      list.push(target);
    } else {
      byPage.set(target.page, [target]);
    }
  }
  return byPage;
}
