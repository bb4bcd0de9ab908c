/**
 * Replacement Executor
 *
 * Removes matched runs and writes their replacements, two phases per page:
 * every removal first, then every insertion. Interleaving them would let a
 * freshly inserted run be found again by a later removal on the same page.
 */

import { describeError } from '../errors';
import { boxesWithinTolerance } from './fieldMatcher';
import { extractPageRuns } from './runExtractor';
import type { DocumentSession } from './documentSession';
import type {
  BoundingBox,
  DocumentHandle,
  EditOutcome,
  MatchedEdit,
  Position,
  RemoveReport,
  RgbColor,
  TextRun,
} from '../types';

/** Baseline sits at this fraction of the box height, measured from the top */
export const BASELINE_RATIO = 0.8;
export const FALLBACK_FONT = 'Helvetica';
export const BLACK: RgbColor = { r: 0, g: 0, b: 0 };
export const UNENCODABLE_DETAIL = 'replacement cannot be encoded in any available font';

export function baselinePosition(rect: BoundingBox): Position {
  return { x: rect.x1, y: rect.y1 + (rect.y2 - rect.y1) * BASELINE_RATIO };
}

interface RemovedEdit {
  edit: MatchedEdit;
  rect: BoundingBox;
}

function groupByPage<T extends { page: number }>(items: readonly T[]): Map<number, T[]> {
  const byPage = new Map<number, T[]>();
  for (const item of items) {
    const list = byPage.get(item.page) ?? [];
    list.push(item);
    byPage.set(item.page, list);
  }
  return byPage;
}

export class ReplacementExecutor<H extends DocumentHandle> {
  constructor(private readonly session: DocumentSession<H>) {}

  private get log() {
    return this.session.log;
  }

  /**
   * Apply matched edits and persist. Returns one outcome per edit; an edit
   * counts as applied only when both its removal and its insertion succeeded.
   */
  async apply(edits: readonly MatchedEdit[], textColor: RgbColor = BLACK): Promise<EditOutcome[]> {
    const outcomes: EditOutcome[] = [];
    let touched = false;

    for (const [page, pageEdits] of groupByPage(edits)) {
      this.log.debug('Applying replacements', { page, count: pageEdits.length });

      const removed: RemovedEdit[] = [];
      for (const edit of pageEdits) {
        // Removal and insertion are one unit: never blank a field we cannot refill
        if (!(await this.isInsertable(edit))) {
          this.log.error('No font can encode the replacement', { key: edit.key, text: edit.replacement });
          outcomes.push({ key: edit.key, status: 'skipped', reason: 'insert-failed', detail: UNENCODABLE_DETAIL });
          continue;
        }
        const result = await this.removeRun(edit);
        if (result.status === 'skipped') {
          outcomes.push(result);
        } else {
          removed.push({ edit, rect: result.rect });
          touched = true;
        }
      }

      for (const { edit, rect } of removed) {
        outcomes.push(await this.insertReplacement(edit, rect, textColor));
      }
    }

    if (touched) {
      await this.session.persist();
    }
    const applied = outcomes.filter((o) => o.status === 'applied').length;
    this.log.info(`Replaced ${applied} of ${edits.length} matched fields`);
    return outcomes;
  }

  private async isInsertable(edit: MatchedEdit): Promise<boolean> {
    if (edit.replacement === '') return true;
    const { engine } = this.session;
    const handle = this.session.handle;
    return (
      (await engine.canInsert(handle, edit.replacement, edit.fontFamily)) ||
      engine.canInsert(handle, edit.replacement, FALLBACK_FONT)
    );
  }

  /**
   * Re-locate the run by its literal text and redact only the occurrence
   * that still sits within tolerance of the matched box.
   */
  private async removeRun(
    edit: MatchedEdit,
  ): Promise<{ status: 'removed'; rect: BoundingBox } | Extract<EditOutcome, { status: 'skipped' }>> {
    const { engine } = this.session;
    const handle = this.session.handle;

    const occurrences = await engine.findTextOccurrences(handle, edit.page, edit.originalText);
    const target = occurrences.find((rect) => boxesWithinTolerance(rect, edit.rect));
    if (!target) {
      this.log.warn('No matching text instance found', {
        key: edit.key,
        text: edit.originalText,
        candidates: occurrences.length,
      });
      return { key: edit.key, status: 'skipped', reason: 'occurrence-not-found' };
    }

    const glyphs = await engine.redactRegion(handle, edit.page, target, true);
    if (glyphs === 0) {
      this.log.warn('Located text but no glyphs were removed', { key: edit.key });
      return {
        key: edit.key,
        status: 'skipped',
        reason: 'occurrence-not-found',
        detail: 'no glyphs inside region',
      };
    }
    this.log.debug('Redacted region', { key: edit.key, glyphs });
    return { status: 'removed', rect: target };
  }

  private async insertReplacement(
    edit: MatchedEdit,
    rect: BoundingBox,
    textColor: RgbColor,
  ): Promise<EditOutcome> {
    if (edit.replacement === '') {
      return { key: edit.key, status: 'applied', usedFallback: false };
    }
    const { engine } = this.session;
    const handle = this.session.handle;

    try {
      await engine.insertStyledText(
        handle, edit.page, rect, edit.replacement, edit.fontSize, textColor, edit.fontFamily,
      );
      return { key: edit.key, status: 'applied', usedFallback: false };
    } catch (styledError) {
      this.log.warn('Styled insertion failed, falling back to plain text', {
        key: edit.key,
        error: describeError(styledError),
      });
    }

    try {
      await engine.insertPlainText(
        handle, edit.page, baselinePosition(rect), edit.replacement, edit.fontSize, FALLBACK_FONT, textColor,
      );
      return { key: edit.key, status: 'applied', usedFallback: true };
    } catch (plainError) {
      const detail = describeError(plainError);
      this.log.error('All insertion methods failed', { key: edit.key, error: detail });
      return { key: edit.key, status: 'skipped', reason: 'insert-failed', detail };
    }
  }

  /**
   * Sweep every run matching `pattern`: blank it and write back whatever
   * text is left once the pattern is stripped, at the box's top-left point.
   */
  async removeAll(pattern: RegExp, textColor: RgbColor = BLACK): Promise<RemoveReport> {
    const flags = pattern.flags.replace('g', '');
    const probe = new RegExp(pattern.source, flags);
    const stripper = new RegExp(pattern.source, `${flags}g`);
    const { engine } = this.session;
    let removed = 0;

    try {
      const handle = this.session.handle;
      const pageCount = engine.getPageCount(handle);

      for (let page = 0; page < pageCount; page++) {
        const runs = (await extractPageRuns(engine, handle, page)).filter((r) => probe.test(r.text));
        if (runs.length === 0) continue;

        const blanked: TextRun[] = [];
        for (const run of runs) {
          const glyphs = await engine.redactRegion(handle, page, run.boundingBox, true);
          if (glyphs > 0) {
            removed++;
            blanked.push(run);
          } else {
            this.log.warn('Placeholder run left in place, no glyphs removed', { page, text: run.text });
          }
        }

        for (const run of blanked) {
          const remainder = run.text.replace(stripper, '').trim();
          if (!remainder) continue;
          const topLeft = { x: run.boundingBox.x1, y: run.boundingBox.y1 };
          try {
            await engine.insertPlainText(
              handle, page, topLeft, remainder, run.fontSize, run.fontFamily, textColor,
            );
          } catch (error) {
            this.log.warn('Could not reinsert text left after stripping', {
              page,
              text: remainder,
              error: describeError(error),
            });
          }
        }
      }

      if (removed > 0) {
        await this.session.persist();
      }
      this.log.info(`Removed ${removed} placeholder runs`);
      return { success: true, removed };
    } catch (error) {
      this.log.error('Error removing templates', { error: describeError(error) });
      return { success: false, removed };
    }
  }
}
