import { DocumentSession, type SessionState } from './documentSession';
import { extractPageRuns, extractRuns, uniqueTexts } from './runExtractor';
import { groupTargetsByPage, matchRuns, parseReplacementRequest } from './fieldMatcher';
import { BLACK, ReplacementExecutor } from './replacementExecutor';
import { writeMappingFile } from './mappingFile';
import { DEFAULT_PLACEHOLDER_PATTERN } from '../config';
import { PdfDocumentEngine } from '../pdf/PdfDocumentEngine';
import { getLogger, type Logger } from '../utils/logger';
import type {
  ApplyReport,
  DocumentEngine,
  DocumentHandle,
  EditOutcome,
  ExtractOptions,
  MatchedEdit,
  RemoveReport,
  RgbColor,
  TextRun,
} from '../types';

export interface TemplateEditorOptions {
  engine?: DocumentEngine;
  logger?: Logger;
}

export interface FindFieldsOptions extends ExtractOptions {
  /** Also write the fields to this YAML mapping file */
  mappingFile?: string;
}

/**
 * Template Editor
 *
 * Entry point for finding and replacing position-keyed fields in one
 * document. Each instance owns a DocumentSession; release it with close()
 * or use withTemplateEditor().
 */
export class TemplateEditor {
  private readonly executor: ReplacementExecutor<DocumentHandle>;

  private constructor(
    private readonly session: DocumentSession,
    private readonly log: Logger,
  ) {
    this.executor = new ReplacementExecutor(session);
  }

  static async open(docPath: string, options: TemplateEditorOptions = {}): Promise<TemplateEditor> {
    const engine: DocumentEngine = options.engine ?? new PdfDocumentEngine();
    const session = await DocumentSession.open(engine, docPath, options.logger ?? getLogger('templateEditor'));
    return new TemplateEditor(session, session.log);
  }

  get path(): string {
    return this.session.path;
  }

  get state(): SessionState {
    return this.session.state;
  }

  async findFields(options: FindFieldsOptions = {}): Promise<TextRun[]> {
    const { engine } = this.session;
    const runs = await extractRuns(engine, this.session.handle, options);
    this.log.debug('Extracted runs', { count: runs.length, colorFilter: options.colorFilter });

    if (options.mappingFile && runs.length > 0) {
      await writeMappingFile(options.mappingFile, runs);
      this.log.info(`Template mapping saved to: ${options.mappingFile}`);
    }
    return runs;
  }

  async listTexts(): Promise<string[]> {
    return uniqueTexts(await this.findFields());
  }

  /**
   * Replace fields keyed by FieldKey. Bad keys, vanished fields and failed
   * insertions are reported per key; an empty or non-mapping request throws.
   */
  async replaceFields(request: unknown, textColor: RgbColor = BLACK): Promise<ApplyReport> {
    const { targets, rejected } = parseReplacementRequest(request);
    for (const outcome of rejected) {
      this.log.warn('Skipping invalid key', { key: outcome.key });
    }

    const { engine } = this.session;
    const handle = this.session.handle;
    const edits: MatchedEdit[] = [];
    const unmatched: EditOutcome[] = [];
    const pageCount = engine.getPageCount(handle);

    for (const [page, pageTargets] of groupTargetsByPage(targets)) {
      const runs = page < pageCount ? await extractPageRuns(engine, handle, page) : [];
      const result = matchRuns(runs, pageTargets);
      edits.push(...result.edits);
      for (const target of result.unmatched) {
        this.log.warn('Field no longer present', { key: target.key });
        unmatched.push({ key: target.key, status: 'skipped', reason: 'no-matching-run' });
      }
    }

    const applied = await this.executor.apply(edits, textColor);
    const outcomes = [...rejected, ...unmatched, ...applied];
    return {
      requested: outcomes.length,
      applied: outcomes.filter((o) => o.status === 'applied').length,
      outcomes,
    };
  }

  /** Strip unresolved placeholders left after all known fields were replaced. */
  async removePlaceholders(
    pattern: RegExp | string = DEFAULT_PLACEHOLDER_PATTERN,
    textColor: RgbColor = BLACK,
  ): Promise<RemoveReport> {
    const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    return this.executor.removeAll(regex, textColor);
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}

/** Open, run `fn`, and always release the document. */
export async function withTemplateEditor<T>(
  docPath: string,
  fn: (editor: TemplateEditor) => Promise<T>,
  options: TemplateEditorOptions = {},
): Promise<T> {
  const editor = await TemplateEditor.open(docPath, options);
  try {
    return await fn(editor);
  } finally {
    await editor.close();
  }
}
