import { promises as fs } from 'fs';
import * as path from 'path';
import { DocumentClosedError, DocumentOpenError, DocumentSaveError } from '../errors';
import { getLogger, type Logger } from '../utils/logger';
import type { DocumentEngine, DocumentHandle } from '../types';

export type SessionState = 'closed' | 'open' | 'saving';

/** Temp file beside the target so the final rename stays on one filesystem. */
export function tempPathFor(target: string): string {
  const dir = path.dirname(target);
  const base = path.basename(target);
  return path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * Document Session
 *
 * Owns one open handle. State machine: closed -> open -> (saving -> open)* -> closed.
 * persist() writes the whole document to a temp file, swaps it over the
 * original with rename, then reopens; run data read before a persist must
 * not be reused after it.
 */
export class DocumentSession<H extends DocumentHandle = DocumentHandle> {
  private current: H | null;
  private _state: SessionState;
  readonly log: Logger;

  private constructor(
    readonly engine: DocumentEngine<H>,
    readonly path: string,
    handle: H,
    log: Logger,
  ) {
    this.current = handle;
    this._state = 'open';
    this.log = log;
  }

  static async open<H extends DocumentHandle>(
    engine: DocumentEngine<H>,
    docPath: string,
    log: Logger = getLogger('documentSession'),
  ): Promise<DocumentSession<H>> {
    const handle = await openOrThrow(engine, docPath);
    return new DocumentSession(engine, docPath, handle, log.child({ path: docPath }));
  }

  get state(): SessionState {
    return this._state;
  }

  get handle(): H {
    if (this._state !== 'open' || this.current === null) {
      throw new DocumentClosedError(this.path);
    }
    return this.current;
  }

  async persist(): Promise<void> {
    const handle = this.handle;
    this._state = 'saving';
    const tmp = tempPathFor(this.path);

    try {
      await this.engine.saveDocument(handle, tmp);
      await fs.rename(tmp, this.path);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      this._state = 'open';
      throw new DocumentSaveError(this.path, error);
    }

    this.log.debug('Saved document', { tmp });
    await this.engine.closeDocument(handle);
    this.current = null;
    try {
      this.current = await openOrThrow(this.engine, this.path);
    } catch (error) {
      this._state = 'closed';
      throw error;
    }
    this._state = 'open';
  }

  async close(): Promise<void> {
    if (this._state === 'closed' || this.current === null) {
      this._state = 'closed';
      return;
    }
    const handle = this.current;
    this.current = null;
    this._state = 'closed';
    await this.engine.closeDocument(handle);
  }
}

async function openOrThrow<H extends DocumentHandle>(
  engine: DocumentEngine<H>,
  docPath: string,
): Promise<H> {
  try {
    return await engine.openDocument(docPath);
  } catch (error) {
    if (error instanceof DocumentOpenError) throw error;
    throw new DocumentOpenError(docPath, error);
  }
}
