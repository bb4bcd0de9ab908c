/** Error codes for template engine failures */
export enum TemplateErrorCode {
  MALFORMED_KEY = 'MALFORMED_KEY',
  INVALID_REQUEST = 'INVALID_REQUEST',
  INVALID_PATH = 'INVALID_PATH',
  DOCUMENT_OPEN_FAILED = 'DOCUMENT_OPEN_FAILED',
  DOCUMENT_CLOSED = 'DOCUMENT_CLOSED',
  DOCUMENT_SAVE_FAILED = 'DOCUMENT_SAVE_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/** Structured error for template engine failures */
export class TemplateEngineError extends Error {
  constructor(
    public code: TemplateErrorCode,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'TemplateEngineError';
  }
}

export class MalformedKeyError extends TemplateEngineError {
  constructor(public key: string, reason: string) {
    super(TemplateErrorCode.MALFORMED_KEY, `Invalid key format: ${key} (${reason})`);
    this.name = 'MalformedKeyError';
  }
}

export class InvalidRequestError extends TemplateEngineError {
  constructor(message: string, details?: unknown) {
    super(TemplateErrorCode.INVALID_REQUEST, message, details);
    this.name = 'InvalidRequestError';
  }
}

export class InvalidPathError extends TemplateEngineError {
  constructor(message: string, public path: string) {
    super(TemplateErrorCode.INVALID_PATH, message);
    this.name = 'InvalidPathError';
  }
}

export class DocumentOpenError extends TemplateEngineError {
  constructor(public path: string, cause: unknown) {
    super(
      TemplateErrorCode.DOCUMENT_OPEN_FAILED,
      `Cannot open document ${path}: ${describeError(cause)}`,
      cause,
    );
    this.name = 'DocumentOpenError';
  }
}

export class DocumentClosedError extends TemplateEngineError {
  constructor(public path: string) {
    super(TemplateErrorCode.DOCUMENT_CLOSED, `Document is not open: ${path}`);
    this.name = 'DocumentClosedError';
  }
}

export class DocumentSaveError extends TemplateEngineError {
  constructor(public path: string, cause: unknown) {
    super(
      TemplateErrorCode.DOCUMENT_SAVE_FAILED,
      `Cannot save document ${path}: ${describeError(cause)}`,
      cause,
    );
    this.name = 'DocumentSaveError';
  }
}

export class ConfigError extends TemplateEngineError {
  constructor(message: string, details?: unknown) {
    super(TemplateErrorCode.INVALID_CONFIG, message, details);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
