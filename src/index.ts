export * from './types';
export * from './errors';
export { loadConfig, parseHexColor, DEFAULT_PLACEHOLDER_PATTERN, type TemplateConfig } from './config';
export { getLogger, configureLogging, type Logger, type LogLevel, type LogFormat } from './utils/logger';

export {
  encodeFieldKey,
  decodeFieldKey,
  tryDecodeFieldKey,
  escapeFieldText,
  unescapeFieldText,
  roundCoordinate,
  type DecodeResult,
} from './engine/fieldKey';
export {
  extractRuns,
  extractPageRuns,
  normalizeColor,
  isRedColor,
  compareRunsByPosition,
  uniqueTexts,
} from './engine/runExtractor';
export {
  MATCH_TOLERANCE,
  parseReplacementRequest,
  boxesWithinTolerance,
  matchRuns,
  type ParsedRequest,
  type MatchResult,
} from './engine/fieldMatcher';
export { DocumentSession, tempPathFor, type SessionState } from './engine/documentSession';
export { ReplacementExecutor, baselinePosition, BASELINE_RATIO, FALLBACK_FONT, UNENCODABLE_DETAIL } from './engine/replacementExecutor';
export {
  TemplateEditor,
  withTemplateEditor,
  type TemplateEditorOptions,
  type FindFieldsOptions,
} from './engine/templateEditor';
export { formatMapping, parseMapping, readMappingFile, writeMappingFile } from './engine/mappingFile';
export {
  aliasFilePath,
  buildOverlay,
  loadAliasOverlay,
  resolveAliases,
  displayName,
  type AliasOverlay,
} from './engine/aliasOverlay';

export { PdfDocumentEngine, PdfHandle } from './pdf/PdfDocumentEngine';

export {
  validatePdfPath,
  listPdfFields,
  formatFieldListing,
  setPdfFields,
  type FieldListing,
  type FieldServiceOptions,
} from './service/fieldService';
export { runCli, type CliIO } from './cli/commands';
