export * from './public/api.js';
export type { Diagnostic, DiagnosticSeverity, DiagnosticSource, DiagnosticSpan } from './core/diagnostics.js';
export type { ReportMode } from './core/report-context.js';
export { detectJsonErrors, describeJsonError, parseJson, type JsonDocument, type JsonError } from './json/diagnose.js';
export { formatJsonText, prettyPrintJson, type JsonFormatOutcome } from './json/format.js';
export {
  convertSingleQuotedStrings,
  removeTrailingCommas,
  repairJson,
  stripBlockComments,
  stripLineComments
} from './json/repair.js';
export { matchHeading, normalizeHeading, normalizeHeadingLines } from './markdown/headings.js';
export { formatMarkdownText, reformatTables } from './markdown/format.js';
export { findTableBlocks, scanTableBlocks, type TableBlock } from './markdown/table-scanner.js';
export { parseTableBlock, splitTableRow, type ParsedTable, type TableRow } from './markdown/table-parse.js';
export { isAlignmentMarker, validateTable, type TableValidation } from './markdown/table-validate.js';
export { computeColumnWidths, formatTable } from './markdown/table-format.js';
export { validateMarkdownText, type TableProblem } from './markdown/validate.js';
export { ConfigError, DEFAULT_CONFIG, loadConfig, parseConfig, type DocTidyConfig } from './config/config.js';
