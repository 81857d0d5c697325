import type { Diagnostic } from '../core/diagnostics.js';
import { addDiagnostic, createReportContext, type ReportContext, type ReportMode } from '../core/report-context.js';
import { describeJsonError, detectJsonErrors, parseJson, type JsonError } from '../json/diagnose.js';
import { formatJsonText, prettyPrintJson } from '../json/format.js';
import { repairJson } from '../json/repair.js';
import { formatMarkdownText } from '../markdown/format.js';
import type { TableProblemKind } from '../markdown/table-validate.js';
import { describeTableProblem, validateMarkdownText, type TableProblem } from '../markdown/validate.js';

/** Options shared by every entry point. */
export interface CommonOptions {
  sourceName?: string;
  mode?: ReportMode;
}

/** JSON formatting configuration. */
export interface JsonOptions extends CommonOptions {
  indent?: number;
  autoRepair?: boolean;
}

/** Markdown formatting configuration. */
export interface MarkdownOptions extends CommonOptions {
  blankLineAfterHeading?: boolean;
  formatTables?: boolean;
}

/** Repair hint attached to a failed JSON validation when the heuristics changed the text. */
export interface RepairPreview {
  parsed: boolean;
  /** Pretty-printed repaired document, present when `parsed` is true. */
  text?: string;
}

/** Standard JSON validation envelope with diagnostics-first reporting. */
export interface JsonValidationResult {
  valid: boolean;
  message: string;
  error?: JsonError;
  repairPreview?: RepairPreview;
  diagnostics: Diagnostic[];
}

/** JSON format outcome; `output` is present unless the status is `failed`. */
export interface JsonFormatResult {
  status: 'formatted' | 'repaired' | 'failed';
  output?: string;
  error?: JsonError;
  diagnostics: Diagnostic[];
}

/** Markdown validation envelope. */
export interface MarkdownValidationResult {
  valid: boolean;
  problems: TableProblem[];
  diagnostics: Diagnostic[];
}

/** Markdown format envelope; `output` is withheld when strict mode turns skipped tables into errors. */
export interface MarkdownFormatResult {
  ok: boolean;
  output?: string;
  formattedTables: number;
  skippedTables: TableProblem[];
  diagnostics: Diagnostic[];
}

/** Stable diagnostic code per table rule. */
const TABLE_PROBLEM_CODES: Record<TableProblemKind, string> = {
  empty: 'MD_TABLE_EMPTY',
  'row-columns': 'MD_TABLE_ROW_COLUMNS',
  'separator-columns': 'MD_TABLE_SEPARATOR_COLUMNS',
  'separator-marker': 'MD_TABLE_SEPARATOR_MARKER'
};

/** Strictly validate JSON text; failures carry a repair preview when the heuristics change anything. */
export function validateJson(text: string, options: JsonOptions = {}): JsonValidationResult {
  const ctx = createContext(options);
  const diagnosis = detectJsonErrors(text);
  if (diagnosis.valid) {
    return { valid: true, message: diagnosis.message, diagnostics: ctx.diagnostics };
  }

  addJsonSyntaxDiagnostic(ctx, diagnosis.error);

  const result: JsonValidationResult = {
    valid: false,
    message: diagnosis.message,
    error: diagnosis.error,
    diagnostics: ctx.diagnostics
  };

  const repaired = repairJson(text);
  if (repaired !== text) {
    const reparsed = parseJson(repaired);
    result.repairPreview = reparsed.ok
      ? { parsed: true, text: prettyPrintJson(reparsed.document, options.indent) }
      : { parsed: false };
  }

  return result;
}

/** Pretty-print JSON, repairing it once when the strict parse fails. */
export function formatJson(text: string, options: JsonOptions = {}): JsonFormatResult {
  const ctx = createContext(options);
  const outcome = formatJsonText(text, { indent: options.indent, autoRepair: options.autoRepair });

  if (outcome.status === 'formatted') {
    return { status: 'formatted', output: outcome.output, diagnostics: ctx.diagnostics };
  }

  if (outcome.status === 'repaired') {
    addDiagnostic(ctx, 'JSON_AUTO_REPAIRED', 'info', 'Auto-repair succeeded; formatting repaired JSON.');
    return { status: 'repaired', output: outcome.output, error: outcome.error, diagnostics: ctx.diagnostics };
  }

  addJsonSyntaxDiagnostic(ctx, outcome.error);
  if (outcome.repairError) {
    addDiagnostic(ctx, 'JSON_REPAIR_FAILED', 'error', 'Auto-repair failed; aborting format.', {
      source: { line: outcome.repairError.line, column: outcome.repairError.column }
    });
  }

  return { status: 'failed', error: outcome.error, diagnostics: ctx.diagnostics };
}

/** Report every structurally broken table of the document. */
export function validateMarkdown(text: string, options: CommonOptions = {}): MarkdownValidationResult {
  const ctx = createContext(options);
  const problems = validateMarkdownText(text);
  for (const problem of problems) {
    addTableDiagnostic(ctx, problem, 'error');
  }

  return { valid: problems.length === 0, problems, diagnostics: ctx.diagnostics };
}

/**
 * Normalize headings and align valid tables. Invalid tables are left as they
 * are and reported as warnings, which strict mode escalates to a failed run.
 */
export function formatMarkdown(text: string, options: MarkdownOptions = {}): MarkdownFormatResult {
  const ctx = createContext(options);
  const outcome = formatMarkdownText(text, {
    blankLineAfterHeading: options.blankLineAfterHeading,
    formatTables: options.formatTables
  });

  for (const problem of outcome.skippedTables) {
    addTableDiagnostic(ctx, problem, 'warning');
  }

  const result: MarkdownFormatResult = {
    ok: !ctx.validationFailure,
    formattedTables: outcome.formattedTables,
    skippedTables: outcome.skippedTables,
    diagnostics: ctx.diagnostics
  };
  if (result.ok) {
    result.output = outcome.text;
  }
  return result;
}

function createContext(options: CommonOptions): ReportContext {
  return createReportContext(options.mode ?? 'lenient', options.sourceName);
}

function addJsonSyntaxDiagnostic(ctx: ReportContext, error: JsonError): void {
  addDiagnostic(ctx, 'JSON_SYNTAX_ERROR', 'error', describeJsonError(error), {
    source: { line: error.line, column: error.column }
  });
}

function addTableDiagnostic(ctx: ReportContext, problem: TableProblem, severity: 'error' | 'warning'): void {
  addDiagnostic(ctx, TABLE_PROBLEM_CODES[problem.kind], severity, describeTableProblem(problem), {
    source: { line: problem.startLine, column: 1 },
    span: { startLine: problem.startLine, endLine: problem.endLine }
  });
}
