/** Severity classes used by JSON and Markdown diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Inclusive 1-based line span of a Markdown table block. */
export interface DiagnosticSpan {
  startLine: number;
  endLine: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  span?: DiagnosticSpan;
}
