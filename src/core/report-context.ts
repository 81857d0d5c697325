import type { Diagnostic, DiagnosticSeverity, DiagnosticSource, DiagnosticSpan } from './diagnostics.js';

/** Supported strictness modes. */
export type ReportMode = 'strict' | 'lenient';

/** Mutable diagnostic state shared by the passes of one invocation. */
export interface ReportContext {
  mode: ReportMode;
  sourceName?: string;
  diagnostics: Diagnostic[];
  validationFailure: boolean;
}

/** Optional location details for one diagnostic. */
export interface DiagnosticLocation {
  source?: Omit<DiagnosticSource, 'name'>;
  span?: DiagnosticSpan;
}

/** Create a report context for one validate/format invocation. */
export function createReportContext(mode: ReportMode, sourceName?: string): ReportContext {
  return {
    mode,
    sourceName,
    diagnostics: [],
    validationFailure: false
  };
}

/**
 * Record a diagnostic entry, escalating warnings to errors in strict mode.
 * The source name of the context is stamped onto every located diagnostic.
 */
export function addDiagnostic(
  ctx: ReportContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  location: DiagnosticLocation = {}
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.validationFailure = true;
  }

  const diagnostic: Diagnostic = { code, severity: actualSeverity, message };
  if (location.source) {
    diagnostic.source =
      ctx.sourceName === undefined ? { ...location.source } : { name: ctx.sourceName, ...location.source };
  }
  if (location.span) {
    diagnostic.span = location.span;
  }

  ctx.diagnostics.push(diagnostic);
}
