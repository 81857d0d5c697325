import { describe, expect, it } from 'vitest';

import { addDiagnostic, createReportContext } from '../../src/core/report-context.js';

describe('report context', () => {
  it('keeps warnings as warnings in lenient mode', () => {
    const ctx = createReportContext('lenient');
    addDiagnostic(ctx, 'MD_TABLE_ROW_COLUMNS', 'warning', 'broken');

    expect(ctx.diagnostics).toEqual([{ code: 'MD_TABLE_ROW_COLUMNS', severity: 'warning', message: 'broken' }]);
    expect(ctx.validationFailure).toBe(false);
  });

  it('escalates warnings to errors in strict mode but leaves info alone', () => {
    const ctx = createReportContext('strict');
    addDiagnostic(ctx, 'JSON_AUTO_REPAIRED', 'info', 'repaired');
    expect(ctx.validationFailure).toBe(false);

    addDiagnostic(ctx, 'MD_TABLE_ROW_COLUMNS', 'warning', 'broken');
    expect(ctx.diagnostics.map((diagnostic) => diagnostic.severity)).toEqual(['info', 'error']);
    expect(ctx.validationFailure).toBe(true);
  });

  it('stamps the source name onto located diagnostics', () => {
    const ctx = createReportContext('lenient', 'docs/readme.md');
    addDiagnostic(ctx, 'MD_TABLE_EMPTY', 'error', 'Empty table', {
      source: { line: 4, column: 1 },
      span: { startLine: 4, endLine: 6 }
    });

    expect(ctx.diagnostics[0]).toEqual({
      code: 'MD_TABLE_EMPTY',
      severity: 'error',
      message: 'Empty table',
      source: { name: 'docs/readme.md', line: 4, column: 1 },
      span: { startLine: 4, endLine: 6 }
    });
  });
});
