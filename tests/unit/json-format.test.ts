import { describe, expect, it } from 'vitest';

import { formatJsonText } from '../../src/json/format.js';

function formatted(text: string, indent?: number): string | undefined {
  const outcome = formatJsonText(text, { indent });
  return outcome.status === 'formatted' ? outcome.output : undefined;
}

describe('JSON formatting', () => {
  it('pretty-prints valid JSON with two-space indentation', () => {
    expect(formatJsonText('{"a":1,"b":[true,null]}')).toEqual({
      status: 'formatted',
      output: '{\n  "a": 1,\n  "b": [\n    true,\n    null\n  ]\n}'
    });
  });

  it('honors the indent setting', () => {
    expect(formatted('{"a":1}', 4)).toBe('{\n    "a": 1\n}');
    expect(formatted('{ "a" : [1, {}] }', 0)).toBe('{"a":[1,{}]}');
  });

  it('keeps keys in source order, including integer-like keys', () => {
    expect(formatted('{"b": 1, "2": 2, "a": 3}')).toBe('{\n  "b": 1,\n  "2": 2,\n  "a": 3\n}');
  });

  it('keeps a repeated key at its first position with its last value', () => {
    expect(formatted('{"a": 1, "b": 2, "a": 3}')).toBe('{\n  "a": 3,\n  "b": 2\n}');
  });

  it('emits numbers exactly as written', () => {
    expect(formatted('{"id": 12345678901234567890}')).toBe('{\n  "id": 12345678901234567890\n}');
    expect(formatted('[1.50, -0, 1e3]')).toBe('[\n  1.50,\n  -0,\n  1e3\n]');
  });

  it('emits non-ASCII characters verbatim', () => {
    expect(formatted('{"name":"Zoë ☕"}')).toBe('{\n  "name": "Zoë ☕"\n}');
    expect(formatted('["caf\\u00e9"]')).toBe('[\n  "café"\n]');
  });

  it('keeps empty containers on one line', () => {
    expect(formatted('{"a":{},"b":[]}')).toBe('{\n  "a": {},\n  "b": []\n}');
  });

  it('is idempotent on its own output', () => {
    const first = formatJsonText('[{"k":"v","9":1},[],{}]');
    expect(first.status).toBe('formatted');
    if (first.status !== 'formatted') {
      return;
    }

    expect(formatJsonText(first.output)).toEqual(first);
  });

  it('repairs once and keeps the error of the input', () => {
    const outcome = formatJsonText('{"a": 1,}');
    expect(outcome.status).toBe('repaired');
    if (outcome.status !== 'repaired') {
      return;
    }

    expect(outcome.output).toBe('{\n  "a": 1\n}');
    expect(outcome.error.line).toBe(1);
    expect(outcome.error.column).toBe(9);
  });

  it('fails when repair is disabled', () => {
    const outcome = formatJsonText('{"a": 1,}', { autoRepair: false });
    expect(outcome.status).toBe('failed');
    expect('repairError' in outcome).toBe(false);
  });

  it('fails when the repaired text is still invalid', () => {
    const outcome = formatJsonText('{"a": 1 "b": 2}');
    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') {
      return;
    }

    expect(outcome.error.message).toBe("Expecting ',' delimiter");
    expect(outcome.error.column).toBe(9);
    expect(outcome.repairError?.name).toBe('SyntaxError');
  });
});
