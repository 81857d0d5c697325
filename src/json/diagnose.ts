import jsonc from 'jsonc-parser';
import type { Node as JsonNode, ParseError, ParseErrorCode, ParseOptions } from 'jsonc-parser';

import { codePointLength } from '../core/lines.js';

export type { JsonNode };

/** Structured oracle failure with 1-based coordinates. */
export interface JsonError {
  name: string;
  message: string;
  line: number;
  column: number;
}

/** A strictly parsed document: its syntax tree plus the text the tree points into. */
export interface JsonDocument {
  text: string;
  root: JsonNode;
}

/** Outcome of one strict oracle parse. */
export type JsonParseOutcome = { ok: true; document: JsonDocument } | { ok: false; error: JsonError };

/** Pass/fail summary returned by `detectJsonErrors`. */
export type JsonDiagnosis = { valid: true; message: string } | { valid: false; message: string; error: JsonError };

/** 1-based line/column pair. */
export interface JsonErrorLocation {
  line: number;
  column: number;
}

/** Error name printed in front of every parse failure. */
export const JSON_ERROR_NAME = 'SyntaxError';

/** Plain JSON: no comments, no trailing commas, no empty documents. */
const STRICT_PARSE_OPTIONS: ParseOptions = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false
};

const EXPECTING_VALUE = 'Expecting value';

/** Messages keyed by the parser's error code names. */
const PARSE_ERROR_MESSAGES: Readonly<Record<string, string>> = {
  InvalidSymbol: EXPECTING_VALUE,
  InvalidNumberFormat: 'Invalid number',
  PropertyNameExpected: 'Expecting property name enclosed in double quotes',
  ValueExpected: EXPECTING_VALUE,
  ColonExpected: "Expecting ':' delimiter",
  CommaExpected: "Expecting ',' delimiter",
  CloseBraceExpected: "Expecting '}'",
  CloseBracketExpected: "Expecting ']'",
  EndOfFileExpected: 'Extra data',
  InvalidCommentToken: 'Comments are not allowed',
  UnexpectedEndOfComment: 'Unterminated comment',
  UnexpectedEndOfString: 'Unterminated string',
  UnexpectedEndOfNumber: 'Invalid number',
  InvalidUnicode: 'Invalid \\uXXXX escape',
  InvalidEscapeCharacter: 'Invalid \\escape',
  InvalidCharacter: 'Invalid control character'
};

/**
 * Parse strictly into an order-preserving syntax tree. The first parser error
 * is the failure point.
 */
export function parseJson(text: string): JsonParseOutcome {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(text, errors, STRICT_PARSE_OPTIONS);

  const [first] = errors;
  if (first !== undefined) {
    return { ok: false, error: createJsonError(text, describeParseErrorCode(first.error), first.offset) };
  }
  if (root === undefined) {
    return { ok: false, error: createJsonError(text, EXPECTING_VALUE, 0) };
  }

  return { ok: true, document: { text, root } };
}

/** Strict validity check that only explains failures; it never repairs. */
export function detectJsonErrors(text: string): JsonDiagnosis {
  const outcome = parseJson(text);
  if (outcome.ok) {
    return { valid: true, message: 'Valid JSON' };
  }

  return {
    valid: false,
    message: describeJsonError(outcome.error),
    error: outcome.error
  };
}

/** Render `<name>: <message> (line L column C)`. */
export function describeJsonError(error: JsonError): string {
  return `${error.name}: ${formatJsonErrorDetail(error)}`;
}

/** Render `<message> (line L column C)` without the error name. */
export function formatJsonErrorDetail(error: JsonError): string {
  return `${error.message} (line ${error.line} column ${error.column})`;
}

/** Convert a 0-based offset into a 1-based line and a 1-based column counted in code points. */
export function offsetToLineColumn(text: string, offset: number): JsonErrorLocation {
  const clamped = Math.max(0, Math.min(offset, text.length));
  const before = text.slice(0, clamped);
  const lastNewline = before.lastIndexOf('\n');
  let line = 1;
  for (const char of before) {
    if (char === '\n') {
      line += 1;
    }
  }

  return { line, column: codePointLength(before.slice(lastNewline + 1)) + 1 };
}

function describeParseErrorCode(code: ParseErrorCode): string {
  const name = jsonc.printParseErrorCode(code);
  return PARSE_ERROR_MESSAGES[name] ?? name;
}

function createJsonError(text: string, message: string, offset: number): JsonError {
  const { line, column } = offsetToLineColumn(text, offset);
  return { name: JSON_ERROR_NAME, message, line, column };
}
