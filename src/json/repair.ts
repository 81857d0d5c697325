/**
 * Text-level heuristics that turn informal JSON (comments, trailing commas,
 * single-quoted strings) into strict JSON.
 *
 * None of the steps know about string literals: a `//`, `/*` or `,]` inside a
 * string value is rewritten like any other text, and apostrophes outside quoted
 * spans can be mistaken for string delimiters. The caller must re-validate the
 * result with the oracle parser.
 */

const LINE_COMMENT = /\/\/[^\n]*/g;
const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const TRAILING_COMMA = /,\s*([}\]])/g;
const SINGLE_QUOTED_SPAN = /'([^'\\]*(?:\\[^\n][^'\\]*)*)'/g;

/** Remove `//` comments up to the end of the line. */
export function stripLineComments(text: string): string {
  return text.replace(LINE_COMMENT, '');
}

/** Remove non-nested `/* ... *\/` comments, including multi-line ones. */
export function stripBlockComments(text: string): string {
  return text.replace(BLOCK_COMMENT, '');
}

/** Drop commas that are followed only by whitespace and a closing `}` or `]`. */
export function removeTrailingCommas(text: string): string {
  return text.replace(TRAILING_COMMA, '$1');
}

/** Rewrite `'...'` spans as `"..."`, escaping embedded double quotes. */
export function convertSingleQuotedStrings(text: string): string {
  return text.replace(SINGLE_QUOTED_SPAN, (_span: string, inner: string) => `"${inner.replaceAll('"', '\\"')}"`);
}

/**
 * Best-effort repair pipeline. Returns the input unchanged when the heuristics
 * leave nothing but whitespace.
 */
export function repairJson(text: string): string {
  let repaired = stripLineComments(text);
  repaired = stripBlockComments(repaired);
  repaired = removeTrailingCommas(repaired);
  repaired = convertSingleQuotedStrings(repaired);
  repaired = removeTrailingCommas(repaired);

  return repaired.trim().length > 0 ? repaired : text;
}
