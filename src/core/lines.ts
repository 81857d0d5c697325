/**
 * Split document text into lines on `\r\n`, `\r` or `\n`.
 * A single trailing line break does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }

  const lines = text.split(/\r\n|\r|\n/);
  if (lines.at(-1) === '') {
    lines.pop();
  }
  return lines;
}

/** True for empty or whitespace-only lines. */
export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}

/** Join lines, drop trailing whitespace and blank lines, end with exactly one newline. */
export function joinDocumentLines(lines: readonly string[]): string {
  return `${lines.join('\n').trimEnd()}\n`;
}

/** Length in code points, so astral characters count once. */
export function codePointLength(value: string): number {
  return Array.from(value).length;
}
