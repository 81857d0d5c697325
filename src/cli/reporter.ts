import chalk, { Chalk, type ChalkInstance } from 'chalk';

/** Output sink for CLI messages. */
export interface Reporter {
  /** One status line on standard output. */
  line(text: string): void;
  /** Document text written verbatim to standard output. */
  raw(text: string): void;
  /** One line on standard error. */
  error(text: string): void;
}

/** Status tags printed in front of CLI messages. */
export type StatusTag = 'OK' | 'ERR' | 'INFO' | 'WARN' | 'HINT';

/** Reporter writing to the process streams. */
export function createConsoleReporter(): Reporter {
  return {
    line: (text) => {
      process.stdout.write(`${text}\n`);
    },
    raw: (text) => {
      process.stdout.write(text);
    },
    error: (text) => {
      process.stderr.write(`${text}\n`);
    }
  };
}

/** Chalk instance honoring `--no-color`; color support is otherwise auto-detected. */
export function createPainter(color: boolean): ChalkInstance {
  return color ? chalk : new Chalk({ level: 0 });
}

/** Render `[TAG] message` with the tag colored by status. */
export function tagged(paint: ChalkInstance, tag: StatusTag, message: string): string {
  return `${paintTag(paint, tag)} ${message}`;
}

function paintTag(paint: ChalkInstance, tag: StatusTag): string {
  const label = `[${tag}]`;
  switch (tag) {
    case 'OK':
      return paint.green(label);
    case 'ERR':
      return paint.red(label);
    case 'WARN':
      return paint.yellow(label);
    case 'INFO':
    case 'HINT':
      return paint.cyan(label);
  }
}
