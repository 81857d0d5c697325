import { Command } from 'commander';

import type { CliOptions } from './commands.js';

export const CLI_NAME = 'doctidy';
export const CLI_VERSION = '0.1.0';

/** Build the command-line program; `handler` receives the parsed options. */
export function createProgram(handler: (options: CliOptions, program: Command) => Promise<void>): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Validate and reformat JSON and Markdown documents')
    .version(CLI_VERSION)
    .option('--validate-json <paths...>', 'validate one or more JSON files')
    .option('--format-json <path>', 'pretty-print a JSON file, repairing it when possible')
    .option('--validate-md <paths...>', 'check the tables of one or more Markdown files')
    .option('--format-md <path>', 'normalize headings and align tables of a Markdown file')
    .option('--out <path>', 'output path for format commands')
    .option('--config <path>', 'YAML configuration file')
    .option('--no-color', 'disable colored output')
    .action(async () => {
      await handler(program.opts<CliOptions>(), program);
    });

  return program;
}
