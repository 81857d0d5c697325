#!/usr/bin/env node
import { runCli } from './commands.js';
import { createProgram } from './program.js';
import { createConsoleReporter, createPainter } from './reporter.js';

const program = createProgram(async (options, command) => {
  process.exitCode = await runCli(options, {
    reporter: createConsoleReporter(),
    paint: createPainter(options.color),
    showHelp: () => command.outputHelp()
  });
});

await program.parseAsync(process.argv);
