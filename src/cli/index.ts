#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormat, output } from './utils/output.js';
import { createServeCommand } from './commands/serve.js';
import { createAskCommand } from './commands/ask.js';
import { createHealthCommand } from './commands/health.js';
import { createModelsCommand } from './commands/models.js';

const program = new Command();

program
  .name('textbook-tutor')
  .description('Retrieval-augmented tutor answering questions from a textbook corpus')
  .version('1.0.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress non-error output')
  .hook('preAction', (thisCommand) => {
    // Set output format based on global --json flag
    const opts = thisCommand.opts();
    if (opts.json) {
      output.setFormat(OutputFormat.JSON);
    }

    // Handle verbose and quiet flags
    if (opts.verbose) {
      process.env.LOG_LEVEL = 'debug';
    }
    if (opts.quiet) {
      process.env.LOG_LEVEL = 'error';
    }
  });

// Error handling
program.exitOverride();

// Register commands
program.addCommand(createServeCommand());
program.addCommand(createAskCommand());
program.addCommand(createHealthCommand());
program.addCommand(createModelsCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  // Commander already printed usage errors, help and version
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  output.error('Command failed', error);
  process.exit(1);
});
