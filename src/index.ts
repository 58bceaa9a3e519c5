#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { isEntryPoint } from './utils/entry-point.js';
import { LogLevel } from './types/index.js';

// Import command setup functions
import { setupBuildCommand } from './commands/build.js';
import { setupDeployCommand } from './commands/deploy.js';
import { setupListCommand } from './commands/list.js';
import { setupValidateCommand } from './commands/validate.js';

/**
 * rcforge CLI - Main entry point
 *
 * Assembles modular shell startup files (zsh, bash, fish) from a manifest.
 */

// Create the main program
const program = new Command();

program
  .name('rcforge')
  .description('Build shell startup files from ordered, OS-aware modules')
  .version(getVersion())
  .option('-v, --verbose', 'print debug logging')
  .configureHelp({ sortSubcommands: true });

setupBuildCommand(program);
setupDeployCommand(program);
setupListCommand(program);
setupValidateCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<{ verbose?: boolean }>();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  // No arguments: show help and exit successfully
  if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
  }

  try {
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Runs directly or through the npm bin symlink; stays idle when imported
if (isEntryPoint(process.argv[1], import.meta.url)) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
