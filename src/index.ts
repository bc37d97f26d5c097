#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { getVersion } from './utils/version.js';

// Import command setup functions
import { setupApplyCommand } from './commands/apply.js';
import { setupPlanCommand } from './commands/plan.js';
import { setupValidateCommand } from './commands/validate.js';
import { setupCacheCommand } from './commands/cache.js';

/**
 * hostform CLI - Main entry point
 *
 * Converges a machine to a declarative YAML description of its packages,
 * dotfiles, binaries and desktop settings.
 */

// Create the main program
const program = new Command();

program
  .name('hostform')
  .description('hostform - declarative machine convergence from one YAML tree')
  .version(getVersion())
  .option('--cwd <dir>', 'resolve relative paths against this directory')
  .option('--verbose', 'log debug output')
  .configureHelp({ sortSubcommands: true });

// === CONVERGENCE ===
setupApplyCommand(program);
setupPlanCommand(program);
setupValidateCommand(program);

// === MAINTENANCE ===
setupCacheCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();

  if (opts.verbose === true) {
    logger.setLevel(LogLevel.DEBUG);
  }

  // Only validate --cwd if provided (no directory changes)
  if (typeof opts.cwd === 'string') {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      logger.info(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // If no arguments provided (just 'hostform'), show help and exit successfully
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('hostform')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
