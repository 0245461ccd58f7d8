#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { constants } from 'fs';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupPackCommand } from './commands/pack.js';

/**
 * flowpack CLI - Main entry point
 *
 * Packages declarative flows and the components they invoke into
 * reproducible pack archives.
 */

const program = new Command();

program
  .name('flowpack')
  .description('flowpack - reproducible packs for component flows')
  .version(getVersion())
  .option('--cwd <dir>', 'set workspace directory')
  .configureHelp({
    sortSubcommands: true
  });

// === PACK COMMANDS ===
setupPackCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();

  // Only validate --cwd if provided (no directory changes)
  if (typeof opts.cwd === 'string') {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      await fs.access(resolvedCwd, constants.R_OK | constants.W_OK);
      logger.info(`Workspace directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist, be accessible, and writable. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Workspace directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with FLOWPACK_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with FLOWPACK_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    // No arguments: show help and exit successfully
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

// Only run when executed directly, not when imported by tests
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('flowpack')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
