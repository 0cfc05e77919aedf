#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { existsSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { setupBundleCommand } from './commands/bundle.js';
import { setupClosureCommand } from './commands/closure.js';

/**
 * sysbundle CLI - Main entry point
 *
 * Writes standalone bundles of systems drawn from a package catalog.
 */

const program = new Command();

program
  .name('sysbundle')
  .description('Bundle systems and their dependencies for use without the catalog')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .configureHelp({ sortSubcommands: true });

setupBundleCommand(program);
setupClosureCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string }>();

  if (opts.cwd) {
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
      console.error(`Invalid --cwd '${opts.cwd}': ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Set SYSBUNDLE_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync();
}

/**
 * True when this module is the script node was started with. The npm bin
 * link leaves the link's own path in argv[1], so both sides are compared
 * after resolving symlinks.
 */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry || !existsSync(entry)) {
    return false;
  }
  return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
