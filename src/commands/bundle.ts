import { Command } from 'commander';
import { BundleOptions, CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runBundlePipeline } from '../core/bundle/bundle-pipeline.js';
import type { MaterializeResult } from '../core/bundle/materializer.js';
import { resolveCommandCwd, resolveUserPath } from '../cli/cwd.js';

interface BundleCommandOptions {
  to: string;
  catalog?: string;
  cacheDir?: string;
  overwrite?: boolean;
}

async function bundleCommand(
  systems: string[],
  options: BundleCommandOptions,
  cwd: string
): Promise<CommandResult<MaterializeResult>> {
  const bundleOptions: BundleOptions = {
    to: resolveUserPath(options.to, cwd) ?? cwd,
    catalog: resolveUserPath(options.catalog, cwd),
    cacheDir: resolveUserPath(options.cacheDir, cwd),
    overwrite: options.overwrite
  };
  return runBundlePipeline(systems, bundleOptions, { cwd });
}

export function setupBundleCommand(program: Command): void {
  program
    .command('bundle')
    .argument('<systems...>', 'systems to bundle together with everything they depend on')
    .description(
      'Write a standalone bundle of systems and their dependencies.\n' +
      'Usage:\n' +
      '  sysbundle bundle alpha beta --to ./vendor/bundle\n' +
      '  sysbundle bundle alpha --to out --catalog ./catalog.yml'
    )
    .requiredOption('--to <dir>', 'bundle directory to write')
    .option('--catalog <file>', 'catalog file (defaults to "catalog" in config.jsonc)')
    .option('--cache-dir <dir>', 'archive cache directory')
    .option('--overwrite', 'reuse a non-empty bundle directory (default)')
    .option('--no-overwrite', 'fail when the bundle directory is not empty')
    .action(withErrorHandling(async (systems: string[], options: BundleCommandOptions, command: Command) => {
      const result = await bundleCommand(systems, options, resolveCommandCwd(command));
      if (!result.success) {
        throw new Error(result.error || 'Bundle operation failed');
      }
    }));
}
