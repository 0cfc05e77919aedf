import { Command } from 'commander';
import { ClosureOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { runClosurePipeline } from '../core/bundle/bundle-pipeline.js';
import { resolveCommandCwd, resolveUserPath } from '../cli/cwd.js';

export function setupClosureCommand(program: Command): void {
  program
    .command('closure')
    .argument('<systems...>', 'systems to resolve')
    .description('List the releases and systems a bundle of <systems> would contain')
    .option('--catalog <file>', 'catalog file (defaults to "catalog" in config.jsonc)')
    .action(withErrorHandling(async (systems: string[], options: ClosureOptions, command: Command) => {
      const cwd = resolveCommandCwd(command);
      const result = await runClosurePipeline(
        systems,
        { catalog: resolveUserPath(options.catalog, cwd) },
        { cwd }
      );
      if (!result.success) {
        throw new Error(result.error || 'Closure resolution failed');
      }
    }));
}
