import type { BundleOptions, ClosureOptions, CommandResult } from '../../types/index.js';
import type { Catalog } from '../catalog/types.js';
import type { ArchiveAdapter } from '../archive/archive-store.js';
import type { OutputPort } from '../ports/output.js';
import { Bundle } from './bundle.js';
import { resolveClosure } from './closure.js';
import { materializeBundle, type MaterializeResult } from './materializer.js';
import { displayBundleSuccess, displayClosure } from './bundle-output.js';
import { FileCatalog } from '../catalog/file-catalog.js';
import { ArchiveStore } from '../archive/archive-store.js';
import { ConfigManager, configManager } from '../config.js';
import { resolveOutput } from '../ports/resolve.js';
import { ConfigError, handleError } from '../../utils/errors.js';
import { formatCount } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';

/**
 * Collaborators of a bundling run. Anything left out is built from
 * configuration: the file catalog, the archive cache and console output.
 */
export interface BundleContext {
  config?: ConfigManager;
  catalog?: Catalog;
  archives?: ArchiveAdapter;
  output?: OutputPort;
  cwd?: string;
}

export interface ClosureResult {
  releases: string[];
  systems: string[];
}

/**
 * Resolve the closure of `names` under a single catalog snapshot
 */
export async function resolveBundle(names: readonly string[], catalog: Catalog): Promise<Bundle> {
  const bundle = new Bundle(catalog);
  await catalog.withConsistentSnapshot(() => resolveClosure(names, bundle));
  return bundle;
}

/**
 * Resolve `names` and write the bundle to `options.to`.
 * Throws the typed error of the first failure; nothing is written when
 * resolution fails.
 */
export async function bundleSystems(
  names: readonly string[],
  options: BundleOptions,
  ctx: BundleContext = {}
): Promise<MaterializeResult> {
  const config = ctx.config ?? configManager;
  const out = resolveOutput(ctx);
  const catalog = ctx.catalog ?? (await openCatalog(options.catalog, config));

  const bundle = await resolveBundle(names, catalog);
  out.info(
    `Resolved ${formatCount(bundle.providedSystems().length, 'system')} from ` +
    `${formatCount(bundle.providedReleases().length, 'release')} in ${catalog.name} ${catalog.version}`
  );

  const archives = ctx.archives ?? new ArchiveStore({
    cacheDir: options.cacheDir ?? (await config.getCacheDir())
  });
  const overwrite = options.overwrite ?? (await config.get('overwrite')) ?? true;

  return materializeBundle(bundle, options.to, { archives, overwrite, output: out });
}

export async function runBundlePipeline(
  names: readonly string[],
  options: BundleOptions,
  ctx: BundleContext = {}
): Promise<CommandResult<MaterializeResult>> {
  try {
    const result = await bundleSystems(names, options, ctx);
    displayBundleSuccess(result, resolveOutput(ctx), ctx.cwd ?? process.cwd());
    return { success: true, data: result };
  } catch (error) {
    return handleError<MaterializeResult>(error);
  }
}

/**
 * Resolve and print a closure without touching the file system
 */
export async function runClosurePipeline(
  names: readonly string[],
  options: ClosureOptions,
  ctx: BundleContext = {}
): Promise<CommandResult<ClosureResult>> {
  try {
    const catalog = ctx.catalog ?? (await openCatalog(options.catalog, ctx.config ?? configManager));
    const bundle = await resolveBundle(names, catalog);
    displayClosure(bundle, resolveOutput(ctx));
    return {
      success: true,
      data: {
        releases: bundle.providedReleases().map(release => release.name),
        systems: bundle.providedSystems().map(system => system.name)
      }
    };
  } catch (error) {
    return handleError<ClosureResult>(error);
  }
}

async function openCatalog(explicitPath: string | undefined, config: ConfigManager): Promise<Catalog> {
  const catalogPath = explicitPath ?? (await config.get('catalog'));
  if (!catalogPath) {
    throw new ConfigError('No catalog configured: pass --catalog <file> or set "catalog" in config.jsonc');
  }
  logger.debug(`Using catalog ${catalogPath}`);
  return FileCatalog.open(catalogPath);
}
