import { join, resolve } from 'path';
import type { Bundle } from './bundle.js';
import type { ArchiveAdapter } from '../archive/archive-store.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { buildSystemIndex, renderSystemIndex } from './system-index.js';
import { buildBundleInfo } from './bundle-info.js';
import { renderLoaderScript } from './loader-script.js';
import { BUNDLE_PATHS } from '../../constants/index.js';
import { ensureDir, exists, isDirectory, listEntries, remove, writeJsonFile, writeTextFile } from '../../utils/fs.js';
import { BundleDirectoryExistsError, FileSystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface MaterializeOptions {
  archives: ArchiveAdapter;
  /** Reuse a non-empty target directory (default true) */
  overwrite?: boolean;
  output?: OutputPort;
}

export interface MaterializeResult {
  target: string;
  releases: string[];
  systems: string[];
  indexEntries: string[];
}

/**
 * Write a resolved bundle to `targetDir`: unpack every release under
 * software/, then write system-index.txt, bundle-info.json and the loader.
 *
 * Not transactional: a failing stage leaves earlier output in place.
 * Running it again over the same target yields the same tree.
 */
export async function materializeBundle(
  bundle: Bundle,
  targetDir: string,
  options: MaterializeOptions
): Promise<MaterializeResult> {
  const target = resolve(targetDir);
  const out = resolveOutput(options);

  await prepareTarget(target, options.overwrite ?? true);
  await unpackReleases(bundle, target, options.archives, out);
  const indexEntries = await writeSystemIndex(bundle, target);
  await writeJsonFile(join(target, BUNDLE_PATHS.BUNDLE_INFO), buildBundleInfo(bundle));
  await writeTextFile(join(target, BUNDLE_PATHS.LOADER), renderLoaderScript());

  logger.info(`Materialized bundle in ${target}`, { entries: indexEntries.length });
  return {
    target,
    releases: bundle.providedReleases().map(release => release.name),
    systems: bundle.providedSystems().map(system => system.name),
    indexEntries
  };
}

/**
 * Extract each release, in name order, into <target>/software/<prefix>/.
 * The intermediate tar file is deleted whether extraction succeeds or not.
 */
export async function unpackReleases(
  bundle: Bundle,
  target: string,
  archives: ArchiveAdapter,
  out: OutputPort
): Promise<void> {
  const softwareDir = join(target, BUNDLE_PATHS.SOFTWARE);
  await ensureDir(softwareDir);

  for (const release of bundle.providedReleases()) {
    out.step(`Unpacking ${release.name}`);
    const archivePath = await archives.fetchArchiveToLocalCache(release);
    const tarPath = await archives.decompress(archivePath, release);
    try {
      await archives.extractTar(tarPath, softwareDir, release);
    } finally {
      await discardIntermediate(tarPath);
    }
  }
}

/**
 * Write <target>/system-index.txt and return its entries
 */
export async function writeSystemIndex(bundle: Bundle, target: string): Promise<string[]> {
  const entries = buildSystemIndex(bundle);
  await writeTextFile(join(target, BUNDLE_PATHS.SYSTEM_INDEX), renderSystemIndex(entries));
  return entries;
}

async function prepareTarget(target: string, overwrite: boolean): Promise<void> {
  if (await exists(target)) {
    if (!(await isDirectory(target))) {
      throw new FileSystemError(`Bundle target ${target} exists and is not a directory`, { target });
    }
    if (!overwrite && (await listEntries(target)).length > 0) {
      throw new BundleDirectoryExistsError(target);
    }
  }
  await ensureDir(target);
}

async function discardIntermediate(tarPath: string): Promise<void> {
  try {
    await remove(tarPath);
  } catch (error) {
    logger.warn('Failed to delete intermediate tar file', { tarPath, error });
  }
}
