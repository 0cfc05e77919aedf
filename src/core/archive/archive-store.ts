import { createHash, randomBytes } from 'crypto';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join, isAbsolute } from 'path';
import { pipeline } from 'stream/promises';
import { fileURLToPath } from 'url';
import { createGunzip } from 'zlib';
import * as tar from 'tar';
import type { BundleRelease } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { getArchiveCacheDir } from '../directory.js';
import { copyFile, ensureDir, exists, remove } from '../../utils/fs.js';
import { ArchiveError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Retrieval and unpacking of release archives.
 */
export interface ArchiveAdapter {
  /** Local path of the release archive, fetching it into the cache when needed */
  fetchArchiveToLocalCache(release: BundleRelease): Promise<string>;
  /** Gunzip `archivePath` into a fresh temporary tar file and return its path */
  decompress(archivePath: string, release: BundleRelease): Promise<string>;
  /** Extract the entries of `tarPath` under `<prefix>/` into `destinationDir` */
  extractTar(tarPath: string, destinationDir: string, release: BundleRelease): Promise<void>;
}

export interface ArchiveStoreOptions {
  /** Archive cache root; archives live in <cacheDir>/archives */
  cacheDir: string;
  /** Where intermediate tar files are written, defaults to the OS temp dir */
  tempDir?: string;
}

const HTTP_PATTERN = /^https?:\/\//i;

/**
 * Archive adapter over a per-release file cache.
 *
 * Archive locations may be absolute paths, file: URLs or http(s) URLs.
 * A cached archive is reused while it matches the release's size and md5.
 */
export class ArchiveStore implements ArchiveAdapter {
  private readonly archiveDir: string;
  private readonly tempDir: string;

  constructor(options: ArchiveStoreOptions) {
    this.archiveDir = getArchiveCacheDir(options.cacheDir);
    this.tempDir = options.tempDir ?? tmpdir();
  }

  getCachePath(release: BundleRelease): string {
    const safeName = release.name.replace(/[\\/:]/g, '__');
    return join(this.archiveDir, `${safeName}${FILE_PATTERNS.ARCHIVE_EXT}`);
  }

  async fetchArchiveToLocalCache(release: BundleRelease): Promise<string> {
    const cachePath = this.getCachePath(release);

    if (await exists(cachePath)) {
      const problem = await verifyArchive(release, cachePath);
      if (!problem) {
        logger.debug(`Using cached archive for ${release.name}`, { cachePath });
        return cachePath;
      }
      logger.warn(`Cached archive for ${release.name} is stale (${problem}), fetching again`, { cachePath });
    }

    await ensureDir(this.archiveDir);
    const partialPath = `${cachePath}.partial`;
    try {
      await this.retrieve(release, partialPath);
      const problem = await verifyArchive(release, partialPath);
      if (problem) {
        throw new ArchiveError(release.name, problem, { archive: release.archive });
      }
      await fs.rename(partialPath, cachePath);
    } catch (error) {
      await remove(partialPath);
      if (error instanceof ArchiveError) {
        throw error;
      }
      throw new ArchiveError(release.name, `failed to fetch ${release.archive}`, {
        archive: release.archive,
        error
      });
    }

    logger.debug(`Fetched archive for ${release.name}`, { archive: release.archive, cachePath });
    return cachePath;
  }

  async decompress(archivePath: string, release: BundleRelease): Promise<string> {
    await ensureDir(this.tempDir);
    const tarPath = join(
      this.tempDir,
      `sysbundle-${release.prefix}-${randomBytes(6).toString('hex')}${FILE_PATTERNS.TAR_EXT}`
    );

    try {
      await pipeline(createReadStream(archivePath), createGunzip(), createWriteStream(tarPath));
    } catch (error) {
      await remove(tarPath);
      throw new ArchiveError(release.name, `failed to decompress ${archivePath}`, { archivePath, error });
    }
    return tarPath;
  }

  async extractTar(tarPath: string, destinationDir: string, release: BundleRelease): Promise<void> {
    await ensureDir(destinationDir);
    let extracted = 0;

    try {
      await tar.x({
        file: tarPath,
        cwd: destinationDir,
        strict: true,
        filter: (entryPath: string) => {
          const keep = isUnderPrefix(entryPath, release.prefix);
          if (keep) {
            extracted++;
          } else {
            logger.debug(`Skipping ${entryPath} outside prefix ${release.prefix}`);
          }
          return keep;
        }
      });
    } catch (error) {
      throw new ArchiveError(release.name, `failed to extract ${tarPath}`, { tarPath, destinationDir, error });
    }

    if (extracted === 0) {
      throw new ArchiveError(release.name, `archive has no entries under '${release.prefix}/'`, { tarPath });
    }
  }

  private async retrieve(release: BundleRelease, destination: string): Promise<void> {
    const location = release.archive;

    if (HTTP_PATTERN.test(location)) {
      const response = await fetch(location);
      if (!response.ok) {
        throw new ArchiveError(release.name, `download of ${location} failed with HTTP ${response.status}`, {
          archive: location,
          status: response.status
        });
      }
      await fs.writeFile(destination, Buffer.from(await response.arrayBuffer()));
      return;
    }

    if (location.startsWith('file:')) {
      await copyFile(fileURLToPath(location), destination);
      return;
    }

    if (isAbsolute(location)) {
      await copyFile(location, destination);
      return;
    }

    throw new ArchiveError(release.name, `unsupported archive location ${location}`, { archive: location });
  }
}

/**
 * Check a local archive against the release's declared size and md5.
 * Returns a description of the first mismatch, or null when it matches.
 */
export async function verifyArchive(release: BundleRelease, archivePath: string): Promise<string | null> {
  if (release.size !== undefined) {
    const stats = await fs.stat(archivePath);
    if (stats.size !== release.size) {
      return `size ${stats.size} does not match expected ${release.size}`;
    }
  }

  if (release.md5 !== undefined) {
    const digest = await md5File(archivePath);
    if (digest !== release.md5) {
      return `md5 ${digest} does not match expected ${release.md5}`;
    }
  }

  return null;
}

export async function md5File(filePath: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

function isUnderPrefix(entryPath: string, prefix: string): boolean {
  const normalized = entryPath.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
  return normalized === prefix || normalized === `${prefix}/` || normalized.startsWith(`${prefix}/`);
}
