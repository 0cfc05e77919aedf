import * as os from 'os';
import * as path from 'path';
import { SysbundleDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, SYSBUNDLE_DIRS } from '../constants/index.js';

/**
 * Directory resolution for sysbundle's own state (config and archive cache)
 */

/**
 * Uses ~/.sysbundle on all platforms, or $SYSBUNDLE_HOME when set
 */
export function getSysbundleDirectories(): SysbundleDirectories {
  const override = process.env[ENV_VARS.HOME];
  const baseDir = override && override.trim().length > 0
    ? path.resolve(override)
    : path.join(os.homedir(), DIR_PATTERNS.SYSBUNDLE);

  return {
    config: baseDir,
    cache: path.join(baseDir, SYSBUNDLE_DIRS.CACHE)
  };
}

/**
 * Directory holding downloaded release archives, one file per release
 */
export function getArchiveCacheDir(cacheDir: string): string {
  return path.join(cacheDir, SYSBUNDLE_DIRS.ARCHIVES);
}
