/**
 * Shared constants for the sysbundle CLI
 * Single source of truth for directory names and the file names a bundle is made of.
 */

export const DIR_PATTERNS = {
  SYSBUNDLE: '.sysbundle'
} as const;

export const SYSBUNDLE_DIRS = {
  CACHE: 'cache',
  ARCHIVES: 'archives'
} as const;

/**
 * Fixed layout of a materialized bundle, relative to the bundle root.
 * Downstream loaders depend on these names.
 */
export const BUNDLE_PATHS = {
  SOFTWARE: 'software',
  SYSTEM_INDEX: 'system-index.txt',
  BUNDLE_INFO: 'bundle-info.json',
  LOADER: 'bundle-loader.mjs'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  ARCHIVE_EXT: '.tgz',
  TAR_EXT: '.tar'
} as const;

export const ENV_VARS = {
  HOME: 'SYSBUNDLE_HOME',
  VERBOSE: 'SYSBUNDLE_VERBOSE'
} as const;
