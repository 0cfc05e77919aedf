import { join, isAbsolute, resolve } from 'path';
import { SysbundleConfig, SysbundleDirectories } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getSysbundleDirectories } from './directory.js';

/**
 * Configuration management for the sysbundle CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const DEFAULT_CONFIG: SysbundleConfig = {
  overwrite: true
};

export class ConfigManager {
  private config: SysbundleConfig | null = null;
  private readonly dirs: SysbundleDirectories;

  constructor(dirs: SysbundleDirectories = getSysbundleDirectories()) {
    this.dirs = dirs;
  }

  /**
   * Find the existing config file, .jsonc first
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, falling back to defaults when there is none.
   * Relative paths in the file are resolved against the config directory.
   */
  async load(): Promise<SysbundleConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${configPath}`, { configPath, error });
    }

    const fileConfig = validateConfig(raw, configPath);
    this.config = {
      ...DEFAULT_CONFIG,
      ...fileConfig,
      ...(fileConfig.catalog && { catalog: this.resolvePath(fileConfig.catalog) }),
      ...(fileConfig.cacheDir && { cacheDir: this.resolvePath(fileConfig.cacheDir) })
    };
    return this.config;
  }

  /**
   * Get a specific configuration value
   */
  async get<K extends keyof SysbundleConfig>(key: K): Promise<SysbundleConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  /**
   * Archive cache directory: the configured one or <home>/cache
   */
  async getCacheDir(): Promise<string> {
    return (await this.get('cacheDir')) ?? this.dirs.cache;
  }

  private resolvePath(value: string): string {
    if (isAbsolute(value) || /^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
      return value;
    }
    return resolve(this.dirs.config, value);
  }
}

function validateConfig(raw: unknown, configPath: string): SysbundleConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Configuration in ${configPath} must be an object`, { configPath });
  }

  const config: SysbundleConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'catalog':
      case 'cacheDir':
        if (typeof value !== 'string' || value.trim() === '') {
          throw new ConfigError(`Configuration key '${key}' must be a non-empty string`, { configPath, key });
        }
        config[key] = value;
        break;
      case 'overwrite':
        if (typeof value !== 'boolean') {
          throw new ConfigError(`Configuration key 'overwrite' must be a boolean`, { configPath, key });
        }
        config.overwrite = value;
        break;
      default:
        logger.warn(`Ignoring unknown configuration key '${key}'`, { configPath });
    }
  }
  return config;
}

export const configManager = new ConfigManager();
