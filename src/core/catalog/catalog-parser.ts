import * as path from 'path';
import * as yaml from 'js-yaml';
import type { CatalogRelease, CatalogSystem } from '../../types/index.js';
import type { CatalogDocument } from './types.js';
import { CatalogError } from '../../utils/errors.js';
import { normalizeName } from '../../utils/package-name.js';

const MD5_PATTERN = /^[0-9a-f]{32}$/i;
const URL_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse catalog YAML text into a validated document.
 *
 * Archive locations that are neither URLs nor absolute paths are resolved
 * against the directory holding the catalog file.
 */
export function parseCatalog(content: string, catalogPath: string): CatalogDocument {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new CatalogError(catalogPath, 'not valid YAML', { error });
  }

  if (!isObject(parsed)) {
    throw new CatalogError(catalogPath, 'top level must be a mapping');
  }

  const fail = (reason: string): never => {
    throw new CatalogError(catalogPath, reason);
  };

  const name = optionalScalar(parsed.name, 'name', fail) ?? path.basename(catalogPath, path.extname(catalogPath));
  const version = optionalScalar(parsed.version, 'version', fail) ?? 'unversioned';

  if (!Array.isArray(parsed.releases)) {
    fail(`'releases' must be a list`);
  }
  const rawReleases: unknown[] = Array.isArray(parsed.releases) ? parsed.releases : [];

  const releases = new Map<string, CatalogRelease>();
  const systems = new Map<string, CatalogSystem>();
  const prefixes = new Set<string>();
  const catalogDir = path.dirname(path.resolve(catalogPath));

  rawReleases.forEach((rawRelease, index) => {
    if (!isObject(rawRelease)) {
      return fail(`release #${index + 1} must be a mapping`);
    }
    const releaseName = requiredString(rawRelease.name, `release #${index + 1} name`, fail);
    const key = normalizeName(releaseName);
    if (releases.has(key)) {
      fail(`duplicate release '${releaseName}'`);
    }

    const archive = requiredString(rawRelease.archive, `release '${releaseName}' archive`, fail);
    const prefix = rawRelease.prefix === undefined
      ? releaseName
      : requiredString(rawRelease.prefix, `release '${releaseName}' prefix`, fail);
    if (!isSinglePathSegment(prefix)) {
      fail(`release '${releaseName}' prefix '${prefix}' must be a single directory name`);
    }
    if (prefixes.has(normalizeName(prefix))) {
      fail(`release '${releaseName}' reuses prefix '${prefix}'`);
    }
    prefixes.add(normalizeName(prefix));

    const release: CatalogRelease = {
      name: releaseName,
      archive: resolveArchiveLocation(archive, catalogDir),
      prefix,
      systems: []
    };

    if (rawRelease.size !== undefined) {
      if (typeof rawRelease.size !== 'number' || !Number.isInteger(rawRelease.size) || rawRelease.size < 0) {
        fail(`release '${releaseName}' size must be a non-negative integer`);
      } else {
        release.size = rawRelease.size;
      }
    }
    if (rawRelease.md5 !== undefined) {
      if (typeof rawRelease.md5 !== 'string' || !MD5_PATTERN.test(rawRelease.md5)) {
        fail(`release '${releaseName}' md5 must be a 32-digit hex string`);
      } else {
        release.md5 = rawRelease.md5.toLowerCase();
      }
    }

    const rawSystems = rawRelease.systems ?? [];
    if (!Array.isArray(rawSystems)) {
      return fail(`release '${releaseName}' systems must be a list`);
    }

    for (const rawSystem of rawSystems) {
      const system = parseSystem(rawSystem, releaseName, fail);
      const systemKey = normalizeName(system.name);
      if (systems.has(systemKey)) {
        fail(`system '${system.name}' is provided by more than one release`);
      }
      systems.set(systemKey, system);
      release.systems.push(system);
    }

    releases.set(key, release);
  });

  return { name, version, releases, systems };
}

function parseSystem(raw: unknown, releaseName: string, fail: (reason: string) => never): CatalogSystem {
  if (!isObject(raw)) {
    return fail(`release '${releaseName}' has a system entry that is not a mapping`);
  }
  const name = requiredString(raw.name, `system name in release '${releaseName}'`, fail);
  const sourceFiles = stringList(raw.files, `system '${name}' files`, fail);
  const dependencies = stringList(raw.depends, `system '${name}' depends`, fail);

  for (const file of sourceFiles) {
    if (!isContainedRelativePath(file)) {
      fail(`system '${name}' file '${file}' must be a relative path inside its release`);
    }
  }

  return {
    name,
    release: releaseName,
    sourceFiles: sourceFiles.map(file => path.posix.normalize(file)),
    dependencies
  };
}

function requiredString(value: unknown, label: string, fail: (reason: string) => never): string {
  if (typeof value !== 'string' || value.trim() === '') {
    return fail(`${label} must be a non-empty string`);
  }
  return value.trim();
}

// YAML turns `version: 2026.1` into a number; accept it as text
function optionalScalar(value: unknown, label: string, fail: (reason: string) => never): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value);
  }
  return fail(`'${label}' must be a string`);
}

function stringList(value: unknown, label: string, fail: (reason: string) => never): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    return fail(`${label} must be a list`);
  }
  return value.map(item => requiredString(item, `entry of ${label}`, fail));
}

function isSinglePathSegment(value: string): boolean {
  return value !== '.' && value !== '..' && !/[\\/]/.test(value);
}

function isContainedRelativePath(value: string): boolean {
  if (value.includes('\\') || path.posix.isAbsolute(value)) {
    return false;
  }
  const normalized = path.posix.normalize(value);
  return normalized !== '.' && normalized !== '..' && !normalized.startsWith('../');
}

function resolveArchiveLocation(archive: string, catalogDir: string): string {
  if (path.isAbsolute(archive)) {
    return archive;
  }
  if (URL_PATTERN.test(archive)) {
    return archive;
  }
  return path.resolve(catalogDir, archive);
}
