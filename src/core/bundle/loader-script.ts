import { BUNDLE_PATHS } from '../../constants/index.js';

/**
 * Source of bundle-loader.mjs, the ES module that makes a bundle usable
 * without the catalog. It reads bundle-info.json and system-index.txt from
 * its own directory and exports:
 *
 * - `bundleRoot`: absolute bundle directory
 * - `indexedFiles()`: absolute path of every system-index.txt entry
 * - `systemFiles(name)`: source files of a system and its bundled
 *   dependencies, dependencies first, each file once
 *
 * The text has no run-specific content, so rewriting it is idempotent.
 */
export function renderLoaderScript(): string {
  return `// Generated by sysbundle. Locates the sources of the bundled systems.
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const bundleRoot = dirname(fileURLToPath(import.meta.url));

const info = JSON.parse(readFileSync(join(bundleRoot, '${BUNDLE_PATHS.BUNDLE_INFO}'), 'utf8'));
const releases = new Map(info.releases.map((release) => [release.name.toLowerCase(), release]));
const systems = new Map(info.systems.map((system) => [system.name.toLowerCase(), system]));

export function indexedFiles() {
  return readFileSync(join(bundleRoot, '${BUNDLE_PATHS.SYSTEM_INDEX}'), 'utf8')
    .split('\\n')
    .filter((line) => line.length > 0)
    .map((line) => join(bundleRoot, line));
}

export function systemFiles(name) {
  const files = [];
  const visited = new Set();

  const visit = (systemName) => {
    const key = systemName.toLowerCase();
    if (visited.has(key)) {
      return;
    }
    visited.add(key);

    const system = systems.get(key);
    if (!system) {
      throw new Error(\`System '\${systemName}' is not part of this bundle\`);
    }
    for (const dependency of system.dependencies) {
      visit(dependency);
    }

    const release = releases.get(system.release.toLowerCase());
    for (const file of system.files) {
      const path = join(bundleRoot, '${BUNDLE_PATHS.SOFTWARE}', release.prefix, file);
      if (!files.includes(path)) {
        files.push(path);
      }
    }
  };

  visit(name);
  return files;
}
`;
}
