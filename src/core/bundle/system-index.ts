import { posix } from 'path';
import type { Bundle } from './bundle.js';
import { BUNDLE_PATHS } from '../../constants/index.js';

/**
 * Bundle-relative paths of every loadable source file:
 * releases by name, then each release's systems in declared order, then
 * each system's files in declared order. A path shared by two systems of
 * one release is listed once.
 */
export function buildSystemIndex(bundle: Bundle): string[] {
  const entries: string[] = [];

  for (const release of bundle.providedReleases()) {
    const seen = new Set<string>();
    for (const system of bundle.systemsOf(release)) {
      for (const file of system.sourceFiles) {
        const entry = posix.join(BUNDLE_PATHS.SOFTWARE, release.prefix, file);
        if (!seen.has(entry)) {
          seen.add(entry);
          entries.push(entry);
        }
      }
    }
  }

  return entries;
}

/**
 * One entry per line, each newline-terminated
 */
export function renderSystemIndex(entries: readonly string[]): string {
  return entries.map(entry => `${entry}\n`).join('');
}
