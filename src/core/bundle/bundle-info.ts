import type { Bundle } from './bundle.js';

export interface BundleInfo {
  catalog: {
    name: string;
    version: string;
  };
  requested: string[];
  releases: Array<{
    name: string;
    prefix: string;
    systems: string[];
  }>;
  systems: Array<{
    name: string;
    release: string;
    files: string[];
    dependencies: string[];
  }>;
}

/**
 * Machine-readable description of a bundle, read by the generated loader.
 * Releases and systems are sorted by name so the file is stable across runs.
 * Each system names its release as the release itself is spelled, which is
 * the key the loader looks it up by.
 */
export function buildBundleInfo(bundle: Bundle): BundleInfo {
  return {
    catalog: {
      name: bundle.catalogName,
      version: bundle.catalogVersion
    },
    requested: [...bundle.requestedSystems],
    releases: bundle.providedReleases().map(release => ({
      name: release.name,
      prefix: release.prefix,
      systems: bundle.systemsOf(release).map(system => system.name)
    })),
    systems: bundle.providedSystems().map(system => ({
      name: system.name,
      release: bundle.releaseOf(system).name,
      files: [...system.sourceFiles],
      dependencies: [...system.dependencies]
    }))
  };
}
