import type { CatalogRelease, CatalogSystem } from '../../types/index.js';

/**
 * The distribution index a bundle is drawn from.
 *
 * Lookups return undefined for unknown names; turning that into a
 * not-found error is the bundle's job.
 */
export interface Catalog {
  /** Distribution name, recorded in bundle-info.json */
  readonly name: string;
  /** Distribution version, recorded in bundle-info.json */
  readonly version: string;

  lookupSystem(name: string): Promise<CatalogSystem | undefined>;
  lookupRelease(name: string): Promise<CatalogRelease | undefined>;

  /**
   * Run `body` against one stable view of the catalog. Every lookup made
   * while `body` runs sees the same catalog state; the view is released when
   * `body` settles, whether it resolves or rejects.
   */
  withConsistentSnapshot<T>(body: () => Promise<T>): Promise<T>;
}

/**
 * Parsed and validated catalog contents, keyed by normalized name
 */
export interface CatalogDocument {
  name: string;
  version: string;
  releases: Map<string, CatalogRelease>;
  systems: Map<string, CatalogSystem>;
}
