import type {
  BundleRelease,
  BundleSystem,
  CatalogRelease,
  CatalogSystem
} from '../../types/index.js';
import type { Catalog } from '../catalog/types.js';
import { ReleaseNotFoundError, SystemNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { compareNames, normalizeName } from '../../utils/package-name.js';

interface SystemEntry {
  system: BundleSystem;
  /** Set once the closure resolver has started walking this system's dependencies */
  expanded: boolean;
}

/**
 * The working set of releases and systems that make up a bundle.
 *
 * Both maps are keyed by normalized name and only change through the
 * ensure methods, which keep them consistent: registering a release
 * registers every system it provides, and a system is only registered
 * after its release. Nothing is ever removed.
 */
export class Bundle {
  private readonly releases = new Map<string, BundleRelease>();
  private readonly systems = new Map<string, SystemEntry>();
  private readonly requested: string[] = [];

  constructor(private readonly catalog: Catalog) {}

  get catalogName(): string {
    return this.catalog.name;
  }

  get catalogVersion(): string {
    return this.catalog.version;
  }

  /** Names passed to the resolver, first spelling wins, in request order */
  get requestedSystems(): readonly string[] {
    return [...this.requested];
  }

  findSystem(name: string): BundleSystem | undefined {
    return this.systems.get(normalizeName(name))?.system;
  }

  findRelease(name: string): BundleRelease | undefined {
    return this.releases.get(normalizeName(name));
  }

  async ensureRelease(name: string): Promise<BundleRelease> {
    const existing = this.findRelease(name);
    if (existing) {
      return existing;
    }

    const record = await this.catalog.lookupRelease(name);
    if (!record) {
      throw new ReleaseNotFoundError(name);
    }
    return this.addRelease(record);
  }

  async ensureSystem(name: string): Promise<BundleSystem> {
    const existing = this.findSystem(name);
    if (existing) {
      return existing;
    }

    const record = await this.catalog.lookupSystem(name);
    if (!record) {
      throw new SystemNotFoundError(name);
    }

    await this.ensureRelease(record.release);
    // Normally registered as a sibling by its release; a release that does not
    // list the system still owns it.
    return this.findSystem(record.name) ?? this.addSystem(record);
  }

  /**
   * The registered release providing `system`
   */
  releaseOf(system: BundleSystem): BundleRelease {
    const release = this.findRelease(system.release);
    if (!release) {
      throw new ReleaseNotFoundError(system.release);
    }
    return release;
  }

  /**
   * Systems of a registered release: its declared order first, then any
   * system the catalog attributed to it without the release listing it.
   */
  systemsOf(release: BundleRelease): BundleSystem[] {
    const declared = release.systems
      .map(name => this.findSystem(name))
      .filter((system): system is BundleSystem => system !== undefined);
    const declaredKeys = new Set(declared.map(system => normalizeName(system.name)));
    const releaseKey = normalizeName(release.name);
    const extra = this.providedSystems().filter(
      system => normalizeName(system.release) === releaseKey && !declaredKeys.has(normalizeName(system.name))
    );
    return [...declared, ...extra];
  }

  /**
   * Releases sorted by name
   */
  providedReleases(): BundleRelease[] {
    return [...this.releases.values()].sort((a, b) => compareNames(a.name, b.name));
  }

  /**
   * Systems sorted by name
   */
  providedSystems(): BundleSystem[] {
    return [...this.systems.values()]
      .map(entry => entry.system)
      .sort((a, b) => compareNames(a.name, b.name));
  }

  recordRequest(name: string): void {
    const key = normalizeName(name);
    if (!this.requested.some(existing => normalizeName(existing) === key)) {
      this.requested.push(name);
    }
  }

  /**
   * Flag a registered system as expanded. Returns false when it already was,
   * which is how the resolver recognizes systems it has visited.
   */
  markExpanded(name: string): boolean {
    const entry = this.systems.get(normalizeName(name));
    if (!entry) {
      throw new SystemNotFoundError(name);
    }
    if (entry.expanded) {
      return false;
    }
    entry.expanded = true;
    return true;
  }

  /**
   * Registered systems whose dependencies have not been walked yet, sorted by name
   */
  unexpandedSystems(): BundleSystem[] {
    return [...this.systems.values()]
      .filter(entry => !entry.expanded)
      .map(entry => entry.system)
      .sort((a, b) => compareNames(a.name, b.name));
  }

  private addRelease(record: CatalogRelease): BundleRelease {
    const release: BundleRelease = Object.freeze({
      name: record.name,
      archive: record.archive,
      prefix: record.prefix,
      systems: Object.freeze(record.systems.map(system => system.name)),
      ...(record.size !== undefined && { size: record.size }),
      ...(record.md5 !== undefined && { md5: record.md5 })
    });

    this.releases.set(normalizeName(release.name), release);
    for (const system of record.systems) {
      if (!this.findSystem(system.name)) {
        this.addSystem(system);
      }
    }

    logger.debug(`Added release ${release.name} to bundle`, { systems: release.systems });
    return release;
  }

  private addSystem(record: CatalogSystem): BundleSystem {
    const system: BundleSystem = Object.freeze({
      name: record.name,
      release: record.release,
      sourceFiles: Object.freeze([...record.sourceFiles]),
      dependencies: Object.freeze([...record.dependencies])
    });
    this.systems.set(normalizeName(system.name), { system, expanded: false });
    return system;
  }
}
