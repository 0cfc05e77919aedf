import * as path from 'path';
import type { CatalogRelease, CatalogSystem } from '../../types/index.js';
import type { Catalog, CatalogDocument } from './types.js';
import { parseCatalog } from './catalog-parser.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { CatalogError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { normalizeName } from '../../utils/package-name.js';

/**
 * Catalog backed by a YAML file on disk.
 *
 * Outside a snapshot every lookup re-reads the file, so edits made by other
 * processes are picked up. Inside `withConsistentSnapshot` the file is parsed
 * once and every lookup is served from that parse.
 */
export class FileCatalog implements Catalog {
  readonly catalogPath: string;
  private document: CatalogDocument;
  private snapshot: CatalogDocument | null = null;

  private constructor(catalogPath: string, document: CatalogDocument) {
    this.catalogPath = catalogPath;
    this.document = document;
  }

  static async open(catalogPath: string): Promise<FileCatalog> {
    const absolutePath = path.resolve(catalogPath);
    const document = await loadCatalogDocument(absolutePath);
    logger.debug(`Opened catalog ${document.name} ${document.version}`, {
      catalogPath: absolutePath,
      releases: document.releases.size,
      systems: document.systems.size
    });
    return new FileCatalog(absolutePath, document);
  }

  get name(): string {
    return this.document.name;
  }

  get version(): string {
    return this.document.version;
  }

  async lookupSystem(name: string): Promise<CatalogSystem | undefined> {
    const document = await this.current();
    return document.systems.get(normalizeName(name));
  }

  async lookupRelease(name: string): Promise<CatalogRelease | undefined> {
    const document = await this.current();
    return document.releases.get(normalizeName(name));
  }

  async withConsistentSnapshot<T>(body: () => Promise<T>): Promise<T> {
    // Nested scopes share the outermost snapshot
    if (this.snapshot) {
      return body();
    }

    this.snapshot = await this.reload();
    logger.debug(`Acquired catalog snapshot ${this.snapshot.name} ${this.snapshot.version}`);
    try {
      return await body();
    } finally {
      this.snapshot = null;
      logger.debug('Released catalog snapshot');
    }
  }

  private async current(): Promise<CatalogDocument> {
    return this.snapshot ?? this.reload();
  }

  private async reload(): Promise<CatalogDocument> {
    this.document = await loadCatalogDocument(this.catalogPath);
    return this.document;
  }
}

async function loadCatalogDocument(catalogPath: string): Promise<CatalogDocument> {
  if (!(await exists(catalogPath))) {
    throw new CatalogError(catalogPath, 'file does not exist');
  }
  const content = await readTextFile(catalogPath);
  return parseCatalog(content, catalogPath);
}
