/**
 * Library entry point
 */

export { Bundle } from './core/bundle/bundle.js';
export { resolveClosure } from './core/bundle/closure.js';
export { materializeBundle, unpackReleases, writeSystemIndex } from './core/bundle/materializer.js';
export type { MaterializeOptions, MaterializeResult } from './core/bundle/materializer.js';
export { buildSystemIndex, renderSystemIndex } from './core/bundle/system-index.js';
export { buildBundleInfo } from './core/bundle/bundle-info.js';
export type { BundleInfo } from './core/bundle/bundle-info.js';
export { renderLoaderScript } from './core/bundle/loader-script.js';
export { bundleSystems, resolveBundle, runBundlePipeline, runClosurePipeline } from './core/bundle/bundle-pipeline.js';
export type { BundleContext, ClosureResult } from './core/bundle/bundle-pipeline.js';
export { FileCatalog } from './core/catalog/file-catalog.js';
export { parseCatalog } from './core/catalog/catalog-parser.js';
export type { Catalog, CatalogDocument } from './core/catalog/types.js';
export { ArchiveStore, verifyArchive } from './core/archive/archive-store.js';
export type { ArchiveAdapter, ArchiveStoreOptions } from './core/archive/archive-store.js';
export { ConfigManager } from './core/config.js';
export { consoleOutput, resolveOutput } from './core/ports/index.js';
export type { OutputPort } from './core/ports/index.js';
export * from './utils/errors.js';
export * from './types/index.js';
