import type { Bundle } from './bundle.js';
import { logger } from '../../utils/logger.js';

/**
 * Grow `bundle` until it holds every requested system and, for every system
 * it holds, every system that one directly depends on.
 *
 * Depth first, dependencies before siblings. The bundle's expanded flag is the
 * visited test, so cycles end as soon as a system is met a second time.
 * Systems that arrive as siblings of a release are expanded afterwards until
 * none is left. Callers wanting one stable catalog view wrap this in
 * `catalog.withConsistentSnapshot`.
 */
export async function resolveClosure(names: readonly string[], bundle: Bundle): Promise<void> {
  async function expand(name: string, depth: number): Promise<void> {
    const system = await bundle.ensureSystem(name);
    if (!bundle.markExpanded(system.name)) {
      return;
    }

    logger.debug(`${'  '.repeat(depth)}${system.name}`, {
      release: system.release,
      dependencies: system.dependencies
    });

    for (const dependency of system.dependencies) {
      await expand(dependency, depth + 1);
    }
  }

  for (const name of names) {
    bundle.recordRequest(name);
    await expand(name, 0);
  }

  let pending = bundle.unexpandedSystems();
  while (pending.length > 0) {
    for (const system of pending) {
      await expand(system.name, 0);
    }
    pending = bundle.unexpandedSystems();
  }

  logger.debug('Closure resolved', {
    requested: names,
    releases: bundle.providedReleases().map(release => release.name),
    systems: bundle.providedSystems().map(system => system.name)
  });
}
