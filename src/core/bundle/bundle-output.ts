/**
 * @fileoverview Display logic for the bundle and closure commands
 *
 * Formats results for the terminal; kept apart from the pipeline so the
 * pipeline stays testable.
 */

import pico from 'picocolors';
import type { OutputPort } from '../ports/output.js';
import type { Bundle } from './bundle.js';
import type { MaterializeResult } from './materializer.js';
import { formatCount, formatPathForDisplay } from '../../utils/formatters.js';

/**
 * Summary after a bundle has been written
 */
export function displayBundleSuccess(result: MaterializeResult, out: OutputPort, cwd: string): void {
  out.success(
    `Bundled ${formatCount(result.systems.length, 'system')} from ` +
    `${formatCount(result.releases.length, 'release')}`
  );
  out.success(`Location: ${formatPathForDisplay(result.target, cwd)}`);
  out.success(`Index: ${formatCount(result.indexEntries.length, 'source file')}`);
}

/**
 * Lines describing a resolved closure: one per release, with its systems
 */
export function formatClosure(bundle: Bundle): string[] {
  return bundle.providedReleases().map(release => {
    const systems = bundle.systemsOf(release).map(system => system.name).join(', ');
    return `${pico.cyan(release.name)} ${pico.dim(`(${systems})`)}`;
  });
}

export function displayClosure(bundle: Bundle, out: OutputPort): void {
  const systems = bundle.providedSystems();
  const releases = bundle.providedReleases();
  out.info(`${formatCount(systems.length, 'system')} in ${formatCount(releases.length, 'release')}:`);
  for (const line of formatClosure(bundle)) {
    out.message(`  ${line}`);
  }
}
