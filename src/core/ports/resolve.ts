/**
 * Port Resolution Helpers
 *
 * Falls back to safe defaults when ports are not explicitly provided.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

/**
 * Resolve the OutputPort from a context, falling back to consoleOutput
 */
export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
