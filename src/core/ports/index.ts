/**
 * Core Ports
 *
 * Re-exports port interfaces and default implementations. These ports
 * define the boundary between core logic and the terminal.
 */

export type { OutputPort } from './output.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
