import * as path from 'path';
import type { Command } from 'commander';

/**
 * Working directory for a command: the global --cwd option resolved
 * against the process cwd, or the process cwd itself
 */
export function resolveCommandCwd(command: Command): string {
  const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
  return cwd ? path.resolve(process.cwd(), cwd) : process.cwd();
}

/**
 * Resolve a user-supplied path against the command's working directory,
 * leaving URLs untouched
 */
export function resolveUserPath(value: string | undefined, cwd: string): string | undefined {
  if (value === undefined || /^[a-z][a-z0-9+.-]*:\/\//i.test(value)) {
    return value;
  }
  return path.resolve(cwd, value);
}
