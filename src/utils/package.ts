import { readFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const FALLBACK_VERSION = '0.0.0';

/**
 * Version of this CLI from the nearest package.json above this module,
 * which works both from src/ and from the compiled dist/src/
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
      return FALLBACK_VERSION;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return FALLBACK_VERSION;
    }
    dir = parent;
  }
}
