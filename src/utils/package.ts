import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const PACKAGE_NAME = 'flowpack';
const UNKNOWN_VERSION = '0.0.0';

let cachedVersion: string | undefined;

/**
 * Version of the flowpack package itself, read from the nearest package.json
 * above this module (works from both src/ and dist/src/).
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'name' in parsed &&
        parsed.name === PACKAGE_NAME &&
        'version' in parsed &&
        typeof parsed.version === 'string'
      ) {
        cachedVersion = parsed.version;
        return cachedVersion;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  cachedVersion = UNKNOWN_VERSION;
  return cachedVersion;
}
