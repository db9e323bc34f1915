import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Read the package version. Walks up from this module because the compiled
 * file sits one level deeper (dist/src) than the source.
 */
export function readPackageVersion(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null) {
        const version: unknown = Reflect.get(pkg, 'version');
        if (typeof version === 'string') {
          return version;
        }
      }
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return '0.0.0';
    }
    dir = parent;
  }
}
