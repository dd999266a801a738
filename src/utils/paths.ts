import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';

function getPackageRoot(): string {
  // src/utils/ when run from sources, dist/src/utils/ after a build
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, 'rules'))) return dir;
    const parent = resolve(dir, '..');
    if (parent === dir) {
      throw new Error('Cannot locate the rules/ directory from ' + fileURLToPath(import.meta.url));
    }
    dir = parent;
  }
}

export function getRulesPath(file: string): string {
  return resolve(getPackageRoot(), 'rules', file);
}
