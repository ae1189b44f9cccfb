/**
 * Repository root detection
 */

import { existsSync } from 'node:fs';
import { dirname, join, parse } from 'node:path';

/**
 * Find the repository root by walking up from startDir until a `.git`
 * entry exists.
 *
 * @returns the directory containing `.git`, or null when none is found
 */
export function findRepoRoot(startDir: string): string | null {
  let current = startDir;
  const root = parse(current).root;

  while (true) {
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    // Stop at filesystem root
    if (current === root) {
      break;
    }

    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return null;
}

/**
 * Repository root for startDir, falling back to startDir itself.
 */
export function resolveRepoRoot(startDir: string = process.cwd()): string {
  return findRepoRoot(startDir) ?? startDir;
}
