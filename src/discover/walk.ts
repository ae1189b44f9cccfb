/**
 * Manifest file enumeration
 */

import { readdir } from 'node:fs/promises';
import { join, posix } from 'node:path';

const MANIFEST_EXTENSIONS = ['.yaml', '.yml'];

function isSkippedDirectory(name: string): boolean {
  return name.startsWith('.') || name === 'node_modules';
}

/**
 * List every YAML file below root as a sorted, `/`-separated path
 * relative to root. Hidden entries and node_modules are skipped.
 */
export async function listManifestFiles(root: string): Promise<string[]> {
  const files: string[] = [];

  async function visit(relative: string): Promise<void> {
    const entries = await readdir(join(root, relative), { withFileTypes: true });
    for (const entry of entries) {
      const path = relative ? posix.join(relative, entry.name) : entry.name;
      if (entry.isDirectory()) {
        if (!isSkippedDirectory(entry.name)) {
          await visit(path);
        }
      } else if (
        entry.isFile() &&
        !entry.name.startsWith('.') &&
        MANIFEST_EXTENSIONS.some((ext) => entry.name.endsWith(ext))
      ) {
        files.push(path);
      }
    }
  }

  await visit('');
  return files.sort();
}

/**
 * Final path segment of a relative manifest path.
 */
export function baseName(path: string): string {
  return posix.basename(path);
}
