import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { logger } from '../logger';

const walkLogger = logger.child({ component: 'walker' });

async function isDirectoryLike(path: string, entry: { isDirectory(): boolean; isSymbolicLink(): boolean }) {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Dangling link
    return false;
  }
}

/**
 * Depth-bounded search for directories named `marker`.
 *
 * The root sits at depth 0; a marker found at depth <= maxDepth is reported
 * and not descended into. Directory symlinks are followed.
 */
export async function walkForMarker(root: string, maxDepth: number, marker: string) {
  const found: Array<string> = [];

  async function visit(path: string, depth: number) {
    const entries = await readdir(path, { withFileTypes: true }).catch((error: unknown) => {
      walkLogger.debug({ err: error, path }, 'Failed to read directory');
      return null;
    });
    if (entries === null) return;

    for (const entry of entries) {
      const childPath = join(path, entry.name);
      const childDepth = depth + 1;
      if (childDepth > maxDepth) continue;
      if (!(await isDirectoryLike(childPath, entry))) continue;

      if (entry.name === marker) {
        found.push(childPath);
        continue;
      }

      await visit(childPath, childDepth);
    }
  }

  await visit(root, 0);
  return found;
}
