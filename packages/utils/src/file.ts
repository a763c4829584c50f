/**
 * File Operations
 *
 * Helpers for the per-task staging directories.
 */

import { mkdir, mkdtemp, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Create a fresh uniquely named directory below `root`
 */
export async function createTempDir(root: string, prefix: string): Promise<string> {
  await ensureDir(root);
  return mkdtemp(join(root, prefix));
}

/**
 * Remove a file or directory tree; a missing path is not an error
 */
export async function removePath(target: string): Promise<void> {
  await rm(target, { recursive: true, force: true });
}

/**
 * Whether a path currently exists
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Make a string safe to use as a single path segment
 */
export function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, 64);
}
