/**
 * Path Utilities
 *
 * Archive entry names, unpacked-tree paths and the guards between them.
 *
 * @module docx/utils/paths
 */

import fs from 'fs/promises';
import path from 'path';
import { MissingPartError, PathTraversalError } from '../errors.js';

/** Check if a file path has a `.docx` extension. */
export function isDocxPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.docx');
}

/**
 * Resolve an archive entry under `destination`.
 * Rejects `..` segments, absolute and drive-letter names, backslashes,
 * and anything that still lands outside the destination after resolution.
 */
export function resolveEntryPath(destination: string, entryName: string): string {
  const segments = entryName.split('/');
  const unsafe =
    entryName.startsWith('/') ||
    entryName.includes('\\') ||
    /^[A-Za-z]:/.test(entryName) ||
    segments.includes('..') ||
    entryName.includes('\0');
  if (unsafe) throw new PathTraversalError(entryName, destination);

  const root = path.resolve(destination);
  const target = path.resolve(root, ...segments);
  const relative = path.relative(root, target);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathTraversalError(entryName, destination);
  }
  return target;
}

/** Tree-relative, `/`-separated paths of every regular file under `dir`. */
export async function listTreeFiles(dir: string): Promise<string[]> {
  const out: string[] = [];
  const walk = async (rel: string): Promise<void> => {
    const entries = await fs.readdir(path.join(dir, rel), { withFileTypes: true });
    for (const entry of entries) {
      const child = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) await walk(child);
      else if (entry.isFile()) out.push(child);
    }
  };
  await walk('');
  return out;
}

/** Throw MissingPartError unless `<dir>/<part>` is a file. */
export async function assertPartExists(dir: string, part: string): Promise<void> {
  const stat = await fs.stat(path.join(dir, part)).catch(() => null);
  if (!stat?.isFile()) throw new MissingPartError(part, dir);
}
