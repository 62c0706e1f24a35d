import { readFile, readdir } from 'fs/promises';
import { join, relative, sep } from 'path';
import type { Logger } from '../types.js';
import { MemoryFileTree } from './file-tree.js';

const DEFAULT_EXCLUDES = ['.git', 'node_modules'];

export interface TreeLoadOptions {
  exclude?: string[]; // directory or file names skipped at any depth
  logger?: Logger;
}

async function collect(
  root: string,
  dir: string,
  exclude: Set<string>,
  files: Record<string, Buffer>
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (exclude.has(entry.name)) continue;

    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      await collect(root, fullPath, exclude, files);
    } else if (entry.isFile()) {
      const key = relative(root, fullPath).split(sep).join('/');
      files[key] = await readFile(fullPath);
    }
  }
}

/**
 * Load a directory into an in-memory file tree.
 * Contents are kept as raw bytes. Symlinks and special files are skipped.
 *
 * @param dir - Bundle root directory
 */
export async function loadFileTree(dir: string, options: TreeLoadOptions = {}): Promise<MemoryFileTree> {
  const exclude = new Set([...DEFAULT_EXCLUDES, ...(options.exclude ?? [])]);
  const files: Record<string, Buffer> = {};

  await collect(dir, dir, exclude, files);

  options.logger?.debug(`Loaded ${Object.keys(files).length} files from ${dir}`);

  return new MemoryFileTree(files, dir);
}
