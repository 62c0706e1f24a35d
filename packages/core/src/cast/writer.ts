import { mkdir, writeFile } from 'fs/promises';
import { dirname, join, resolve, sep } from 'path';
import { ResolutionError } from '../errors.js';
import type { Logger, RenderedFile } from '../types.js';

export interface WriteOptions {
  logger?: Logger;
}

/**
 * Write rendered files under `targetDir`, creating directories as needed
 *
 * @returns Absolute paths written, in the order given
 * @throws ResolutionError if a destination would land outside `targetDir`
 */
export async function writeCastOutput(
  result: { files: RenderedFile[] },
  targetDir: string,
  options: WriteOptions = {}
): Promise<string[]> {
  const root = resolve(targetDir);
  const written: string[] = [];

  for (const file of result.files) {
    const destination = resolve(join(root, file.destPath));
    if (!destination.startsWith(`${root}${sep}`)) {
      throw new ResolutionError(`destination escapes target directory: ${file.destPath}`);
    }

    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, file.content);
    options.logger?.debug(`Wrote ${file.destPath}`);
    written.push(destination);
  }

  options.logger?.info(`Wrote ${written.length} files to ${root}`);
  return written;
}
