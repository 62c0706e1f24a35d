import { minimatch } from 'minimatch';
import { posix } from 'path';
import { ResolutionError } from '../errors.js';
import {
  BUNDLE_MANIFEST,
  FLUX_SCHEMA_FILE,
  FLUX_VALUES_FILE,
  PARTIALS_DIR,
  PARTIAL_MANIFEST,
} from '../manifest/schema.js';
import { compareCodeUnits, type FileTree } from '../tree/file-tree.js';
import type { ResolvedFile } from '../types.js';
import type { OutputEntry, OutputSpec } from './spec.js';

/** Top-level directories never auto-discovered (dot-directories are skipped too) */
export const RESERVED_DIRECTORIES: ReadonlySet<string> = new Set([PARTIALS_DIR]);

/** Root-level metadata files never auto-discovered (dotfiles are skipped too) */
export const RESERVED_ROOT_FILES: ReadonlySet<string> = new Set([
  BUNDLE_MANIFEST,
  PARTIAL_MANIFEST,
  FLUX_VALUES_FILE,
  FLUX_SCHEMA_FILE,
  'README.md',
  'LICENSE',
]);

export class OutputSourceNotFoundError extends ResolutionError {
  public readonly source: string;

  constructor(source: string) {
    super(`output source not found: ${source}`);
    this.name = 'OutputSourceNotFoundError';
    this.source = source;
  }
}

export interface ResolveOutputOptions {
  ignore?: string[]; // minimatch globs; exact file keys are never ignored
}

function isReservedDirectory(name: string): boolean {
  return name.startsWith('.') || RESERVED_DIRECTORIES.has(name);
}

function isReservedRootFile(name: string): boolean {
  return name.startsWith('.') || RESERVED_ROOT_FILES.has(name);
}

/**
 * Destination under the auto-discovery rules, or undefined when the file is
 * not discoverable. Directory content is re-rooted under `parent`; root files
 * always stay at the project root.
 */
function discover(src: string, parent: string): string | undefined {
  const slash = src.indexOf('/');
  if (slash === -1) {
    return isReservedRootFile(src) ? undefined : src;
  }
  if (isReservedDirectory(src.slice(0, slash))) {
    return undefined;
  }
  return parent === '' ? src : posix.join(parent, src);
}

function under(dir: string, file: string): boolean {
  return dir === '' || file.startsWith(`${dir}/`);
}

function relocate(entry: OutputEntry, file: string): string {
  const rest = entry.source === '' ? file : file.slice(entry.source.length + 1);
  return entry.dest === '' ? rest : posix.join(entry.dest, rest);
}

function ignoreMatcher(patterns: string[]): (path: string) => boolean {
  return (path) => patterns.some((pattern) => minimatch(path, pattern, { dot: true }));
}

function sortBySource(files: Iterable<ResolvedFile>): ResolvedFile[] {
  return [...files].sort((a, b) => compareCodeUnits(a.srcPath, b.srcPath));
}

/**
 * Auto-discovery over the whole tree, re-rooting directory content under
 * `parent` (`''` for an absent specification)
 */
function resolveDiscovered(tree: FileTree, parent: string, ignored: (path: string) => boolean): ResolvedFile[] {
  const resolved: ResolvedFile[] = [];
  for (const src of tree.files()) {
    if (ignored(src)) continue;
    const dest = discover(src, parent);
    if (dest !== undefined) {
      resolved.push({ srcPath: src, destPath: dest, process: true });
    }
  }
  return sortBySource(resolved);
}

/**
 * Explicit mapping. A file key always beats an enclosing directory key, and
 * among directory keys the deepest one wins. Files no key covers fall back to
 * auto-discovery.
 */
function resolveExplicit(
  entries: OutputEntry[],
  tree: FileTree,
  ignored: (path: string) => boolean
): ResolvedFile[] {
  const resolved = new Map<string, ResolvedFile>();
  const fileKeys: OutputEntry[] = [];
  const dirKeys: OutputEntry[] = [];

  for (const entry of entries) {
    if (entry.source !== '' && !tree.isDirectory(entry.source)) {
      if (!tree.isFile(entry.source)) {
        throw new OutputSourceNotFoundError(entry.source);
      }
      fileKeys.push(entry);
    } else {
      dirKeys.push(entry);
    }
  }
  dirKeys.sort((a, b) => b.source.length - a.source.length);

  for (const entry of fileKeys) {
    resolved.set(entry.source, { srcPath: entry.source, destPath: entry.dest, process: entry.process });
  }

  for (const src of tree.files()) {
    if (resolved.has(src) || ignored(src)) continue;

    const dirKey = dirKeys.find((entry) => under(entry.source, src));
    if (dirKey) {
      resolved.set(src, { srcPath: src, destPath: relocate(dirKey, src), process: dirKey.process });
      continue;
    }

    const dest = discover(src, '');
    if (dest !== undefined) {
      resolved.set(src, { srcPath: src, destPath: dest, process: true });
    }
  }

  return sortBySource(resolved.values());
}

/**
 * Compute the destination and processing flag of every output file
 *
 * @returns Files sorted by source path
 * @throws OutputSourceNotFoundError when an explicit key names nothing in the tree
 */
export function resolveOutput(
  spec: OutputSpec,
  tree: FileTree,
  options: ResolveOutputOptions = {}
): ResolvedFile[] {
  const ignored = ignoreMatcher(options.ignore ?? []);

  switch (spec.kind) {
    case 'absent':
      return resolveDiscovered(tree, '', ignored);
    case 'parent':
      return resolveDiscovered(tree, spec.path, ignored);
    case 'explicit':
      return resolveExplicit(spec.entries, tree, ignored);
  }
}
