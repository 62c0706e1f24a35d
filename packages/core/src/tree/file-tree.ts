import { posix } from 'path';

export interface TreeEntry {
  name: string;
  type: 'file' | 'directory';
}

/**
 * Read-only view of a bundle's files.
 *
 * Paths are relative, `/`-separated and never start with `./`.
 * The root directory is `''`.
 */
export interface FileTree {
  /** Human-readable location, used in error messages */
  readonly label: string;
  /** File content decoded as UTF-8 */
  read(path: string): string | undefined;
  /** Raw file bytes */
  readBytes(path: string): Buffer | undefined;
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
  /** Immediate children of a directory, sorted by name */
  entries(dir: string): TreeEntry[];
  /** Every file under a directory, recursively, sorted */
  walk(dir: string): string[];
  /** Every file in the tree, sorted */
  files(): string[];
}

/**
 * Normalize a tree path: `./a//b/` becomes `a/b`, `.` and `./` become `''`
 */
export function normalizeTreePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, '/'));
  const trimmed = normalized.replace(/^(\.\/)+/, '').replace(/\/+$/, '');
  return trimmed === '.' ? '' : trimmed;
}

export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * FileTree backed by an in-memory map of path to content.
 * String contents are stored as their UTF-8 bytes.
 *
 * @example
 * ```typescript
 * const tree = new MemoryFileTree({
 *   'bundle.yaml': 'name: demo',
 *   'commands/hello.md': 'Hello {{name}}',
 * });
 * tree.walk('commands'); // ['commands/hello.md']
 * ```
 */
export class MemoryFileTree implements FileTree {
  private readonly contents = new Map<string, Buffer>();
  private readonly sorted: string[];

  constructor(
    files: Record<string, string | Buffer>,
    public readonly label = 'memory'
  ) {
    for (const [path, content] of Object.entries(files)) {
      this.contents.set(
        normalizeTreePath(path),
        typeof content === 'string' ? Buffer.from(content, 'utf-8') : content
      );
    }
    this.sorted = [...this.contents.keys()].sort(compareCodeUnits);
  }

  read(path: string): string | undefined {
    return this.readBytes(path)?.toString('utf-8');
  }

  readBytes(path: string): Buffer | undefined {
    return this.contents.get(normalizeTreePath(path));
  }

  isFile(path: string): boolean {
    return this.contents.has(normalizeTreePath(path));
  }

  isDirectory(path: string): boolean {
    const dir = normalizeTreePath(path);
    if (dir === '') return true;
    return this.sorted.some((file) => file.startsWith(`${dir}/`));
  }

  entries(dir: string): TreeEntry[] {
    const base = normalizeTreePath(dir);
    const prefix = base === '' ? '' : `${base}/`;
    const seen = new Map<string, TreeEntry['type']>();

    for (const file of this.sorted) {
      if (!file.startsWith(prefix)) continue;
      const rest = file.slice(prefix.length);
      const slash = rest.indexOf('/');
      if (slash === -1) {
        seen.set(rest, 'file');
      } else {
        seen.set(rest.slice(0, slash), 'directory');
      }
    }

    return [...seen.entries()]
      .map(([name, type]) => ({ name, type }))
      .sort((a, b) => compareCodeUnits(a.name, b.name));
  }

  walk(dir: string): string[] {
    const base = normalizeTreePath(dir);
    if (base === '') return [...this.sorted];
    return this.sorted.filter((file) => file.startsWith(`${base}/`));
  }

  files(): string[] {
    return [...this.sorted];
  }
}
