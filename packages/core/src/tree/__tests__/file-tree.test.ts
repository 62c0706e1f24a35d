import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { MemoryFileTree, normalizeTreePath } from '../file-tree.js';
import { loadFileTree } from '../loader.js';

describe('normalizeTreePath', () => {
  it('should strip leading ./ and trailing slashes', () => {
    expect(normalizeTreePath('./a//b/')).toBe('a/b');
    expect(normalizeTreePath('commands/')).toBe('commands');
  });

  it('should map the root to the empty path', () => {
    expect(normalizeTreePath('.')).toBe('');
    expect(normalizeTreePath('./')).toBe('');
  });

  it('should accept backslash separators', () => {
    expect(normalizeTreePath('a\\b.md')).toBe('a/b.md');
  });
});

describe('MemoryFileTree', () => {
  const tree = new MemoryFileTree(
    {
      'bundle.yaml': 'name: demo',
      './commands/b.md': 'B',
      'commands/a.md': 'A',
      'commands/sub/c.md': 'C',
      'Z.md': 'Z',
    },
    'fixture'
  );

  it('should read files by normalized path', () => {
    expect(tree.read('commands/b.md')).toBe('B');
    expect(tree.read('./commands/a.md')).toBe('A');
    expect(tree.read('commands/missing.md')).toBeUndefined();
  });

  it('should tell files from directories', () => {
    expect(tree.isFile('commands/a.md')).toBe(true);
    expect(tree.isFile('commands')).toBe(false);
    expect(tree.isDirectory('commands')).toBe(true);
    expect(tree.isDirectory('commands/sub/')).toBe(true);
    expect(tree.isDirectory('comm')).toBe(false);
    expect(tree.isDirectory('')).toBe(true);
  });

  it('should list immediate children sorted by name', () => {
    expect(tree.entries('')).toEqual([
      { name: 'Z.md', type: 'file' },
      { name: 'bundle.yaml', type: 'file' },
      { name: 'commands', type: 'directory' },
    ]);
    expect(tree.entries('commands')).toEqual([
      { name: 'a.md', type: 'file' },
      { name: 'b.md', type: 'file' },
      { name: 'sub', type: 'directory' },
    ]);
  });

  it('should walk a directory recursively in sorted order', () => {
    expect(tree.walk('commands')).toEqual(['commands/a.md', 'commands/b.md', 'commands/sub/c.md']);
  });

  it('should list every file in code unit order', () => {
    expect(tree.files()).toEqual([
      'Z.md',
      'bundle.yaml',
      'commands/a.md',
      'commands/b.md',
      'commands/sub/c.md',
    ]);
  });

  it('should keep its label', () => {
    expect(tree.label).toBe('fixture');
  });
});

describe('loadFileTree', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fluxcast-tree-'));
    await mkdir(join(dir, 'commands', 'sub'), { recursive: true });
    await mkdir(join(dir, '.git'));
    await mkdir(join(dir, 'node_modules', 'pkg'), { recursive: true });
    await mkdir(join(dir, 'drafts'));
    await writeFile(join(dir, 'bundle.yaml'), 'name: demo\n');
    await writeFile(join(dir, 'commands', 'a.md'), 'Hello {{name}}\n');
    await writeFile(join(dir, 'commands', 'sub', 'b.md'), 'nested\n');
    await writeFile(join(dir, '.git', 'HEAD'), 'ref: refs/heads/main\n');
    await writeFile(join(dir, 'node_modules', 'pkg', 'index.js'), '');
    await writeFile(join(dir, 'drafts', 'wip.md'), 'wip\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load every file with forward-slash paths', async () => {
    const tree = await loadFileTree(dir, { exclude: ['drafts'] });

    expect(tree.files()).toEqual(['bundle.yaml', 'commands/a.md', 'commands/sub/b.md']);
    expect(tree.read('commands/a.md')).toBe('Hello {{name}}\n');
    expect(tree.label).toBe(dir);
  });

  it('should keep file contents as raw bytes', async () => {
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80]);
    await writeFile(join(dir, 'logo.png'), bytes);

    const tree = await loadFileTree(dir);

    expect(tree.readBytes('logo.png')).toEqual(bytes);
    expect(tree.readBytes('commands/a.md')).toEqual(Buffer.from('Hello {{name}}\n'));
  });

  it('should skip version control and dependency directories by default', async () => {
    const tree = await loadFileTree(dir);

    expect(tree.files()).toEqual([
      'bundle.yaml',
      'commands/a.md',
      'commands/sub/b.md',
      'drafts/wip.md',
    ]);
  });

  it('should fail for a missing directory', async () => {
    await expect(loadFileTree(join(dir, 'missing'))).rejects.toThrow('ENOENT');
  });
});
