import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { MemoryFileTree } from '../../tree/file-tree.js';
import type { Logger } from '../../types.js';
import { BundleLoader, effectiveOutput } from '../loader.js';
import { parseBundleManifest } from '../parser.js';
import { ManifestParseError } from '../schema.js';

const MANIFEST = `apiVersion: fluxcast/v1
kind: bundle
name: demo
version: 1.0.0
flux:
  - name: org
    type: string
ignore:
  - drafts/**
`;

function createLogger(): Logger {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe('BundleLoader', () => {
  describe('load', () => {
    it('should fail without a manifest', () => {
      const loader = new BundleLoader();

      expect(() => loader.load(new MemoryFileTree({ 'a.md': 'x' }))).toThrow(ManifestParseError);
      expect(() => loader.load(new MemoryFileTree({ 'a.md': 'x' }))).toThrow(
        'bundle.yaml not found in memory'
      );
    });

    it('should load the manifest with inline declarations', () => {
      const tree = new MemoryFileTree({ 'bundle.yaml': MANIFEST });
      const bundle = new BundleLoader().load(tree);

      expect(bundle.manifest.name).toBe('demo');
      expect(bundle.schema.map((v) => v.name)).toEqual(['org']);
      expect(bundle.defaults).toEqual({});
      expect(bundle.output).toEqual({ kind: 'absent' });
      expect(bundle.ignore).toEqual(['drafts/**']);
      expect(bundle.tree).toBe(tree);
    });

    it('should prefer a non-empty schema file over inline declarations', () => {
      const tree = new MemoryFileTree({
        'bundle.yaml': MANIFEST,
        'flux.schema.yaml': '- name: board\n  type: string\n  default: Engineering\n',
      });

      expect(new BundleLoader().load(tree).schema.map((v) => v.name)).toEqual(['board']);
    });

    it('should read defaults from flux.yaml and take output from it when the manifest has none', () => {
      const tree = new MemoryFileTree({
        'bundle.yaml': MANIFEST,
        'flux.yaml': 'org: acme\noutput: .claude\n',
      });

      const bundle = new BundleLoader().load(tree);

      expect(bundle.defaults).toEqual({ org: 'acme' });
      expect(bundle.output).toEqual({ kind: 'parent', path: '.claude' });
    });

    it('should keep the manifest output over the one in flux.yaml', () => {
      const tree = new MemoryFileTree({
        'bundle.yaml': `${MANIFEST}output:\n  commands: .claude/commands\n`,
        'flux.yaml': 'org: acme\noutput: .other\n',
      });

      const bundle = new BundleLoader().load(tree);

      expect(bundle.defaults).toEqual({ org: 'acme' });
      expect(bundle.output).toEqual({
        kind: 'explicit',
        entries: [{ source: 'commands', dest: '.claude/commands', process: true }],
      });
    });
  });

  describe('effectiveOutput', () => {
    it('should take the values file mapping only when the manifest declares none', () => {
      const manifest = parseBundleManifest(MANIFEST);

      expect(effectiveOutput(manifest, { org: 'acme', output: '.claude' })).toEqual({
        defaults: { org: 'acme' },
        output: { kind: 'parent', path: '.claude' },
        source: 'flux.yaml',
      });
      expect(effectiveOutput(manifest, { org: 'acme' })).toEqual({
        defaults: { org: 'acme' },
        output: { kind: 'absent' },
        source: 'bundle.yaml',
      });
    });

    it('should reject a malformed mapping in the values file', () => {
      const manifest = parseBundleManifest(MANIFEST);

      expect(() => effectiveOutput(manifest, { output: { commands: { target: 'x' } } })).toThrow(
        /^invalid output specification: /
      );
    });
  });

  describe('loadFromDirectory', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'fluxcast-bundle-'));
      await mkdir(join(dir, 'commands'));
      await writeFile(join(dir, 'bundle.yaml'), MANIFEST);
      await writeFile(join(dir, 'commands', 'hello.md'), 'Hello {{org}}\n');
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load a bundle from disk', async () => {
      const logger = createLogger();
      const bundle = await new BundleLoader(logger).loadFromDirectory(dir);

      expect(bundle.manifest.name).toBe('demo');
      expect(bundle.tree.files()).toEqual(['bundle.yaml', 'commands/hello.md']);
      expect(logger.debug).toHaveBeenCalledWith(`Loaded 2 files from ${dir}`);
    });

    it('should log and rethrow failures', async () => {
      const logger = createLogger();
      const missing = join(dir, 'missing');

      await expect(new BundleLoader(logger).loadFromDirectory(missing)).rejects.toThrow('ENOENT');
      expect(logger.warn).toHaveBeenCalledWith(`Failed to load bundle from ${missing}`, {
        error: expect.stringContaining('ENOENT'),
      });
    });
  });
});
