import { describe, it, expect } from 'vitest';
import { DiagnosticCollector } from '../../diagnostics.js';
import { ResolutionError } from '../../errors.js';
import { renderTemplate } from '../../render/renderer.js';
import { MemoryFileTree } from '../../tree/file-tree.js';
import { CircularPartialError, PartialNotFoundError, PartialResolver } from '../resolver.js';

function resolverFor(files: Record<string, string>, context = {}): PartialResolver {
  return new PartialResolver({ roots: [new MemoryFileTree(files, 'bundle')], context });
}

describe('PartialResolver', () => {
  describe('lookup', () => {
    it('should render a bare partial with the shared context', () => {
      const resolver = resolverFor({ 'partials/footer.md': 'Org: {{org}}' }, { org: 'acme' });

      expect(resolver.resolve('footer')).toBe('Org: acme');
    });

    it('should prefer a partial directory over a bare file and concatenate its files in order', () => {
      const resolver = resolverFor({
        'partials/header.md': 'bare',
        'partials/header/partial.yaml': 'name: header\nfiles:\n  - intro.md\n  - body.md\n',
        'partials/header/intro.md': 'intro\n',
        'partials/header/body.md': 'body {{org}}\n',
      }, { org: 'acme' });

      expect(resolver.resolve('header')).toBe('intro\nbody acme\n');
    });

    it('should take the first root that has the partial', () => {
      const resolver = new PartialResolver({
        roots: [
          new MemoryFileTree({ 'partials/a.md': 'bundle a' }, 'bundle'),
          new MemoryFileTree({ 'partials/a.md': 'shared a', 'partials/b.md': 'shared b' }, 'shared'),
        ],
        context: {},
      });

      expect(resolver.resolve('a')).toBe('bundle a');
      expect(resolver.resolve('b')).toBe('shared b');
    });

    it('should list every searched root when a partial is missing', () => {
      const resolver = new PartialResolver({
        roots: [new MemoryFileTree({}, 'bundle'), new MemoryFileTree({}, 'shared')],
        context: {},
      });

      expect(() => resolver.resolve('nope')).toThrow(PartialNotFoundError);
      expect(() => resolver.resolve('nope')).toThrow(
        'partial "nope" not found (searched: bundle/partials, shared/partials)'
      );
    });

    it('should reject names that leave the partials directory', () => {
      const resolver = resolverFor({ 'secret.md': 'x' });

      expect(() => resolver.resolve('../secret')).toThrow('invalid partial name "../secret"');
      expect(() => resolver.resolve('')).toThrow(ResolutionError);
    });
  });

  describe('partial manifests', () => {
    it('should reject files outside the partial directory', () => {
      const resolver = resolverFor({
        'partials/h/partial.yaml': 'files:\n  - ../other.md\n',
        'partials/other.md': 'x',
      });

      expect(() => resolver.resolve('h')).toThrow('partial "h" file "../other.md" is outside partials/h');
    });

    it('should fail for a listed file that does not exist', () => {
      const resolver = resolverFor({ 'partials/h/partial.yaml': 'files:\n  - gone.md\n' });

      expect(() => resolver.resolve('h')).toThrow('partial "h" file "gone.md" not found');
    });

    it('should wrap manifest parse failures', () => {
      const resolver = resolverFor({ 'partials/h/partial.yaml': 'files: oops\n' });

      expect(() => resolver.resolve('h')).toThrow(
        'parsing partial "h" manifest: partials/h/partial.yaml: Expected array, received string at files'
      );
    });
  });

  describe('nesting', () => {
    it('should resolve nested partials', () => {
      const resolver = resolverFor({
        'partials/outer.md': '[{{partial "inner"}}]',
        'partials/inner.md': 'inner',
      });

      expect(resolver.resolve('outer')).toBe('[inner]');
    });

    it('should allow the same partial more than once outside a cycle', () => {
      const resolver = resolverFor({
        'partials/page.md': '{{partial "line"}}{{partial "line"}}',
        'partials/line.md': '-',
      });

      expect(resolver.resolve('page')).toBe('--');
    });

    it('should detect a partial that references itself', () => {
      const resolver = resolverFor({ 'partials/self.md': 'again: {{partial "self"}}' });

      expect(() => resolver.resolve('self')).toThrow(CircularPartialError);
      expect(() => resolver.resolve('self')).toThrow('circular partial reference detected: self -> self');
    });

    it('should detect cycles at any depth and name the chain', () => {
      const resolver = resolverFor({
        'partials/top.md': '{{partial "a"}}',
        'partials/a.md': '{{partial "b"}}',
        'partials/b.md': '{{partial "c"}}',
        'partials/c.md': '{{partial "a"}}',
      });

      try {
        resolver.resolve('top');
        expect.fail('expected a cycle');
      } catch (error) {
        expect(error).toBeInstanceOf(CircularPartialError);
        if (error instanceof CircularPartialError) {
          expect(error.chain).toEqual(['a', 'b', 'c', 'a']);
          expect(error.message).toBe('circular partial reference detected: a -> b -> c -> a');
        }
      }
    });

    it('should surface cycles through a document render', () => {
      const resolver = resolverFor({ 'partials/self.md': '{{partial "self"}}' });

      expect(() => renderTemplate('x {{partial "self"}}', {}, { partials: resolver })).toThrow(
        'circular partial reference detected: self -> self'
      );
    });

    it('should keep separate resolutions independent', () => {
      const resolver = resolverFor({
        'partials/a.md': 'A',
        'partials/bad.md': '{{partial "bad"}}',
      });

      expect(() => resolver.resolve('bad')).toThrow(CircularPartialError);
      expect(resolver.resolve('a')).toBe('A');
    });
  });

  it('should report unresolved variables against the partial file', () => {
    const diagnostics = new DiagnosticCollector();
    const resolver = new PartialResolver({
      roots: [new MemoryFileTree({ 'partials/p.md': 'Hi {{missing}}' }, 'bundle')],
      context: {},
      diagnostics,
    });

    expect(resolver.resolve('p')).toBe('Hi ');
    expect(diagnostics.all()).toEqual([
      {
        severity: 'warning',
        message: 'unresolved template variable: {{.missing}}',
        file: 'bundle:partials/p.md',
      },
    ]);
  });
});
