import { describe, it, expect, vi } from 'vitest';
import { MemoryFileTree } from '../../tree/file-tree.js';
import type { Logger } from '../../types.js';
import { temper } from '../temper.js';

const MANIFEST = `apiVersion: fluxcast/v1
kind: bundle
name: demo
version: 1.0.0
flux:
  - name: org
    type: string
commands:
  - hello.md
`;

describe('temper', () => {
  it('should fail when there is no manifest', () => {
    const result = temper(new MemoryFileTree({ 'notes.md': 'x' }));

    expect(result.kind).toBeUndefined();
    expect(result.all()).toEqual([
      { severity: 'error', message: 'no bundle.yaml or partial.yaml found' },
    ]);
  });

  it('should pass a valid bundle and report what it found', () => {
    const logger: Logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const result = temper(
      new MemoryFileTree({
        'bundle.yaml': MANIFEST,
        'commands/hello.md': 'Hello {{org}}{{if .board}} on {{board}}{{end}}',
      }),
      { logger }
    );

    expect(result.hasErrors()).toBe(false);
    expect(result.size).toBe(0);
    expect(result.kind).toBe('bundle');
    expect(result.name).toBe('demo');
    expect(result.version).toBe('1.0.0');
    expect(logger.debug).toHaveBeenCalledWith('Tempered bundle demo', { errors: 0, warnings: 0 });
  });

  it('should collect every problem in a bundle', () => {
    const result = temper(
      new MemoryFileTree({
        'bundle.yaml': `apiVersion: fluxcast/v1
name: demo
version: 1.0.0
flux:
  - name: org
    type: string
commands:
  - hello.md
  - missing.md
output:
  nope: somewhere
`,
        'flux.schema.yaml': '- name: ratio\n  type: float\n',
        'flux.yaml': '- not a mapping\n',
        'commands/hello.md': 'Hello {{org}}',
        'commands/bad.md': '{{if .x}}never closed',
      })
    );

    expect(result.all()).toEqual([
      { severity: 'error', message: 'kind is required', file: 'bundle.yaml' },
      { severity: 'error', message: 'referenced file not found: commands/missing.md', file: 'bundle.yaml' },
      {
        severity: 'error',
        message: 'failed to parse flux.yaml: flux.yaml: expected a mapping at the top level',
        file: 'flux.yaml',
      },
      {
        severity: 'error',
        message: 'resolving output mapping: output source not found: nope',
        file: 'bundle.yaml',
      },
      {
        severity: 'error',
        message: 'flux[0].type "float" is not valid (allowed: string, bool, int, list, select)',
        file: 'flux.schema.yaml',
      },
      {
        severity: 'warning',
        message:
          'flux variables defined in both bundle.yaml and flux.schema.yaml; schema file takes precedence at runtime',
      },
      {
        severity: 'error',
        message: 'template syntax error: template: commands/bad.md:1: unexpected EOF',
        file: 'commands/bad.md',
      },
    ]);
    expect(result.errors()).toHaveLength(6);
    expect(result.warnings()).toHaveLength(1);
  });

  it('should check an output mapping declared in flux.yaml', () => {
    const result = temper(
      new MemoryFileTree({
        'bundle.yaml': MANIFEST,
        'commands/hello.md': 'Hello {{org}}',
        'flux.yaml': 'org: acme\noutput:\n  missing: somewhere\n',
      })
    );

    expect(result.all()).toEqual([
      {
        severity: 'error',
        message: 'resolving output mapping: output source not found: missing',
        file: 'flux.yaml',
      },
    ]);
  });

  it('should ignore the flux.yaml output mapping when the manifest has one', () => {
    const result = temper(
      new MemoryFileTree({
        'bundle.yaml': `${MANIFEST}output:\n  commands: .claude/commands\n`,
        'commands/hello.md': 'Hello {{org}}',
        'flux.yaml': 'output:\n  missing: somewhere\n',
      })
    );

    expect(result.size).toBe(0);
  });

  it('should still check templates when the manifest does not parse', () => {
    const result = temper(
      new MemoryFileTree({
        'bundle.yaml': 'name: [unclosed',
        'skills/s.md': '{{end}}',
      })
    );

    const [manifestError, templateError] = result.errors();
    expect(result.errors()).toHaveLength(2);
    expect(manifestError.message).toMatch(/^failed to parse bundle\.yaml: bundle\.yaml: invalid YAML: /);
    expect(templateError).toEqual({
      severity: 'error',
      message: 'template syntax error: template: skills/s.md:1: unexpected {{end}}',
      file: 'skills/s.md',
    });
  });

  it('should report a broken flux.schema.yaml', () => {
    const result = temper(
      new MemoryFileTree({
        'bundle.yaml': MANIFEST,
        'commands/hello.md': 'hi',
        'flux.schema.yaml': 'name: not-a-list\n',
      })
    );

    expect(result.errors().map((d) => d.message)).toEqual([
      'failed to parse flux.schema.yaml: flux.schema.yaml: Expected array, received object',
    ]);
  });

  it('should validate a partial package', () => {
    const result = temper(
      new MemoryFileTree({
        'partial.yaml':
          'apiVersion: fluxcast/v1\nkind: partial\nname: header\nversion: 0.1.0\nfiles:\n  - header.md\n  - missing.md\n',
        'header.md': '# {{org}}',
      })
    );

    expect(result.kind).toBe('partial');
    expect(result.name).toBe('header');
    expect(result.version).toBe('0.1.0');
    expect(result.all()).toEqual([
      { severity: 'error', message: 'referenced file not found: missing.md', file: 'partial.yaml' },
    ]);
  });

  it('should treat a tree with both manifests as a bundle', () => {
    const result = temper(
      new MemoryFileTree({
        'bundle.yaml': MANIFEST,
        'partial.yaml': 'kind: partial\n',
        'commands/hello.md': 'hi',
      })
    );

    expect(result.kind).toBe('bundle');
    expect(result.size).toBe(0);
  });
});
