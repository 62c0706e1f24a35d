import { describe, it, expect } from 'vitest';
import { parseBundleManifest, parsePartialManifest } from '../parser.js';
import {
  validateBundleManifest,
  validateFluxDeclarations,
  validatePartialManifest,
} from '../validation.js';

describe('validateBundleManifest', () => {
  it('should accept a complete manifest', () => {
    const manifest = parseBundleManifest(
      'apiVersion: fluxcast/v1\nkind: bundle\nname: demo\nversion: 1.0.0\nrequires:\n  fluxcast: ^0.1.0\ndependencies:\n  - name: shared\n    version: ">=1.0.0 <2.0.0"\n'
    );

    expect(validateBundleManifest(manifest)).toEqual([]);
  });

  it('should collect every issue in field order', () => {
    const manifest = parseBundleManifest(`kind: agent
version: v1.0.0
requires:
  fluxcast: banana
flux:
  - type: float
  - name: x
dependencies:
  - name: shared
  - version: ^1.0.0
`);

    expect(validateBundleManifest(manifest)).toEqual([
      'apiVersion is required',
      'kind must be "bundle", got "agent"',
      'name is required',
      'version "v1.0.0" is not valid semver',
      'requires.fluxcast "banana" is not a valid version constraint',
      'flux[0].name is required',
      'flux[0].type "float" is not valid (allowed: string, bool, int, list, select)',
      'flux[1].type is required',
      'dependencies[0].version is required',
      'dependencies[1].name is required',
    ]);
  });

  it('should require kind and version', () => {
    const manifest = parseBundleManifest('apiVersion: fluxcast/v1\nname: demo\n');

    expect(validateBundleManifest(manifest)).toEqual(['kind is required', 'version is required']);
  });

  it('should check dependency constraints', () => {
    const manifest = parseBundleManifest(
      'apiVersion: fluxcast/v1\nkind: bundle\nname: demo\nversion: 1.0.0\ndependencies:\n  - name: shared\n    version: banana\n'
    );

    expect(validateBundleManifest(manifest)).toEqual([
      'dependencies[0].version "banana" is not a valid version constraint',
    ]);
  });
});

describe('validatePartialManifest', () => {
  it('should expect the partial kind', () => {
    const manifest = parsePartialManifest('apiVersion: fluxcast/v1\nkind: bundle\nname: header\nversion: 0.1.0\n');

    expect(validatePartialManifest(manifest)).toEqual(['kind must be "partial", got "bundle"']);
  });
});

describe('validateFluxDeclarations', () => {
  it('should accept every supported type', () => {
    const flux = ['string', 'bool', 'int', 'list', 'select'].map((type) => ({
      name: `v_${type}`,
      type,
      required: false,
    }));

    expect(validateFluxDeclarations(flux)).toEqual([]);
  });
});
