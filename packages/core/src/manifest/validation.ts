import * as semver from 'semver';
import { FLUX_TYPES, isFluxType, type FluxVariable, type PartialManifest } from './schema.js';
import type { BundleManifest } from './parser.js';

const ALLOWED_TYPES = FLUX_TYPES.join(', ');

function checkVersion(version: string, issues: string[]): void {
  if (version === '') {
    issues.push('version is required');
  } else if (semver.valid(version) === null || !/^\d/.test(version)) {
    issues.push(`version "${version}" is not valid semver`);
  }
}

function checkConstraint(field: string, constraint: string | undefined, issues: string[]): void {
  if (constraint !== undefined && constraint !== '' && semver.validRange(constraint) === null) {
    issues.push(`${field} "${constraint}" is not a valid version constraint`);
  }
}

function checkKind(kind: string, expected: string, issues: string[]): void {
  if (kind === '') {
    issues.push('kind is required');
  } else if (kind !== expected) {
    issues.push(`kind must be "${expected}", got "${kind}"`);
  }
}

/**
 * Field checks for flux declarations, reported by position
 */
export function validateFluxDeclarations(flux: FluxVariable[]): string[] {
  const issues: string[] = [];

  flux.forEach((variable, i) => {
    if (variable.name === '') {
      issues.push(`flux[${i}].name is required`);
    }
    if (variable.type === '') {
      issues.push(`flux[${i}].type is required`);
    } else if (!isFluxType(variable.type)) {
      issues.push(`flux[${i}].type "${variable.type}" is not valid (allowed: ${ALLOWED_TYPES})`);
    }
  });

  return issues;
}

/**
 * Check required fields and version formats of a bundle manifest.
 * Every issue is collected.
 */
export function validateBundleManifest(manifest: BundleManifest): string[] {
  const issues: string[] = [];

  if (manifest.apiVersion === '') issues.push('apiVersion is required');
  checkKind(manifest.kind, 'bundle', issues);
  if (manifest.name === '') issues.push('name is required');
  checkVersion(manifest.version, issues);
  checkConstraint('requires.fluxcast', manifest.requires.fluxcast, issues);

  issues.push(...validateFluxDeclarations(manifest.flux));

  manifest.dependencies.forEach((dependency, i) => {
    if (dependency.name === '') {
      issues.push(`dependencies[${i}].name is required`);
    }
    if (dependency.version === '') {
      issues.push(`dependencies[${i}].version is required`);
    } else {
      checkConstraint(`dependencies[${i}].version`, dependency.version, issues);
    }
  });

  return issues;
}

export function validatePartialManifest(manifest: PartialManifest): string[] {
  const issues: string[] = [];

  if (manifest.apiVersion === '') issues.push('apiVersion is required');
  checkKind(manifest.kind, 'partial', issues);
  if (manifest.name === '') issues.push('name is required');
  checkVersion(manifest.version, issues);
  checkConstraint('requires.fluxcast', manifest.requires.fluxcast, issues);

  return issues;
}
