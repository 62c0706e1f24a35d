import { DiagnosticCollector } from '../diagnostics.js';
import { errorMessage } from '../errors.js';
import type { VariableContext } from '../flux/context.js';
import { effectiveOutput, type EffectiveOutput } from '../manifest/loader.js';
import {
  parseBundleManifest,
  parseFluxSchemaFile,
  parseFluxValues,
  parsePartialManifest,
  type BundleManifest,
} from '../manifest/parser.js';
import {
  BUNDLE_MANIFEST,
  FLUX_SCHEMA_FILE,
  FLUX_VALUES_FILE,
  PARTIAL_MANIFEST,
  type FluxVariable,
} from '../manifest/schema.js';
import {
  validateBundleManifest,
  validateFluxDeclarations,
  validatePartialManifest,
} from '../manifest/validation.js';
import { resolveOutput } from '../output/mapper.js';
import { checkTemplateSyntax } from '../render/renderer.js';
import type { FileTree } from '../tree/file-tree.js';
import type { Logger } from '../types.js';

export type BundleKind = 'bundle' | 'partial';

/**
 * Outcome of one validation pass: every diagnostic plus what was detected
 */
export class TemperResult extends DiagnosticCollector {
  kind?: BundleKind;
  name = '';
  version = '';
}

export interface TemperOptions {
  logger?: Logger;
}

// Manifest file lists are relative to their own directories
function checkReferences(tree: FileTree, manifest: BundleManifest, result: TemperResult): void {
  const lists: Array<[string, string[]]> = [
    ['commands', manifest.commands],
    ['skills', manifest.skills],
    ['workflows', manifest.workflows],
  ];

  for (const [dir, entries] of lists) {
    for (const entry of entries) {
      const path = `${dir}/${entry}`;
      if (!tree.isFile(path)) {
        result.error(`referenced file not found: ${path}`, BUNDLE_MANIFEST);
      }
    }
  }
}

// Checks the same declaration a cast would use, wherever it was written
function checkOutput(
  tree: FileTree,
  manifest: BundleManifest,
  values: VariableContext,
  result: TemperResult
): void {
  let effective: EffectiveOutput;
  try {
    effective = effectiveOutput(manifest, values);
  } catch (error) {
    result.error(`resolving output mapping: ${errorMessage(error)}`, FLUX_VALUES_FILE);
    return;
  }

  if (effective.output.kind === 'absent') return;
  try {
    resolveOutput(effective.output, tree, { ignore: manifest.ignore });
  } catch (error) {
    result.error(`resolving output mapping: ${errorMessage(error)}`, effective.source);
  }
}

function checkFluxSchema(tree: FileTree, manifestFlux: FluxVariable[], result: TemperResult): void {
  const content = tree.read(FLUX_SCHEMA_FILE);
  if (content === undefined) return;

  let schema: FluxVariable[];
  try {
    schema = parseFluxSchemaFile(content);
  } catch (error) {
    result.error(`failed to parse ${FLUX_SCHEMA_FILE}: ${errorMessage(error)}`, FLUX_SCHEMA_FILE);
    return;
  }

  for (const issue of validateFluxDeclarations(schema)) {
    result.error(issue, FLUX_SCHEMA_FILE);
  }

  if (manifestFlux.length > 0 && schema.length > 0) {
    result.warning(
      `flux variables defined in both ${BUNDLE_MANIFEST} and ${FLUX_SCHEMA_FILE}; schema file takes precedence at runtime`
    );
  }
}

// A broken values file is reported and then read as empty
function checkFluxValues(tree: FileTree, result: TemperResult): VariableContext {
  const content = tree.read(FLUX_VALUES_FILE);
  if (content === undefined) return {};
  try {
    return parseFluxValues(content);
  } catch (error) {
    result.error(`failed to parse ${FLUX_VALUES_FILE}: ${errorMessage(error)}`, FLUX_VALUES_FILE);
    return {};
  }
}

function checkTemplates(tree: FileTree, result: TemperResult): void {
  for (const path of tree.files()) {
    if (!path.endsWith('.md')) continue;
    try {
      checkTemplateSyntax(tree.read(path) ?? '', path);
    } catch (error) {
      result.error(`template syntax error: ${errorMessage(error)}`, path);
    }
  }
}

function temperBundle(tree: FileTree, content: string, result: TemperResult): void {
  let manifest: BundleManifest;
  try {
    manifest = parseBundleManifest(content);
  } catch (error) {
    result.error(`failed to parse ${BUNDLE_MANIFEST}: ${errorMessage(error)}`, BUNDLE_MANIFEST);
    return;
  }

  result.name = manifest.name;
  result.version = manifest.version;

  for (const issue of validateBundleManifest(manifest)) {
    result.error(issue, BUNDLE_MANIFEST);
  }
  checkReferences(tree, manifest, result);
  const values = checkFluxValues(tree, result);
  checkOutput(tree, manifest, values, result);
  checkFluxSchema(tree, manifest.flux, result);
}

function temperPartial(tree: FileTree, content: string, result: TemperResult): void {
  try {
    const manifest = parsePartialManifest(content);
    result.name = manifest.name;
    result.version = manifest.version;

    for (const issue of validatePartialManifest(manifest)) {
      result.error(issue, PARTIAL_MANIFEST);
    }
    for (const file of manifest.files) {
      if (!tree.isFile(file)) {
        result.error(`referenced file not found: ${file}`, PARTIAL_MANIFEST);
      }
    }
  } catch (error) {
    result.error(`failed to parse ${PARTIAL_MANIFEST}: ${errorMessage(error)}`, PARTIAL_MANIFEST);
  }
}

/**
 * Validate a bundle or partial package without rendering anything.
 *
 * Checks run independently; a failure in one never hides another. Template
 * syntax is checked for every `.md` file even when the manifest is broken.
 *
 * @example
 * ```typescript
 * const result = temper(await loadFileTree('./my-bundle'));
 * for (const d of result.errors()) console.error(d.file, d.message);
 * ```
 */
export function temper(tree: FileTree, options: TemperOptions = {}): TemperResult {
  const result = new TemperResult();

  const bundleManifest = tree.read(BUNDLE_MANIFEST);
  const partialManifest = tree.read(PARTIAL_MANIFEST);

  if (bundleManifest === undefined && partialManifest === undefined) {
    result.error(`no ${BUNDLE_MANIFEST} or ${PARTIAL_MANIFEST} found`);
    return result;
  }

  if (bundleManifest !== undefined) {
    result.kind = 'bundle';
    temperBundle(tree, bundleManifest, result);
  } else if (partialManifest !== undefined) {
    result.kind = 'partial';
    temperPartial(tree, partialManifest, result);
  }

  checkTemplates(tree, result);

  options.logger?.debug(`Tempered ${result.kind} ${result.name || tree.label}`, {
    errors: result.errors().length,
    warnings: result.warnings().length,
  });

  return result;
}
