import { applyLayer, type VariableContext } from '../flux/context.js';
import { effectiveSchema } from '../flux/resolver.js';
import { parseOutputSpec, type OutputSpec } from '../output/spec.js';
import { loadFileTree, type TreeLoadOptions } from '../tree/loader.js';
import type { FileTree } from '../tree/file-tree.js';
import type { Logger } from '../types.js';
import {
  parseBundleManifest,
  parseFluxSchemaFile,
  parseFluxValues,
  type BundleManifest,
} from './parser.js';
import {
  BUNDLE_MANIFEST,
  FLUX_SCHEMA_FILE,
  FLUX_VALUES_FILE,
  ManifestParseError,
  type FluxVariable,
} from './schema.js';

/**
 * Everything needed to render one bundle
 */
export interface Bundle {
  manifest: BundleManifest;
  schema: FluxVariable[]; // effective declarations
  defaults: VariableContext; // from flux.yaml, minus any `output` key
  output: OutputSpec;
  ignore: string[];
  tree: FileTree;
}

export interface EffectiveOutput {
  defaults: VariableContext; // values without the `output` key
  output: OutputSpec;
  source: string; // file the declaration came from
}

/**
 * Settle the output declaration in effect for a bundle: the manifest's own,
 * or a top-level `output` key in `flux.yaml` when the manifest has none.
 * That key is never a variable, so it is dropped from the defaults either way.
 *
 * @throws ParseError if the values file's output declaration is malformed
 */
export function effectiveOutput(manifest: BundleManifest, values: VariableContext): EffectiveOutput {
  if (!Object.hasOwn(values, 'output')) {
    return { defaults: values, output: manifest.output, source: BUNDLE_MANIFEST };
  }

  const { output: fromValues, ...rest } = values;
  const defaults = applyLayer({}, rest);
  if (manifest.output.kind !== 'absent') {
    return { defaults, output: manifest.output, source: BUNDLE_MANIFEST };
  }
  return { defaults, output: parseOutputSpec(fromValues, FLUX_VALUES_FILE), source: FLUX_VALUES_FILE };
}

/**
 * BundleLoader - Reads a bundle's manifest, schema and defaults from a file tree
 *
 * The output declaration comes from `bundle.yaml`, or from a top-level
 * `output` key in `flux.yaml` when the manifest has none.
 *
 * @example
 * ```typescript
 * const loader = new BundleLoader(logger);
 * const bundle = await loader.loadFromDirectory('./my-bundle');
 * console.log(bundle.manifest.name, bundle.schema.length);
 * ```
 */
export class BundleLoader {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Load a bundle from an already-read tree
   *
   * @throws ManifestParseError if a manifest, schema or values file is malformed
   */
  load(tree: FileTree): Bundle {
    const manifestContent = tree.read(BUNDLE_MANIFEST);
    if (manifestContent === undefined) {
      throw new ManifestParseError(`${BUNDLE_MANIFEST} not found in ${tree.label}`, BUNDLE_MANIFEST);
    }

    const manifest = parseBundleManifest(manifestContent);

    const schemaContent = tree.read(FLUX_SCHEMA_FILE);
    const schemaFile = schemaContent === undefined ? undefined : parseFluxSchemaFile(schemaContent);
    const schema = effectiveSchema(manifest.flux, schemaFile);

    const valuesContent = tree.read(FLUX_VALUES_FILE);
    const values = valuesContent === undefined ? {} : parseFluxValues(valuesContent);
    const { defaults, output, source } = effectiveOutput(manifest, values);
    if (source === FLUX_VALUES_FILE) {
      this.logger?.debug(`Using output mapping from ${FLUX_VALUES_FILE}`);
    }

    this.logger?.debug(`Loaded bundle: ${manifest.name}@${manifest.version} from ${tree.label}`, {
      variables: schema.length,
      output: output.kind,
    });

    return { manifest, schema, defaults, output, ignore: manifest.ignore, tree };
  }

  /**
   * Load a bundle from a directory on disk
   */
  async loadFromDirectory(
    dir: string,
    options: Omit<TreeLoadOptions, 'logger'> = {}
  ): Promise<Bundle> {
    try {
      const tree = await loadFileTree(dir, { ...options, logger: this.logger });
      return this.load(tree);
    } catch (error) {
      this.logger?.warn(`Failed to load bundle from ${dir}`, {
        error: error instanceof Error ? error.message : 'Unknown',
      });
      throw error;
    }
  }
}
