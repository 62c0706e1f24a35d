import { isScalar, parseDocument, visit, type Scalar } from 'yaml';
import type { z } from 'zod';
import { toVariableContext, type VariableContext } from '../flux/context.js';
import { ParseError, errorMessage } from '../errors.js';
import { parseOutputSpec, type OutputSpec } from '../output/spec.js';
import {
  BUNDLE_MANIFEST,
  BundleManifestSchema,
  FLUX_SCHEMA_FILE,
  FLUX_VALUES_FILE,
  FluxSchemaFileSchema,
  ManifestParseError,
  PARTIAL_MANIFEST,
  PartialManifestSchema,
  type BundleManifestData,
  type FluxVariable,
  type PartialManifest,
} from './schema.js';

/**
 * A bundle manifest with its output declaration parsed into a tagged variant
 */
export interface BundleManifest extends Omit<BundleManifestData, 'output'> {
  output: OutputSpec;
  rawOutput: unknown;
}

// Manifest fields read as written, so `version: 1.10` or `default: 007` keep their text
const TEXT_FIELDS: ReadonlySet<string> = new Set(['default', 'version', 'label', 'value']);

function keepSource(node: Scalar, kinds: ReadonlyArray<'number' | 'boolean'>): void {
  const kind = typeof node.value;
  if (node.source !== undefined && kinds.some((k) => k === kind)) {
    node.value = node.source;
  }
}

/**
 * Parse YAML with the core schema, then restore the source text of scalars
 * that are strings by nature: every number in a values file, or the
 * TEXT_FIELDS of a manifest.
 */
function readYaml(content: string, file: string, mode: 'manifest' | 'values' = 'manifest'): unknown {
  const doc = parseDocument(content);
  const [error] = doc.errors;
  if (error) {
    throw new ManifestParseError(`${file}: invalid YAML: ${errorMessage(error)}`, file);
  }

  if (mode === 'values') {
    visit(doc, {
      Scalar(_, node) {
        keepSource(node, ['number']);
      },
    });
  } else {
    visit(doc, {
      Pair(_, pair) {
        const { key, value } = pair;
        const named = isScalar(key) && typeof key.value === 'string' && TEXT_FIELDS.has(key.value);
        if (named && isScalar(value)) {
          keepSource(value, ['number', 'boolean']);
        }
      },
    });
  }

  return doc.toJS();
}

function validateShape<T extends z.ZodTypeAny>(schema: T, data: unknown, file: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const first = result.error.errors[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new ManifestParseError(
      `${file}: ${first?.message ?? 'invalid document'}${where}`,
      file,
      result.error
    );
  }
  return result.data;
}

/**
 * Parse `bundle.yaml` content
 *
 * @throws ManifestParseError if the YAML or its shape is invalid
 * @throws ParseError if the output declaration is malformed
 */
export function parseBundleManifest(content: string, file = BUNDLE_MANIFEST): BundleManifest {
  const raw = readYaml(content, file);
  if (raw === null || raw === undefined) {
    throw new ManifestParseError(`${file}: manifest is empty`, file);
  }

  const data = validateShape(BundleManifestSchema, raw, file);
  return { ...data, output: parseOutputSpec(data.output, file), rawOutput: data.output };
}

/**
 * Parse `partial.yaml` content
 */
export function parsePartialManifest(content: string, file = PARTIAL_MANIFEST): PartialManifest {
  const raw = readYaml(content, file);
  if (raw === null || raw === undefined) {
    throw new ManifestParseError(`${file}: manifest is empty`, file);
  }
  return validateShape(PartialManifestSchema, raw, file);
}

/**
 * Parse `flux.schema.yaml`: a top-level list of variable declarations
 */
export function parseFluxSchemaFile(content: string, file = FLUX_SCHEMA_FILE): FluxVariable[] {
  return validateShape(FluxSchemaFileSchema, readYaml(content, file), file) ?? [];
}

/**
 * Parse a values file (`flux.yaml` or a user-supplied one) into a context
 */
export function parseFluxValues(content: string, file = FLUX_VALUES_FILE): VariableContext {
  const raw = readYaml(content, file, 'values');
  try {
    return toVariableContext(raw, file);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ManifestParseError(error.message, file);
    }
    throw error;
  }
}
