import { z } from 'zod';
import { ParseError } from '../errors.js';

/**
 * Zod schemas for bundle, partial and flux files
 */

export const BUNDLE_MANIFEST = 'bundle.yaml';
export const PARTIAL_MANIFEST = 'partial.yaml';
export const FLUX_SCHEMA_FILE = 'flux.schema.yaml';
export const FLUX_VALUES_FILE = 'flux.yaml';
export const PARTIALS_DIR = 'partials';

export const FLUX_TYPES = ['string', 'bool', 'int', 'list', 'select'] as const;
export type FluxType = (typeof FLUX_TYPES)[number];

export function isFluxType(value: string): value is FluxType {
  return FLUX_TYPES.some((type) => type === value);
}

// Text fields arrive as source text from YAML; numbers still come from other callers
const textual = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

const DiscoverySpecSchema = z.object({
  command: z.string(),
  parse: z.string().optional(),
  prompt: z.enum(['select', 'input']).default('input'),
  also_sets: z.record(z.number().int().nonnegative()).default({}),
});

const SelectOptionSchema = z.object({
  label: textual,
  value: textual,
});

// name/type stay optional here so the validator can report them by index
export const FluxVariableSchema = z.object({
  name: z.string().default(''),
  description: z.string().optional(),
  type: z.string().default(''),
  required: z.boolean().default(false),
  default: textual.optional(),
  options: z.array(SelectOptionSchema).optional(),
  discover: DiscoverySpecSchema.optional(),
});

export const FluxSchemaFileSchema = z.array(FluxVariableSchema).nullable();

const RequiresSchema = z.object({
  fluxcast: z.string().optional(),
});

const DependencySchema = z.object({
  name: z.string().default(''),
  version: textual.default(''),
});

export const BundleManifestSchema = z.object({
  apiVersion: z.string().default(''),
  kind: z.string().default(''),
  name: z.string().default(''),
  version: textual.default(''),
  description: z.string().optional(),
  author: z
    .object({
      name: z.string().optional(),
      url: z.string().optional(),
    })
    .optional(),
  requires: RequiresSchema.default({}),
  flux: z.array(FluxVariableSchema).default([]),
  dependencies: z.array(DependencySchema).default([]),
  commands: z.array(z.string()).default([]),
  skills: z.array(z.string()).default([]),
  workflows: z.array(z.string()).default([]),
  output: z.unknown().optional(),
  ignore: z.array(z.string()).default([]),
});

export const PartialManifestSchema = z.object({
  apiVersion: z.string().default(''),
  kind: z.string().default(''),
  name: z.string().default(''),
  version: textual.default(''),
  description: z.string().optional(),
  files: z.array(z.string()).default([]),
  requires: RequiresSchema.default({}),
});

// TypeScript types derived from Zod schemas
export type DiscoverySpec = z.infer<typeof DiscoverySpecSchema>;
export type SelectOption = z.infer<typeof SelectOptionSchema>;
export type FluxVariable = z.infer<typeof FluxVariableSchema>;
export type Dependency = z.infer<typeof DependencySchema>;
export type BundleManifestData = z.infer<typeof BundleManifestSchema>;
export type PartialManifest = z.infer<typeof PartialManifestSchema>;

/**
 * Error for manifest files whose YAML or shape is invalid
 */
export class ManifestParseError extends ParseError {
  public readonly errors?: z.ZodError;

  constructor(message: string, file: string, errors?: z.ZodError) {
    super(message, file);
    this.name = 'ManifestParseError';
    this.errors = errors;
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors
      .map((err) => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join('\n');
  }
}
