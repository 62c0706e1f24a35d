/**
 * Manifest - bundle, partial and flux file formats
 */

export { BundleLoader, effectiveOutput, type Bundle, type EffectiveOutput } from './loader.js';
export {
  parseBundleManifest,
  parseFluxSchemaFile,
  parseFluxValues,
  parsePartialManifest,
  type BundleManifest,
} from './parser.js';
export {
  BUNDLE_MANIFEST,
  BundleManifestSchema,
  FLUX_SCHEMA_FILE,
  FLUX_TYPES,
  FLUX_VALUES_FILE,
  FluxVariableSchema,
  ManifestParseError,
  PARTIALS_DIR,
  PARTIAL_MANIFEST,
  PartialManifestSchema,
  isFluxType,
  type BundleManifestData,
  type Dependency,
  type DiscoverySpec,
  type FluxType,
  type FluxVariable,
  type PartialManifest,
  type SelectOption,
} from './schema.js';
export {
  validateBundleManifest,
  validateFluxDeclarations,
  validatePartialManifest,
} from './validation.js';
