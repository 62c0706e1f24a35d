/**
 * Flux - layered variable resolution and validation
 */

export {
  applyLayer,
  cloneContext,
  fillGaps,
  getByPath,
  isContext,
  isPathFree,
  isRecord,
  isScalar,
  scalarToString,
  setByPath,
  splitPath,
  toVariableContext,
  type ContextValue,
  type Scalar,
  type VariableContext,
} from './context.js';

export {
  FluxOverrideError,
  FluxValidationError,
  applyDefaults,
  applyOverrides,
  assertValidFlux,
  effectiveSchema,
  parseOverride,
  resolveFlux,
  validate,
  type FluxOverride,
  type FluxSources,
  type FluxValidationResult,
} from './resolver.js';
