/**
 * fluxcast core
 *
 * Renders parameterized document bundles into a project's file tree
 */

export { DiagnosticCollector } from './diagnostics.js';
export {
  ExternalCommandError,
  ParseError,
  ResolutionError,
  ValidationError,
  errorMessage,
} from './errors.js';
export { createConsoleLogger } from './logger.js';

export type {
  Diagnostic,
  DiagnosticSeverity,
  DiagnosticSink,
  LogLevel,
  Logger,
  RenderedFile,
  ResolvedFile,
} from './types.js';

// Variable resolution
export * from './flux/index.js';

// Template engine
export * from './render/index.js';

// Partials
export * from './partials/index.js';

// Discovery commands
export * from './discovery/index.js';

// Output mapping
export * from './output/index.js';

// Manifests and bundle loading
export * from './manifest/index.js';

// File trees
export * from './tree/index.js';

// Validation
export * from './temper/index.js';

// Rendering a whole bundle
export * from './cast/index.js';
