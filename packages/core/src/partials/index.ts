/**
 * Partials - named, nestable document fragments
 */

export {
  CircularPartialError,
  PartialNotFoundError,
  PartialResolver,
  type PartialResolverConfig,
} from './resolver.js';
