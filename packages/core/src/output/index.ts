/**
 * Output - maps bundle sources to destination paths
 */

export {
  OutputSourceNotFoundError,
  RESERVED_DIRECTORIES,
  RESERVED_ROOT_FILES,
  resolveOutput,
  type ResolveOutputOptions,
} from './mapper.js';
export { parseOutputSpec, type OutputEntry, type OutputSpec } from './spec.js';
