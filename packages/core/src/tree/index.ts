/**
 * Tree - read-only bundle file views
 */

export {
  MemoryFileTree,
  compareCodeUnits,
  normalizeTreePath,
  type FileTree,
  type TreeEntry,
} from './file-tree.js';
export { loadFileTree, type TreeLoadOptions } from './loader.js';
