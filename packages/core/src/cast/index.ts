/**
 * Cast - render a whole bundle and write it out
 */

export {
  BundleCaster,
  type CastInput,
  type CastResult,
  type CasterConfig,
  type CasterEvents,
} from './caster.js';
export { writeCastOutput, type WriteOptions } from './writer.js';
