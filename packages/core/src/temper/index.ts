/**
 * Temper - dry-run bundle validation
 */

export { TemperResult, temper, type BundleKind, type TemperOptions } from './temper.js';
