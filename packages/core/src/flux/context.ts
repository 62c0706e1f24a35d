import { ParseError, ValidationError } from '../errors.js';

/**
 * A leaf value in a variable context
 */
export type Scalar = string | number | boolean;

/**
 * Nested mapping from path segment to scalar or nested context.
 * Contexts are never mutated; every operation returns a new one.
 */
export interface VariableContext {
  readonly [key: string]: ContextValue;
}

export type ContextValue = Scalar | VariableContext;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isContext(value: unknown): value is VariableContext {
  return isRecord(value);
}

export function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Split a dotted path ("a.b.c") into its segments
 *
 * @throws ValidationError if the path or any segment is empty
 */
export function splitPath(path: string): string[] {
  const segments = path.split('.');
  if (path === '' || segments.some((s) => s === '')) {
    throw new ValidationError(`invalid variable path "${path}"`);
  }
  return segments;
}

// Own-property write; plain assignment would hit the __proto__ setter.
function defineEntry(target: Record<string, ContextValue>, key: string, value: ContextValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function ownValue(context: VariableContext, key: string): ContextValue | undefined {
  return Object.hasOwn(context, key) ? context[key] : undefined;
}

/**
 * Deep copy of a context
 */
export function cloneContext(context: VariableContext): VariableContext {
  const result: Record<string, ContextValue> = {};
  for (const [key, value] of Object.entries(context)) {
    defineEntry(result, key, isContext(value) ? cloneContext(value) : value);
  }
  return result;
}

/**
 * Look up a dotted path. Returns undefined when any intermediate segment
 * is missing or is not a mapping.
 */
export function getByPath(context: VariableContext, path: string): ContextValue | undefined {
  let current: ContextValue = context;

  for (const segment of path.split('.')) {
    if (!isContext(current)) {
      return undefined;
    }
    const next = ownValue(current, segment);
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }

  return current;
}

/**
 * True when nothing is stored at the dotted path and no prefix of it holds
 * a scalar, so a value can be placed there without replacing anything.
 */
export function isPathFree(context: VariableContext, path: string): boolean {
  let current: ContextValue = context;

  for (const segment of path.split('.')) {
    if (!isContext(current)) {
      return false;
    }
    const next = ownValue(current, segment);
    if (next === undefined) {
      return true;
    }
    current = next;
  }

  return false;
}

function setSegments(
  context: VariableContext,
  segments: string[],
  value: ContextValue
): VariableContext {
  const [head, ...rest] = segments;
  const result: Record<string, ContextValue> = { ...context };

  if (rest.length === 0) {
    defineEntry(result, head, isContext(value) ? cloneContext(value) : value);
    return result;
  }

  // A scalar sitting on an intermediate segment is replaced by a mapping
  const existing = ownValue(context, head);
  const child = isContext(existing) ? existing : {};
  defineEntry(result, head, setSegments(child, rest, value));
  return result;
}

/**
 * Return a new context with `value` stored at the dotted path,
 * creating intermediate mappings as needed.
 */
export function setByPath(
  context: VariableContext,
  path: string,
  value: ContextValue
): VariableContext {
  return setSegments(context, splitPath(path), value);
}

/**
 * Deep-merge `overlay` over `context`. Overlay wins on scalar leaves;
 * nested mappings merge recursively.
 */
export function applyLayer(context: VariableContext, overlay: VariableContext): VariableContext {
  const result: Record<string, ContextValue> = { ...context };

  for (const [key, value] of Object.entries(overlay)) {
    const existing = ownValue(context, key);
    if (isContext(value) && isContext(existing)) {
      defineEntry(result, key, applyLayer(existing, value));
    } else {
      defineEntry(result, key, isContext(value) ? cloneContext(value) : value);
    }
  }

  return result;
}

/**
 * Fill gaps in `context` from `defaults`; existing keys always win.
 */
export function fillGaps(context: VariableContext, defaults: VariableContext): VariableContext {
  return applyLayer(defaults, context);
}

/**
 * String form of a scalar, used for validation and printing
 */
export function scalarToString(value: Scalar): string {
  return typeof value === 'string' ? value : String(value);
}

/**
 * Convert parsed YAML/JSON data into a variable context.
 *
 * Mappings nest, scalars are kept, nulls are dropped and lists of scalars are
 * joined with commas (the list-variable convention).
 *
 * @throws ParseError for values that cannot be represented as context leaves
 */
export function toVariableContext(raw: unknown, source = 'values'): VariableContext {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ParseError(`${source}: expected a mapping at the top level`, source);
  }
  return convertMapping(raw, source, []);
}

function convertMapping(
  raw: Record<string, unknown>,
  source: string,
  trail: string[]
): VariableContext {
  const result: Record<string, ContextValue> = {};

  for (const [key, value] of Object.entries(raw)) {
    const path = [...trail, key];
    if (value === null || value === undefined) {
      continue;
    }
    if (isScalar(value)) {
      defineEntry(result, key, value);
    } else if (Array.isArray(value)) {
      const items: unknown[] = value;
      if (!items.every(isScalar)) {
        throw new ParseError(
          `${source}: "${path.join('.')}" must be a list of scalars`,
          source
        );
      }
      defineEntry(result, key, items.map(scalarToString).join(','));
    } else if (isRecord(value)) {
      defineEntry(result, key, convertMapping(value, source, path));
    } else {
      throw new ParseError(`${source}: unsupported value at "${path.join('.')}"`, source);
    }
  }

  return result;
}
