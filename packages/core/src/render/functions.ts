import { isRecord } from '../flux/context.js';

/**
 * Value semantics and built-in functions of the template engine.
 *
 * Runtime values are whatever the data holds: variable contexts, or arbitrary
 * decoded JSON during discovery parsing, so they are typed as `unknown`.
 */

export class FunctionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FunctionError';
  }
}

type ValueKind = 'nil' | 'bool' | 'number' | 'string' | 'list' | 'map';

export function kindOf(value: unknown): ValueKind {
  if (value === undefined || value === null) return 'nil';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  if (Array.isArray(value)) return 'list';
  return 'map';
}

/**
 * Empty values are false: nil, false, 0, "" and empty lists or maps.
 * Any non-empty string is true, including "false".
 */
export function isTruthy(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

export function formatValue(value: unknown, missing = ''): string {
  if (value === undefined || value === null) return missing;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return `[${items.map((item) => formatValue(item, '<nil>')).join(' ')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${key}:${formatValue(value[key], '<nil>')}`);
    return `map[${entries.join(' ')}]`;
  }
  return String(value);
}

// ============================================================================
// Printing
// ============================================================================

function sprint(args: unknown[]): string {
  let out = '';
  args.forEach((arg, i) => {
    // Operands are separated by a space only when neither side is a string
    if (i > 0 && typeof arg !== 'string' && typeof args[i - 1] !== 'string') {
      out += ' ';
    }
    out += formatValue(arg, '<nil>');
  });
  return out;
}

function sprintln(args: unknown[]): string {
  return `${args.map((arg) => formatValue(arg, '<nil>')).join(' ')}\n`;
}

function formatVerb(verb: string, arg: unknown): string {
  switch (verb) {
    case 'v':
      return formatValue(arg, '<nil>');
    case 's':
      return typeof arg === 'string' ? arg : `%!s(${formatValue(arg, '<nil>')})`;
    case 'q':
      return typeof arg === 'string' ? JSON.stringify(arg) : `%!q(${formatValue(arg, '<nil>')})`;
    case 'd':
      return typeof arg === 'number' && Number.isInteger(arg)
        ? String(arg)
        : `%!d(${formatValue(arg, '<nil>')})`;
    case 't':
      return typeof arg === 'boolean' ? String(arg) : `%!t(${formatValue(arg, '<nil>')})`;
    default:
      return `%!${verb}(${formatValue(arg, '<nil>')})`;
  }
}

function sprintf(format: unknown, args: unknown[]): string {
  if (typeof format !== 'string') {
    throw new FunctionError(`printf: format must be a string, got ${kindOf(format)}`);
  }

  let out = '';
  let next = 0;
  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    if (ch !== '%') {
      out += ch;
      continue;
    }
    const verb = format[i + 1];
    i++;
    if (verb === undefined) {
      out += '%!(NOVERB)';
    } else if (verb === '%') {
      out += '%';
    } else if (next >= args.length) {
      out += `%!${verb}(MISSING)`;
    } else {
      out += formatVerb(verb, args[next++]);
    }
  }
  return out;
}

// ============================================================================
// Comparison
// ============================================================================

function basicKind(value: unknown, fn: string): 'bool' | 'number' | 'string' {
  const kind = kindOf(value);
  if (kind === 'bool' || kind === 'number' || kind === 'string') return kind;
  throw new FunctionError(`${fn}: invalid type for comparison`);
}

function equal(fn: string, left: unknown, right: unknown): boolean {
  const leftNil = kindOf(left) === 'nil';
  const rightNil = kindOf(right) === 'nil';
  if (leftNil || rightNil) return leftNil && rightNil;

  if (basicKind(left, fn) !== basicKind(right, fn)) {
    throw new FunctionError(`${fn}: incompatible types for comparison`);
  }
  return left === right;
}

function less(fn: string, left: unknown, right: unknown): boolean {
  const kind = basicKind(left, fn);
  if (kind !== basicKind(right, fn)) {
    throw new FunctionError(`${fn}: incompatible types for comparison`);
  }
  if (typeof left === 'number' && typeof right === 'number') return left < right;
  if (typeof left === 'string' && typeof right === 'string') return left < right;
  throw new FunctionError(`${fn}: invalid type for comparison`);
}

function arity(fn: string, args: unknown[], count: number): void {
  if (args.length !== count) {
    throw new FunctionError(`wrong number of args for ${fn}: want ${count} got ${args.length}`);
  }
}

// ============================================================================
// Collections
// ============================================================================

function length(value: unknown): number {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (isRecord(value)) return Object.keys(value).length;
  throw new FunctionError(`len of type ${kindOf(value)}`);
}

function indexInto(item: unknown, keys: unknown[]): unknown {
  let current = item;
  for (const key of keys) {
    if (Array.isArray(current)) {
      const items: unknown[] = current;
      if (typeof key !== 'number' || !Number.isInteger(key)) {
        throw new FunctionError(`cannot index slice/array with type ${kindOf(key)}`);
      }
      if (key < 0 || key >= items.length) {
        throw new FunctionError(`index out of range: ${key}`);
      }
      current = items[key];
    } else if (isRecord(current)) {
      if (typeof key !== 'string') {
        throw new FunctionError(`value has type ${kindOf(key)}; should be string`);
      }
      current = Object.hasOwn(current, key) ? current[key] : undefined;
    } else if (current === undefined || current === null) {
      throw new FunctionError('index of untyped nil');
    } else {
      throw new FunctionError(`can't index item of type ${kindOf(current)}`);
    }
  }
  return current;
}

export type TemplateFunction = (args: unknown[]) => unknown;

/**
 * Eagerly evaluated built-ins. `and`, `or` and `partial` are handled by the
 * executor because they need lazy arguments or render state.
 */
export const BUILTIN_FUNCTIONS: ReadonlyMap<string, TemplateFunction> = new Map<
  string,
  TemplateFunction
>([
  [
    'not',
    (args) => {
      arity('not', args, 1);
      return !isTruthy(args[0]);
    },
  ],
  [
    'len',
    (args) => {
      arity('len', args, 1);
      return length(args[0]);
    },
  ],
  [
    'index',
    (args) => {
      if (args.length === 0) throw new FunctionError('wrong number of args for index: want at least 1 got 0');
      return indexInto(args[0], args.slice(1));
    },
  ],
  ['print', (args) => sprint(args)],
  ['println', (args) => sprintln(args)],
  ['printf', (args) => sprintf(args[0], args.slice(1))],
  [
    'eq',
    (args) => {
      if (args.length < 2) throw new FunctionError('missing argument for comparison');
      return args.slice(1).some((arg) => equal('eq', args[0], arg));
    },
  ],
  [
    'ne',
    (args) => {
      arity('ne', args, 2);
      return !equal('ne', args[0], args[1]);
    },
  ],
  [
    'lt',
    (args) => {
      arity('lt', args, 2);
      return less('lt', args[0], args[1]);
    },
  ],
  [
    'le',
    (args) => {
      arity('le', args, 2);
      return less('le', args[0], args[1]) || equal('le', args[0], args[1]);
    },
  ],
  [
    'gt',
    (args) => {
      arity('gt', args, 2);
      return !less('gt', args[0], args[1]) && !equal('gt', args[0], args[1]);
    },
  ],
  [
    'ge',
    (args) => {
      arity('ge', args, 2);
      return !less('ge', args[0], args[1]);
    },
  ],
]);

export const LAZY_FUNCTIONS = ['and', 'or'] as const;
export const PARTIAL_FUNCTION = 'partial';

/**
 * Every name a template may call
 */
export function isKnownFunction(name: string): boolean {
  return (
    BUILTIN_FUNCTIONS.has(name) ||
    LAZY_FUNCTIONS.some((lazy) => lazy === name) ||
    name === PARTIAL_FUNCTION
  );
}
