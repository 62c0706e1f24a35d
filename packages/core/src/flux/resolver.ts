import { ValidationError } from '../errors.js';
import type { FluxVariable } from '../manifest/schema.js';
import {
  applyLayer,
  getByPath,
  isContext,
  isPathFree,
  scalarToString,
  setByPath,
  type ContextValue,
  type VariableContext,
} from './context.js';

/**
 * Error thrown when resolved flux values violate the schema
 */
export class FluxValidationError extends ValidationError {
  constructor(issues: string[]) {
    super('flux validation failed', issues);
    this.name = 'FluxValidationError';
  }
}

/**
 * Error thrown for malformed `key=value` overrides
 */
export class FluxOverrideError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'FluxOverrideError';
  }
}

export interface FluxOverride {
  key: string;
  value: string;
}

export interface FluxValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Layered inputs, lowest precedence first
 */
export interface FluxSources {
  schema?: FluxVariable[];
  defaults?: VariableContext; // bundle defaults file
  values?: VariableContext[]; // user values files, applied left to right
  overrides?: string[]; // dotted.key=value
}

/**
 * Return a copy of `context` with schema defaults set wherever the variable is absent.
 * Existing keys are never overwritten, including scalars sitting on a prefix of
 * the variable's path, and the input is left untouched.
 */
export function applyDefaults(schema: FluxVariable[], context: VariableContext): VariableContext {
  let result = context;

  for (const variable of schema) {
    if (variable.default === undefined || variable.default === '' || variable.name === '') {
      continue;
    }
    if (isPathFree(result, variable.name)) {
      result = setByPath(result, variable.name, variable.default);
    }
  }

  return result === context ? applyLayer({}, context) : result;
}

/**
 * Parse a `dotted.key=value` override. Only the first `=` splits,
 * so values may contain `=` themselves.
 */
export function parseOverride(raw: string): FluxOverride {
  const separator = raw.indexOf('=');
  if (separator === -1) {
    throw new FluxOverrideError(`invalid override "${raw}": expected key=value`);
  }

  const key = raw.slice(0, separator).trim();
  if (key === '') {
    throw new FluxOverrideError(`invalid override "${raw}": key must not be empty`);
  }

  return { key, value: raw.slice(separator + 1) };
}

/**
 * Apply explicit overrides; each may set or replace any leaf
 */
export function applyOverrides(context: VariableContext, overrides: string[]): VariableContext {
  let result = context;
  for (const raw of overrides) {
    const { key, value } = parseOverride(raw);
    try {
      result = setByPath(result, key, value);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new FluxOverrideError(`invalid override "${raw}": ${error.message}`);
      }
      throw error;
    }
  }
  return result;
}

/**
 * Build the variable context from every layer:
 * schema defaults < defaults file < values files < overrides.
 * Earlier layers only fill gaps; later layers replace leaves.
 */
export function resolveFlux(sources: FluxSources): VariableContext {
  let context: VariableContext = sources.defaults ?? {};

  context = applyDefaults(sources.schema ?? [], context);

  for (const layer of sources.values ?? []) {
    context = applyLayer(context, layer);
  }

  return applyOverrides(context, sources.overrides ?? []);
}

function isEmptyValue(value: ContextValue | undefined): boolean {
  return value === undefined || value === '';
}

function describeValue(value: ContextValue): string {
  return isContext(value) ? 'a mapping' : JSON.stringify(scalarToString(value));
}

// Digits only, and within the range an int renders exactly as written
function isSafeInt(text: string): boolean {
  return /^[+-]?\d+$/.test(text) && Number.isSafeInteger(Number(text));
}

function checkType(variable: FluxVariable, value: ContextValue): string | undefined {
  const { name, type } = variable;

  switch (type) {
    case 'string':
    case 'select':
    case 'list':
      return undefined;
    case 'bool': {
      const text = isContext(value) ? '' : scalarToString(value).toLowerCase();
      if (text !== 'true' && text !== 'false') {
        return `flux "${name}" must be a bool (true/false), got ${describeValue(value)}`;
      }
      return undefined;
    }
    case 'int': {
      if (isContext(value) || !isSafeInt(scalarToString(value))) {
        return `flux "${name}" must be an int, got ${describeValue(value)}`;
      }
      return undefined;
    }
    default:
      return `flux "${name}" has unknown type "${type}"`;
  }
}

/**
 * Validate a context against declared variables. Every violation is
 * collected; nothing stops at the first failure.
 */
export function validate(schema: FluxVariable[], context: VariableContext): FluxValidationResult {
  const errors: string[] = [];

  for (const variable of schema) {
    const value = getByPath(context, variable.name);

    if (variable.required && isEmptyValue(value)) {
      errors.push(`flux "${variable.name}" is required but not provided`);
      continue;
    }

    if (value === undefined || isEmptyValue(value)) {
      continue;
    }

    const issue = checkType(variable, value);
    if (issue) {
      errors.push(issue);
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validate and throw a FluxValidationError carrying every issue
 */
export function assertValidFlux(schema: FluxVariable[], context: VariableContext): void {
  const result = validate(schema, context);
  if (!result.valid) {
    throw new FluxValidationError(result.errors);
  }
}

/**
 * The schema file wins over manifest declarations when it declares anything
 */
export function effectiveSchema(
  manifestFlux: FluxVariable[],
  schemaFile: FluxVariable[] | undefined
): FluxVariable[] {
  return schemaFile && schemaFile.length > 0 ? schemaFile : manifestFlux;
}
