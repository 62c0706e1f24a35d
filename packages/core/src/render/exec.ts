import { ResolutionError, errorMessage } from '../errors.js';
import { isRecord } from '../flux/context.js';
import type { Command, Operand, ParsedTemplate, Pipeline, TemplateNode } from './ast.js';
import { TemplateExecutionError, TemplateParseError } from './errors.js';
import { BUILTIN_FUNCTIONS, FunctionError, formatValue, isTruthy } from './functions.js';

const MAX_DEPTH = 1000;

export interface PartialProvider {
  resolve(name: string): string;
}

export interface ExecuteOptions {
  partials?: PartialProvider;
  missingValue?: string; // printed for missing keys, '' by default
  printMappings?: boolean; // false prints mappings as empty text; true by default
}

interface Variable {
  name: string;
  value: unknown;
}

function fieldOf(value: unknown, path: string[]): unknown {
  let current = value;
  for (const segment of path) {
    if (!isRecord(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Evaluates a parsed template against data
 */
class Executor {
  private readonly out: string[] = [];
  private variables: Variable[] = [];
  private depth = 0;

  constructor(
    private readonly template: ParsedTemplate,
    private readonly options: ExecuteOptions
  ) {}

  run(data: unknown): string {
    this.variables = [{ name: '$', value: data }];
    this.walk(this.template.root, data);
    return this.out.join('');
  }

  private fail(line: number, message: string): never {
    throw new TemplateExecutionError(this.template.name, line, message);
  }

  private walk(nodes: TemplateNode[], dot: unknown): void {
    for (const node of nodes) {
      switch (node.kind) {
        case 'text':
          this.out.push(node.text);
          break;
        case 'action': {
          const value = this.evalPipeline(dot, node.pipeline);
          if (node.pipeline.declarations.length === 0) {
            this.out.push(this.print(value));
          }
          break;
        }
        case 'if':
        case 'with': {
          const scope = this.variables.length;
          const value = this.evalPipeline(dot, node.pipeline);
          if (isTruthy(value)) {
            this.walk(node.body, node.kind === 'with' ? value : dot);
          } else if (node.otherwise) {
            this.walk(node.otherwise, dot);
          }
          this.variables.length = scope;
          break;
        }
        case 'range':
          this.walkRange(node.line, node.pipeline, node.body, node.otherwise, dot);
          break;
        case 'template':
          this.include(
            node.line,
            node.name,
            node.pipeline ? this.evalPipeline(dot, node.pipeline) : undefined
          );
          break;
      }
    }
  }

  private print(value: unknown): string {
    if (this.options.printMappings === false && isRecord(value)) {
      return '';
    }
    return formatValue(value, this.options.missingValue ?? '');
  }

  private walkRange(
    line: number,
    pipeline: Pipeline,
    body: TemplateNode[],
    otherwise: TemplateNode[] | undefined,
    dot: unknown
  ): void {
    const scope = this.variables.length;
    const value = this.evalCommands(dot, pipeline);

    let entries: Array<[unknown, unknown]>;
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      entries = items.map((item, i): [unknown, unknown] => [i, item]);
    } else if (isRecord(value)) {
      entries = Object.keys(value)
        .sort()
        .map((key): [unknown, unknown] => [key, value[key]]);
    } else if (value === undefined || value === null) {
      entries = [];
    } else {
      this.fail(line, `range can't iterate over ${formatValue(value)}`);
    }

    if (entries.length === 0) {
      if (otherwise) this.walk(otherwise, dot);
      return;
    }

    const [first, second] = pipeline.declarations;
    for (const [key, item] of entries) {
      this.variables.length = scope;
      if (second !== undefined) {
        this.variables.push({ name: first, value: key }, { name: second, value: item });
      } else if (first !== undefined) {
        this.variables.push({ name: first, value: item });
      }
      this.walk(body, item);
    }
    this.variables.length = scope;
  }

  private include(line: number, name: string, dot: unknown): void {
    const nodes = this.template.defines.get(name);
    if (!nodes) {
      this.fail(line, `no such template "${name}"`);
    }
    if (++this.depth > MAX_DEPTH) {
      this.fail(line, `exceeded maximum template depth (${MAX_DEPTH})`);
    }

    const saved = this.variables;
    this.variables = [{ name: '$', value: dot }];
    this.walk(nodes, dot);
    this.variables = saved;
    this.depth--;
  }

  // ==========================================================================
  // Pipelines
  // ==========================================================================

  private evalCommands(dot: unknown, pipeline: Pipeline): unknown {
    let value: unknown;
    pipeline.commands.forEach((command, i) => {
      value = this.evalCommand(dot, command, i > 0 ? [value] : []);
    });
    return value;
  }

  private evalPipeline(dot: unknown, pipeline: Pipeline): unknown {
    const value = this.evalCommands(dot, pipeline);

    for (const name of pipeline.declarations) {
      if (pipeline.assign) {
        const target = [...this.variables].reverse().find((v) => v.name === name);
        if (!target) this.fail(pipeline.line, `undefined variable "${name}"`);
        target.value = value;
      } else {
        this.variables.push({ name, value });
      }
    }

    return value;
  }

  private lookupVariable(line: number, name: string): unknown {
    for (let i = this.variables.length - 1; i >= 0; i--) {
      if (this.variables[i].name === name) return this.variables[i].value;
    }
    this.fail(line, `undefined variable "${name}"`);
  }

  private evalCommand(dot: unknown, command: Command, piped: unknown[]): unknown {
    const [head, ...rest] = command.operands;

    if (head.kind === 'function') {
      return this.call(dot, command.line, head.name, rest, piped);
    }

    if (rest.length > 0 || piped.length > 0) {
      this.fail(command.line, `can't give argument to non-function ${describe(head)}`);
    }
    return this.evalOperand(dot, command.line, head);
  }

  private evalOperand(dot: unknown, line: number, operand: Operand): unknown {
    switch (operand.kind) {
      case 'field':
        return fieldOf(dot, operand.path);
      case 'dot':
        return dot;
      case 'variable':
        return fieldOf(this.lookupVariable(line, operand.name), operand.path);
      case 'string':
      case 'number':
      case 'bool':
        return operand.value;
      case 'nil':
        return undefined;
      case 'pipeline':
        return this.evalPipeline(dot, operand.pipeline);
      case 'function':
        return this.call(dot, line, operand.name, [], []);
    }
  }

  private call(
    dot: unknown,
    line: number,
    name: string,
    operands: Operand[],
    piped: unknown[]
  ): unknown {
    if (name === 'and' || name === 'or') {
      return this.shortCircuit(dot, line, name, operands, piped);
    }

    const args = [...operands.map((operand) => this.evalOperand(dot, line, operand)), ...piped];

    try {
      if (name === 'partial') {
        return this.partial(args);
      }
      const fn = BUILTIN_FUNCTIONS.get(name);
      if (!fn) {
        this.fail(line, `function "${name}" not defined`);
      }
      return fn(args);
    } catch (error) {
      if (
        error instanceof ResolutionError ||
        error instanceof TemplateParseError ||
        error instanceof TemplateExecutionError
      ) {
        throw error;
      }
      this.fail(line, `error calling ${name}: ${errorMessage(error)}`);
    }
  }

  private shortCircuit(
    dot: unknown,
    line: number,
    name: 'and' | 'or',
    operands: Operand[],
    piped: unknown[]
  ): unknown {
    const thunks: Array<() => unknown> = [
      ...operands.map((operand) => () => this.evalOperand(dot, line, operand)),
      ...piped.map((value) => () => value),
    ];
    if (thunks.length === 0) {
      this.fail(line, `wrong number of args for ${name}: want at least 1 got 0`);
    }

    let value: unknown;
    for (const thunk of thunks) {
      value = thunk();
      if (isTruthy(value) === (name === 'or')) return value;
    }
    return value;
  }

  private partial(args: unknown[]): string {
    const [name] = args;
    if (args.length !== 1 || typeof name !== 'string') {
      throw new FunctionError('partial expects a single partial name');
    }
    if (!this.options.partials) {
      throw new FunctionError(`no partial resolver available for "${name}"`);
    }
    return this.options.partials.resolve(name);
  }
}

function describe(operand: Operand): string {
  switch (operand.kind) {
    case 'field':
      return `.${operand.path.join('.')}`;
    case 'variable':
      return [operand.name, ...operand.path].join('.');
    case 'string':
      return JSON.stringify(operand.value);
    case 'number':
    case 'bool':
      return String(operand.value);
    default:
      return operand.kind;
  }
}

/**
 * Execute a parsed template against `data`
 *
 * @throws TemplateExecutionError on evaluation failures
 * @throws ResolutionError when a partial cannot be resolved
 */
export function executeTemplate(
  template: ParsedTemplate,
  data: unknown,
  options: ExecuteOptions = {}
): string {
  return new Executor(template, options).run(data);
}
