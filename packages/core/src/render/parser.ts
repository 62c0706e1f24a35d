import type {
  BranchNode,
  Command,
  Operand,
  ParsedTemplate,
  Pipeline,
  TemplateNode,
} from './ast.js';
import { TemplateParseError } from './errors.js';
import { isKnownFunction } from './functions.js';
import { lex, type LexItem, type Token } from './lexer.js';

function isName(token: Token | undefined): token is Token {
  return token !== undefined && token.kind === 'variable' && !token.value.includes('.');
}

type Terminator =
  | { kind: 'end'; line: number }
  | { kind: 'else'; line: number; tokens: Token[] }
  | { kind: 'eof' };

/**
 * Recursive-descent parser over lexed items.
 *
 * Variables are tracked per scope so references to undeclared `$names` fail
 * at parse time, as do calls to unknown functions.
 */
class Parser {
  private position = 0;
  private variables: string[] = ['$'];
  private readonly defines = new Map<string, TemplateNode[]>();

  constructor(
    private readonly name: string,
    private readonly items: LexItem[]
  ) {}

  parse(): ParsedTemplate {
    const { nodes, terminator } = this.parseList(true);
    if (terminator.kind !== 'eof') {
      this.fail(terminator.line, `unexpected {{${terminator.kind}}}`);
    }
    return { name: this.name, root: nodes, defines: this.defines };
  }

  private fail(line: number, message: string): never {
    throw new TemplateParseError(this.name, line, message);
  }

  private parseList(topLevel: boolean): { nodes: TemplateNode[]; terminator: Terminator } {
    const nodes: TemplateNode[] = [];

    while (this.position < this.items.length) {
      const item = this.items[this.position++];
      if (item.kind === 'text') {
        nodes.push({ kind: 'text', text: item.text });
        continue;
      }

      const [first, ...rest] = item.tokens;
      if (first === undefined) {
        this.fail(item.line, 'missing value for command');
      }

      if (first.kind === 'identifier') {
        switch (first.value) {
          case 'end':
            if (rest.length > 0) this.fail(item.line, 'unexpected tokens in end');
            return { nodes, terminator: { kind: 'end', line: item.line } };
          case 'else':
            return { nodes, terminator: { kind: 'else', line: item.line, tokens: rest } };
          case 'if':
          case 'range':
          case 'with':
            nodes.push(this.parseBranch(first.value, rest, item.line));
            continue;
          case 'define':
            if (!topLevel) this.fail(item.line, 'unexpected define in command');
            this.parseDefine(rest, item.line);
            continue;
          case 'block':
            nodes.push(this.parseBlock(rest, item.line));
            continue;
          case 'template':
            nodes.push(this.parseInclude(rest, item.line));
            continue;
        }
      }

      nodes.push({
        kind: 'action',
        line: item.line,
        pipeline: this.parsePipeline(item.tokens, item.line, 'command'),
      });
    }

    return { nodes, terminator: { kind: 'eof' } };
  }

  /**
   * if / range / with, including `else if` and `else with` chains
   */
  private parseBranch(kind: BranchNode['kind'], tokens: Token[], line: number): BranchNode {
    const scope = this.variables.length;
    const pipeline = this.parsePipeline(tokens, line, kind);

    const { nodes: body, terminator } = this.parseList(false);
    let otherwise: TemplateNode[] | undefined;

    if (terminator.kind === 'eof') {
      this.fail(line, 'unexpected EOF');
    }

    if (terminator.kind === 'else') {
      const [next, ...rest] = terminator.tokens;
      if (next !== undefined) {
        // `{{else if ...}}` nests a branch that shares this construct's {{end}}
        const chained = kind === 'with' ? 'with' : 'if';
        if (kind === 'range' || next.kind !== 'identifier' || next.value !== chained) {
          this.fail(terminator.line, `unexpected "${next.value}" in else`);
        }
        otherwise = [this.parseBranch(chained, rest, terminator.line)];
      } else {
        const tail = this.parseList(false);
        if (tail.terminator.kind === 'eof') {
          this.fail(line, 'unexpected EOF');
        }
        if (tail.terminator.kind === 'else') {
          this.fail(tail.terminator.line, 'expected end; found {{else}}');
        }
        otherwise = tail.nodes;
      }
    }

    this.variables.length = scope;
    return { kind, line, pipeline, body, otherwise };
  }

  private templateName(tokens: Token[], line: number, context: string): string {
    const [name] = tokens;
    if (name === undefined || name.kind !== 'string') {
      this.fail(line, `unexpected name in ${context}: expected quoted string`);
    }
    return name.value;
  }

  private parseBody(line: number, context: string): TemplateNode[] {
    const saved = this.variables;
    this.variables = ['$'];
    const { nodes, terminator } = this.parseList(false);
    this.variables = saved;

    if (terminator.kind === 'eof') this.fail(line, 'unexpected EOF');
    if (terminator.kind === 'else') this.fail(terminator.line, `unexpected {{else}} in ${context}`);
    return nodes;
  }

  private parseDefine(tokens: Token[], line: number): void {
    const name = this.templateName(tokens, line, 'define clause');
    if (tokens.length > 1) this.fail(line, 'unexpected tokens in define clause');
    this.defines.set(name, this.parseBody(line, 'define'));
  }

  private parseBlock(tokens: Token[], line: number): TemplateNode {
    const name = this.templateName(tokens, line, 'block clause');
    const pipeline = this.parsePipeline(tokens.slice(1), line, 'block');
    this.defines.set(name, this.parseBody(line, 'block'));
    return { kind: 'template', line, name, pipeline };
  }

  private parseInclude(tokens: Token[], line: number): TemplateNode {
    const name = this.templateName(tokens, line, 'template clause');
    const rest = tokens.slice(1);
    const pipeline = rest.length > 0 ? this.parsePipeline(rest, line, 'template clause') : undefined;
    return { kind: 'template', line, name, pipeline };
  }

  // ==========================================================================
  // Pipelines
  // ==========================================================================

  private parsePipeline(tokens: Token[], line: number, context: string): Pipeline {
    const { declarations, assign, consumed } = this.parseDeclarations(tokens, line, context);
    const body = tokens.slice(consumed);

    if (body.length === 0) {
      this.fail(line, `missing value for ${context}`);
    }

    const commands: Command[] = [];
    let current: Token[] = [];
    let depth = 0;

    for (const token of body) {
      if (token.kind === 'leftParen') depth++;
      if (token.kind === 'rightParen') depth--;
      if (depth < 0) this.fail(token.line, 'unexpected right paren');

      if (token.kind === 'pipe' && depth === 0) {
        commands.push(this.parseCommand(current, line));
        current = [];
      } else {
        current.push(token);
      }
    }
    if (depth > 0) this.fail(line, 'unclosed left paren');
    commands.push(this.parseCommand(current, line));

    // Declared names become visible only after their own pipeline
    if (!assign) this.variables.push(...declarations);

    return { line, declarations, assign, commands };
  }

  private parseDeclarations(
    tokens: Token[],
    line: number,
    context: string
  ): { declarations: string[]; assign: boolean; consumed: number } {
    const [first, second, third, fourth] = tokens;
    if (isName(first) && (second?.kind === 'declare' || second?.kind === 'assign')) {
      const assign = second.kind === 'assign';
      if (assign && !this.variables.includes(first.value)) {
        this.fail(line, `undefined variable "${first.value}"`);
      }
      return { declarations: [first.value], assign, consumed: 2 };
    }

    if (isName(first) && second?.kind === 'comma') {
      if (context !== 'range') {
        this.fail(line, `too many declarations in ${context}`);
      }
      if (!isName(third) || fourth?.kind !== 'declare') {
        this.fail(line, 'expected := after range variables');
      }
      return { declarations: [first.value, third.value], assign: false, consumed: 4 };
    }

    return { declarations: [], assign: false, consumed: 0 };
  }

  private parseCommand(tokens: Token[], line: number): Command {
    if (tokens.length === 0) {
      this.fail(line, 'missing value for command');
    }

    const operands: Operand[] = [];
    let i = 0;
    while (i < tokens.length) {
      const token = tokens[i];
      if (token.kind === 'leftParen') {
        const close = this.matchingParen(tokens, i);
        const inner = tokens.slice(i + 1, close);
        operands.push({
          kind: 'pipeline',
          pipeline: this.parsePipeline(inner, token.line, 'parenthesized pipeline'),
        });
        i = close + 1;
        continue;
      }
      operands.push(this.parseOperand(token));
      i++;
    }

    const [head] = operands;
    if (head?.kind === 'nil') {
      this.fail(line, 'nil is not a command');
    }

    return { operands, line: tokens[0]?.line ?? line };
  }

  private matchingParen(tokens: Token[], open: number): number {
    let depth = 0;
    for (let i = open; i < tokens.length; i++) {
      if (tokens[i].kind === 'leftParen') depth++;
      if (tokens[i].kind === 'rightParen' && --depth === 0) return i;
    }
    this.fail(tokens[open].line, 'unclosed left paren');
  }

  private parseOperand(token: Token): Operand {
    switch (token.kind) {
      case 'field':
        return { kind: 'field', path: token.value.slice(1).split('.') };
      case 'dot':
        return { kind: 'dot' };
      case 'variable': {
        const [name, ...path] = token.value.split('.');
        if (!this.variables.includes(name)) {
          this.fail(token.line, `undefined variable "${name}"`);
        }
        return { kind: 'variable', name, path };
      }
      case 'string':
        return { kind: 'string', value: token.value };
      case 'number': {
        const value = Number(token.value);
        if (!Number.isFinite(value)) this.fail(token.line, `illegal number syntax: ${token.value}`);
        return { kind: 'number', value };
      }
      case 'identifier':
        if (token.value === 'true' || token.value === 'false') {
          return { kind: 'bool', value: token.value === 'true' };
        }
        if (token.value === 'nil') return { kind: 'nil' };
        if (!isKnownFunction(token.value)) {
          this.fail(token.line, `function "${token.value}" not defined`);
        }
        return { kind: 'function', name: token.value };
      default:
        this.fail(token.line, `unexpected "${token.value}" in operand`);
    }
  }
}

/**
 * Parse template source into a tree
 *
 * @throws TemplateParseError on any syntax error
 */
export function parseTemplate(source: string, name = 'template'): ParsedTemplate {
  return new Parser(name, lex(source, name)).parse();
}
