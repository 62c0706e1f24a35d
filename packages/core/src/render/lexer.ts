import { TemplateParseError } from './errors.js';

export type TokenKind =
  | 'field' // .a.b
  | 'dot' // .
  | 'variable' // $ or $x, optionally with a field chain
  | 'identifier' // keyword, function name, true/false/nil
  | 'string'
  | 'number'
  | 'pipe'
  | 'leftParen'
  | 'rightParen'
  | 'declare' // :=
  | 'assign' // =
  | 'comma';

export interface Token {
  kind: TokenKind;
  value: string;
  line: number;
}

export type LexItem =
  | { kind: 'text'; text: string; line: number }
  | { kind: 'action'; tokens: Token[]; line: number };

const FIELD = /\.[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*/y;
const VARIABLE = /\$\w*(?:\.[A-Za-z_]\w*)*/y;
const IDENTIFIER = /[A-Za-z_]\w*/y;
const NUMBER = /[-+]?\d+(?:\.\d+)?(?:[eE][-+]?\d+)?/y;

function isSpace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

function matchAt(pattern: RegExp, source: string, pos: number): string | undefined {
  pattern.lastIndex = pos;
  const match = pattern.exec(source);
  return match ? match[0] : undefined;
}

function countLines(text: string): number {
  let lines = 0;
  for (const ch of text) {
    if (ch === '\n') lines++;
  }
  return lines;
}

/**
 * Split template source into text runs and tokenized actions.
 *
 * Handles `{{- ` / ` -}}` whitespace trimming and comment actions.
 */
export function lex(source: string, name: string): LexItem[] {
  const items: LexItem[] = [];
  let pos = 0;
  let line = 1;
  let trimNextText = false;

  const pushText = (text: string, trimLeft: boolean) => {
    let value = trimNextText ? text.replace(/^[ \t\r\n]+/, '') : text;
    if (trimLeft) value = value.replace(/[ \t\r\n]+$/, '');
    if (value !== '') items.push({ kind: 'text', text: value, line });
    line += countLines(text);
    trimNextText = false;
  };

  while (pos < source.length) {
    const start = source.indexOf('{{', pos);
    if (start === -1) {
      pushText(source.slice(pos), false);
      break;
    }

    let cursor = start + 2;
    const trimLeft = source[cursor] === '-' && isSpace(source[cursor + 1]);
    if (trimLeft) cursor += 2;

    pushText(source.slice(pos, start), trimLeft);
    const actionLine = line;

    // Comment action
    const commentStart = skipSpaces(source, cursor);
    if (source.startsWith('/*', commentStart)) {
      const commentEnd = source.indexOf('*/', commentStart + 2);
      if (commentEnd === -1) {
        throw new TemplateParseError(name, actionLine, 'unclosed comment');
      }
      const close = closeAfterComment(source, commentEnd + 2);
      if (!close) {
        throw new TemplateParseError(name, actionLine, 'comment ends before closing delimiter');
      }
      line += countLines(source.slice(start, close.end));
      trimNextText = close.trimRight;
      pos = close.end;
      continue;
    }

    const { tokens, end, trimRight } = lexAction(source, cursor, name, actionLine);
    items.push({ kind: 'action', tokens, line: actionLine });
    line += countLines(source.slice(start, end));
    trimNextText = trimRight;
    pos = end;
  }

  return items;
}

function skipSpaces(source: string, pos: number): number {
  let i = pos;
  while (isSpace(source[i])) i++;
  return i;
}

function closeAfterComment(
  source: string,
  pos: number
): { end: number; trimRight: boolean } | undefined {
  if (source.startsWith('}}', pos)) return { end: pos + 2, trimRight: false };
  if (isSpace(source[pos])) {
    const i = skipSpaces(source, pos);
    if (source.startsWith('-}}', i)) return { end: i + 3, trimRight: true };
  }
  return undefined;
}

function lexAction(
  source: string,
  start: number,
  name: string,
  startLine: number
): { tokens: Token[]; end: number; trimRight: boolean } {
  const tokens: Token[] = [];
  let pos = start;
  let line = startLine;

  const push = (kind: TokenKind, value: string) => {
    tokens.push({ kind, value, line });
    pos += value.length;
  };

  while (pos < source.length) {
    const ch = source[pos];

    if (source.startsWith('}}', pos)) {
      return { tokens, end: pos + 2, trimRight: false };
    }

    if (isSpace(ch)) {
      const next = skipSpaces(source, pos);
      line += countLines(source.slice(pos, next));
      if (source.startsWith('-}}', next)) {
        return { tokens, end: next + 3, trimRight: true };
      }
      pos = next;
      continue;
    }

    if (ch === '"') {
      const { value, length } = readQuoted(source, pos, name, line);
      tokens.push({ kind: 'string', value, line });
      pos += length;
      continue;
    }

    if (ch === '`') {
      const close = source.indexOf('`', pos + 1);
      if (close === -1) {
        throw new TemplateParseError(name, line, 'unterminated raw quoted string');
      }
      const value = source.slice(pos + 1, close);
      tokens.push({ kind: 'string', value, line });
      line += countLines(value);
      pos = close + 1;
      continue;
    }

    if (ch === '|') {
      push('pipe', '|');
      continue;
    }
    if (ch === '(') {
      push('leftParen', '(');
      continue;
    }
    if (ch === ')') {
      push('rightParen', ')');
      continue;
    }
    if (ch === ',') {
      push('comma', ',');
      continue;
    }
    if (source.startsWith(':=', pos)) {
      push('declare', ':=');
      continue;
    }
    if (ch === '=') {
      push('assign', '=');
      continue;
    }

    if (ch === '.') {
      const field = matchAt(FIELD, source, pos);
      if (field) {
        push('field', field);
        continue;
      }
      push('dot', '.');
      continue;
    }

    if (ch === '$') {
      const variable = matchAt(VARIABLE, source, pos);
      if (variable) {
        push('variable', variable);
        continue;
      }
    }

    const number = matchAt(NUMBER, source, pos);
    if (number !== undefined) {
      push('number', number);
      continue;
    }

    const identifier = matchAt(IDENTIFIER, source, pos);
    if (identifier !== undefined) {
      push('identifier', identifier);
      continue;
    }

    throw new TemplateParseError(name, line, `unexpected ${JSON.stringify(ch)} in action`);
  }

  throw new TemplateParseError(name, startLine, 'unclosed action');
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
  '0': '\0',
};

function readQuoted(
  source: string,
  start: number,
  name: string,
  line: number
): { value: string; length: number } {
  let value = '';
  let i = start + 1;

  while (i < source.length) {
    const ch = source[i];
    if (ch === '"') {
      return { value, length: i - start + 1 };
    }
    if (ch === '\n') {
      break;
    }
    if (ch === '\\') {
      const escaped = ESCAPES[source[i + 1] ?? ''];
      if (escaped === undefined) {
        throw new TemplateParseError(name, line, `unknown escape sequence \\${source[i + 1] ?? ''}`);
      }
      value += escaped;
      i += 2;
      continue;
    }
    value += ch;
    i++;
  }

  throw new TemplateParseError(name, line, 'unterminated quoted string');
}
