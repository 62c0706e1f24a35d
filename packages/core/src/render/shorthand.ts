/**
 * Leading identifiers that are never rewritten to data access: control
 * keywords, literals, built-in functions and the partial function.
 */
export const RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  'if',
  'else',
  'end',
  'range',
  'with',
  'define',
  'block',
  'template',
  'nil',
  'true',
  'false',
  'not',
  'and',
  'or',
  'len',
  'index',
  'print',
  'printf',
  'println',
  'call',
  'eq',
  'ne',
  'lt',
  'le',
  'gt',
  'ge',
  'partial',
]);

const BARE_REFERENCE = /\{\{(-?\s*)([a-zA-Z]\w*(?:\.\w+)*)(\s*-?)\}\}/g;

/**
 * Rewrite `{{name}}` and `{{a.b}}` into `{{.name}}` and `{{.a.b}}`.
 * Trim markers and inner spacing are kept as written.
 *
 * @example
 * preprocessShorthand('Hi {{ user.name }}{{end}}');
 * // => 'Hi {{ .user.name }}{{end}}'
 */
export function preprocessShorthand(text: string): string {
  return text.replace(
    BARE_REFERENCE,
    (match: string, prefix: string, reference: string, suffix: string) => {
      const [head] = reference.split('.');
      if (RESERVED_KEYWORDS.has(head)) {
        return match;
      }
      return `{{${prefix}.${reference}${suffix}}}`;
    }
  );
}
