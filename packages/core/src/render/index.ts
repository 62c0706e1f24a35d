/**
 * Render - shorthand preprocessing and the template engine
 */

export type {
  ActionNode,
  BranchNode,
  Command,
  IncludeNode,
  Operand,
  ParsedTemplate,
  Pipeline,
  TemplateNode,
  TextNode,
} from './ast.js';
export { TemplateExecutionError, TemplateParseError } from './errors.js';
export { executeTemplate, type ExecuteOptions, type PartialProvider } from './exec.js';
export { formatValue, isTruthy } from './functions.js';
export { lex, type LexItem, type Token, type TokenKind } from './lexer.js';
export { parseTemplate } from './parser.js';
export {
  checkTemplateSyntax,
  referencedPaths,
  renderTemplate,
  type RenderOptions,
} from './renderer.js';
export { RESERVED_KEYWORDS, preprocessShorthand } from './shorthand.js';
