import { ParseError } from '../errors.js';

/**
 * Template syntax failure. Fatal to the one document being parsed.
 */
export class TemplateParseError extends ParseError {
  public readonly template: string;
  public readonly line: number;

  constructor(template: string, line: number, detail: string) {
    super(`template: ${template}:${line}: ${detail}`, template);
    this.name = 'TemplateParseError';
    this.template = template;
    this.line = line;
  }
}

/**
 * Failure while evaluating a parsed template
 */
export class TemplateExecutionError extends Error {
  public readonly template: string;
  public readonly line: number;

  constructor(template: string, line: number, detail: string) {
    super(`template: ${template}:${line}: ${detail}`);
    this.name = 'TemplateExecutionError';
    this.template = template;
    this.line = line;
  }
}
