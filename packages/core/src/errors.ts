/**
 * Error taxonomy shared across modules.
 *
 * - ParseError: manifest or document syntax failure
 * - ValidationError: schema/field violations, always carrying every issue found
 * - ResolutionError: a render or resolve call could not complete
 * - ExternalCommandError: a discovery command failed or produced unusable output
 */

export class ParseError extends Error {
  public readonly file?: string;

  constructor(message: string, file?: string) {
    super(message);
    this.name = 'ParseError';
    this.file = file;
  }
}

export class ValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  /**
   * Get formatted issue details
   */
  getDetails(): string {
    if (this.issues.length === 0) return this.message;

    return this.issues.join('\n');
  }
}

export class ResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResolutionError';
  }
}

export class ExternalCommandError extends Error {
  public readonly command: string;
  public readonly stderr?: string;
  public override readonly cause?: unknown;

  constructor(message: string, command: string, options?: { stderr?: string; cause?: unknown }) {
    super(message);
    this.name = 'ExternalCommandError';
    this.command = command;
    this.stderr = options?.stderr;
    this.cause = options?.cause;
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
