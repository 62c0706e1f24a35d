/**
 * Core types for the fluxcast library
 */

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  file?: string;
}

/**
 * Receives diagnostics produced while rendering or validating.
 * Passed explicitly so renders stay free of process-wide side effects.
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

// ============================================================================
// Output
// ============================================================================

export interface ResolvedFile {
  srcPath: string; // path within the bundle tree (e.g. "commands/hello.md")
  destPath: string; // path in the target project (e.g. ".claude/commands/hello.md")
  process: boolean; // whether template processing applies
}

export interface RenderedFile extends ResolvedFile {
  content: string | Buffer; // unprocessed files keep their raw bytes
}
