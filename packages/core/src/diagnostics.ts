import type { Diagnostic, DiagnosticSink } from './types.js';

/**
 * DiagnosticCollector - Accumulates diagnostics from one render or validation run
 *
 * `errors()` and `warnings()` are filtered views over the single combined list,
 * which keeps report order intact.
 */
export class DiagnosticCollector implements DiagnosticSink {
  private readonly items: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.items.push({ ...diagnostic });
  }

  error(message: string, file?: string): void {
    this.report({ severity: 'error', message, file });
  }

  warning(message: string, file?: string): void {
    this.report({ severity: 'warning', message, file });
  }

  /**
   * All diagnostics in report order
   */
  all(): Diagnostic[] {
    return [...this.items];
  }

  hasErrors(): boolean {
    return this.items.some((d) => d.severity === 'error');
  }

  errors(): Diagnostic[] {
    return this.items.filter((d) => d.severity === 'error');
  }

  warnings(): Diagnostic[] {
    return this.items.filter((d) => d.severity === 'warning');
  }

  get size(): number {
    return this.items.length;
  }
}
