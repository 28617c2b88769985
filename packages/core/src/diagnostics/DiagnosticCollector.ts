/**
 * DiagnosticCollector - Collects failures of a compile batch
 *
 * The batch driver isolates every input/backend pair: a failure is recorded
 * here and the batch moves on. StyxError instances keep their code, severity
 * and suggestion; plain Error instances become generic 'ERR_UNKNOWN' errors.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   collector.addError(error, { input: 'bet.json', backend: 'python' });
 *
 *   if (collector.hasErrors()) {
 *     console.error(collector.summary());
 *   }
 */

import { StyxError, type Severity } from '../errors/StyxError.js';

/**
 * Diagnostic entry - unified format for all errors/warnings
 */
export interface Diagnostic {
  code: string;
  severity: Severity;
  message: string;
  /** Input file (or App uid) the failure belongs to */
  input?: string;
  backend?: string;
  timestamp: number;
  suggestion?: string;
}

/**
 * Diagnostic input (without timestamp, which is auto-generated)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

export interface DiagnosticScope {
  input?: string;
  backend?: string;
}

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * Record a thrown value. The error's own context fills in a missing scope.
   */
  addError(error: unknown, scope: DiagnosticScope = {}): Diagnostic {
    if (error instanceof StyxError) {
      return this.add({
        code: error.code,
        severity: error.severity,
        message: error.message,
        input: scope.input ?? error.context.input,
        backend: scope.backend ?? error.context.backend,
        suggestion: error.suggestion,
      });
    }
    return this.add({
      code: 'ERR_UNKNOWN',
      severity: 'error',
      message: error instanceof Error ? error.message : String(error),
      input: scope.input,
      backend: scope.backend,
    });
  }

  /**
   * Add a diagnostic directly.
   * Timestamp is set automatically.
   */
  add(diagnostic: DiagnosticInput): Diagnostic {
    const entry: Diagnostic = { ...diagnostic, timestamp: Date.now() };
    this.diagnostics.push(entry);
    return entry;
  }

  /**
   * Get all diagnostics.
   * Returns a copy to prevent external modification.
   */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByInput(input: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.input === input);
  }

  getByBackend(backend: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.backend === backend);
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  hasFatal(): boolean {
    return this.diagnostics.some(d => d.severity === 'fatal');
  }

  /**
   * Check if any error (including fatal) exists.
   */
  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error' || d.severity === 'fatal');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.severity === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Format diagnostics as JSON lines (one JSON object per line).
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  /**
   * Counts by severity, e.g. "Fatal: 1, Errors: 2".
   */
  summary(): string {
    if (this.diagnostics.length === 0) return 'No issues found.';
    const parts: string[] = [];
    const fatal = this.diagnostics.filter(d => d.severity === 'fatal').length;
    const errors = this.diagnostics.filter(d => d.severity === 'error').length;
    const warnings = this.diagnostics.filter(d => d.severity === 'warning').length;
    if (fatal > 0) parts.push(`Fatal: ${fatal}`);
    if (errors > 0) parts.push(`Errors: ${errors}`);
    if (warnings > 0) parts.push(`Warnings: ${warnings}`);
    return parts.join(', ');
  }

  clear(): void {
    this.diagnostics = [];
  }
}
