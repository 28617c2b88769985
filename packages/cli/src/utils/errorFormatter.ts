/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import type { Diagnostic } from '@styx/core';

/**
 * Lines of a standardized error message, ready for stderr.
 */
export function formatError(title: string, nextSteps?: string[]): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

/**
 * One batch failure:
 *   ✗ [ERR_IR_FORMAT] bet.json: Malformed IR at $.command.body.type: expected "struct"
 *     → suggestion
 */
export function formatDiagnostic(diagnostic: Diagnostic): string[] {
  const where = [diagnostic.input, diagnostic.backend && `(${diagnostic.backend})`]
    .filter((part): part is string => typeof part === 'string' && part.length > 0)
    .join(' ');
  const lines = [`✗ [${diagnostic.code}] ${where ? `${where}: ` : ''}${diagnostic.message}`];
  if (diagnostic.suggestion) {
    lines.push(`  → ${diagnostic.suggestion}`);
  }
  return lines;
}
