/**
 * Diagnostics - failure collection for compile batches
 */

export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput, DiagnosticScope } from './DiagnosticCollector.js';
