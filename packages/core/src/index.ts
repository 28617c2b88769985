/**
 * @styx/core - IR, optimizer and code generators of the Styx compiler
 */

export { STYX_VERSION } from './version.js';

// Error types
export {
  StyxError,
  IrError,
  ContractError,
  ScopeError,
  CodegenError,
  RenderError,
  BackendError,
  ConfigError,
} from './errors/StyxError.js';
export type { ErrorContext, Severity, StyxErrorJSON } from './errors/StyxError.js';

// Logging
export { ConsoleLogger, FileLogger, MultiLogger, createLogger, silentLogger, formatMessage } from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Diagnostics
export { DiagnosticCollector } from './diagnostics/index.js';
export type { Diagnostic, DiagnosticInput, DiagnosticScope } from './diagnostics/index.js';

// Config
export * from './config/index.js';

// IR model
export * from './ir/index.js';

// Optimizer
export * from './optimize/index.js';

// Code generation
export * from './codegen/index.js';

// Backends
export { PythonLanguageProvider } from './backends/python/PythonLanguageProvider.js';
export { TypeScriptLanguageProvider } from './backends/typescript/TypeScriptLanguageProvider.js';
export { dumpIr } from './backends/ir/IrDumpBackend.js';
export { listBackends, getBackend, isBackendId, type Backend } from './backends/registry.js';
export {
  loadReservedWords,
  allReservedWords,
  type ReservedTarget,
  type ReservedWords,
} from './backends/reservedWords.js';

// Batch driver
export * from './compile/index.js';
