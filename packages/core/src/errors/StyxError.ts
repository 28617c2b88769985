/**
 * StyxError - Error hierarchy for the Styx compiler
 *
 * All errors extend the native JavaScript Error class, so anything that catches
 * Error (the batch driver, the CLI) can still report them.
 *
 * Error types:
 * - IrError: malformed parameter trees (fatal)
 * - ContractError: an assumption between compiler stages broke (fatal)
 * - ScopeError: identifier reservation conflicts (fatal)
 * - CodegenError: IR the code generator cannot express (error)
 * - RenderError: values the command-line interpreter cannot render (error)
 * - BackendError: unknown backends, write conflicts (error)
 * - ConfigError: styx.config.yaml parsing/validation (fatal)
 */

import type { IdType } from '@styx/types';

export type Severity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  input?: string;
  backend?: string;
  paramId?: IdType;
  paramName?: string;
  path?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of StyxError
 */
export interface StyxErrorJSON {
  code: string;
  severity: Severity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all Styx errors.
 */
export abstract class StyxError extends Error {
  abstract readonly code: string;
  abstract readonly severity: Severity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): StyxErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * IR construction error - default/body/choices/bounds mismatches, duplicate ids,
 * malformed IR documents
 *
 * Severity: fatal (always)
 * Codes: ERR_IR_DEFAULT_TYPE, ERR_IR_SET_TO_NONE, ERR_IR_BOUNDS, ERR_IR_DEFAULT_RANGE,
 *        ERR_IR_LIST_LENGTH, ERR_IR_CHOICES, ERR_IR_DUPLICATE_ID, ERR_IR_FORMAT
 */
export class IrError extends StyxError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Contract error - a stage received a tree that breaks what earlier stages promise
 *
 * Severity: fatal (always)
 * Codes: ERR_OPTIMIZER_CONTRACT, ERR_APP_NOT_SET_UP, ERR_SYMBOL_MISSING, ERR_SYMBOL_DUPLICATE,
 *        ERR_PARENT_MISSING
 */
export class ContractError extends StyxError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Scope error - an identifier could not be reserved
 *
 * Severity: fatal (always)
 * Codes: ERR_SYMBOL_TAKEN
 */
export class ScopeError extends StyxError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Codegen error - the IR is well formed but cannot be expressed by the generator
 *
 * Severity: error (default)
 * Codes: ERR_OUTPUT_REFERENCE, ERR_DUPLICATE_APP
 */
export class CodegenError extends StyxError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Render error - the command-line interpreter got a value that does not fit the tree
 *
 * Severity: error (default)
 * Codes: ERR_RENDER_VALUE, ERR_RENDER_DISCRIMINATOR, ERR_RENDER_MISSING
 */
export class RenderError extends StyxError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Backend error - problems scoped to one input/backend pair of a batch
 *
 * Severity: error (default)
 * Codes: ERR_UNKNOWN_BACKEND, ERR_WRITE_CONFLICT
 */
export class BackendError extends StyxError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - styx.config.yaml parsing, validation
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends StyxError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
