/**
 * Engine Error Base
 * @module errors/base
 *
 * Every error the engine throws extends BaseError and carries a typed code.
 * Fatal codes abort an analysis run; the rest fail a single query or document.
 */

import { ErrorCode, isFatalCode } from './codes';

// ============================================================================
// Types
// ============================================================================

export interface ErrorContext {
  /** Underlying failure, exposed as `error.cause` */
  cause?: Error;
  /** Structured data copied into the serialized form */
  details?: Record<string, unknown>;
  /** Defaults to construction time */
  timestamp?: Date;
}

/**
 * JSON-safe form used in logs and diagnostics
 */
export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  fatal: boolean;
  operational: boolean;
  timestamp: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BaseError
// ============================================================================

export abstract class BaseError extends Error {
  public readonly code: ErrorCode;
  /** Whether the error aborts an analysis run */
  public readonly fatal: boolean;
  public readonly timestamp: Date;
  public readonly context: ErrorContext;
  /**
   * False when the error signals a defect in the engine rather than bad input
   * (a graph invariant broken by the builder, for instance)
   */
  public readonly isOperational: boolean;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}, isOperational = true) {
    super(message, context.cause ? { cause: context.cause } : undefined);

    this.name = this.constructor.name;
    this.code = code;
    this.fatal = isFatalCode(code);
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      fatal: this.fatal,
      operational: this.isOperational,
      timestamp: this.timestamp.toISOString(),
      details: this.context.details,
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Innermost error of the `cause` chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBaseError(error) && error.code === code;
}

/**
 * Message of anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : String(error);
}

/**
 * Node.js errno code (ENOENT, EACCES, ...) of a filesystem failure
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
