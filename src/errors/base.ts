/**
 * Base Error Classes
 * @module errors/base
 *
 * Errors thrown by the library carry a code and the exit code the CLI
 * reports for them. Malformed NGINX input never ends up here: it becomes
 * ParseError records on the file it occurs in.
 */

import { ErrorCode, getExitCodeForCode } from './codes';

// ============================================================================
// Error Context Types
// ============================================================================

export interface ErrorContext {
  /** Underlying failure */
  cause?: Error;
  /** Structured data carried into toJSON() */
  details?: Record<string, unknown>;
  timestamp?: Date;
}

/**
 * JSON form of a BaseError
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  exitCode: number;
  timestamp: string;
  details?: Record<string, unknown>;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class BaseError extends Error {
  public readonly code: ErrorCode;
  /** Exit code of the CLI when this error ends a run */
  public readonly exitCode: number;
  public readonly timestamp: Date;
  public readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.exitCode = getExitCodeForCode(code);
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      timestamp: this.timestamp.toISOString(),
      details: this.context.details,
    };
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Turn any thrown value into a BaseError. Base errors pass through
 * unchanged, keeping their own message and code.
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = 'INTERNAL_ERROR'
): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new WrappedError(message ?? error.message, code, { cause: error });
  }

  return new WrappedError(message ?? String(error), code, { details: { originalValue: error } });
}

class WrappedError extends BaseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext) {
    super(message, code, context);
    this.name = 'WrappedError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Errno-style code (ENOENT, EACCES, ...) of a thrown value, if it has one
 */
export function getSystemErrorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}
