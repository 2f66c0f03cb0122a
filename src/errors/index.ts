/**
 * Error Handling Module
 * @module errors
 *
 * Error classes and codes shared by the parsers and the command line entry point.
 *
 * @example
 * ```typescript
 * import { BaseError, isBaseError, getErrorMessage } from './errors';
 *
 * try {
 *   parser.parseFile(path, options);
 * } catch (error) {
 *   if (isBaseError(error)) {
 *     process.exitCode = error.exitCode;
 *   }
 *   console.error(getErrorMessage(error));
 * }
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

export {
  ParserErrorCodes,
  ConfigErrorCodes,
  InternalErrorCodes,
  ErrorCodes,
  type ErrorCode,
  type ParserErrorCode,
  type ConfigErrorCode,
  type InternalErrorCode,
  errorCodeToExitCode,
  getExitCodeForCode,
} from './codes';

// ============================================================================
// Base Error Classes
// ============================================================================

export {
  BaseError,
  type ErrorContext,
  type SerializedError,
  isBaseError,
  wrapError,
  getErrorMessage,
  getSystemErrorCode,
} from './base';
