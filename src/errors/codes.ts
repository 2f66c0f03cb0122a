/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Codes of the errors the library throws, grouped by where they arise,
 * and the CLI exit code for each.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Parser Error Codes
 */
export const ParserErrorCodes = {
  // Bundled directive table failed validation
  INVALID_REGISTRY: 'INVALID_REGISTRY',
} as const;

export type ParserErrorCode = typeof ParserErrorCodes[keyof typeof ParserErrorCodes];

/**
 * Configuration Error Codes
 */
export const ConfigErrorCodes = {
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

/**
 * Internal Error Codes
 */
export const InternalErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type InternalErrorCode = typeof InternalErrorCodes[keyof typeof InternalErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

/**
 * All error codes combined
 */
export const ErrorCodes = {
  ...ParserErrorCodes,
  ...ConfigErrorCodes,
  ...InternalErrorCodes,
} as const;

export type ErrorCode =
  | ParserErrorCode
  | ConfigErrorCode
  | InternalErrorCode;

// ============================================================================
// Process Exit Code Mapping
// ============================================================================

/**
 * Maps error codes to process exit codes for the command line entry point.
 * Usage errors exit with 2, everything else with 1.
 */
export const errorCodeToExitCode: Record<ErrorCode, number> = {
  INVALID_REGISTRY: 1,
  CONFIG_VALIDATION_ERROR: 2,
  INTERNAL_ERROR: 1,
};

/**
 * Get the process exit code for an error code
 */
export function getExitCodeForCode(code: ErrorCode): number {
  return errorCodeToExitCode[code];
}
