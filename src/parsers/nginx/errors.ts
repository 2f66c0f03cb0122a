/**
 * NGINX Parser Errors
 * @module parsers/nginx/errors
 *
 * Message templates for every ParseErrorKind plus conversion of file system
 * failures into parse errors. Nothing here throws: malformed input is data.
 */

import { getErrorMessage, getSystemErrorCode } from '../../errors';
import { ParseError, ParseErrorKind, ParsedFile } from './types';

// ============================================================================
// Error Construction
// ============================================================================

/**
 * Create a parse error record
 */
export function createParseError(
  kind: ParseErrorKind,
  message: string,
  file: string,
  line: number = 0
): ParseError {
  return { kind, message, file, line };
}

/**
 * Message templates, one per error kind that carries a fixed wording
 */
export const ParseErrorMessages = {
  unterminatedString: (quote: string) => `unterminated string, expecting closing ${quote}`,
  unterminatedBlock: (directive: string | null) =>
    directive
      ? `unexpected end of file, expecting "}" to close "${directive}" block`
      : 'unexpected end of file, expecting "}"',
  unexpectedClosingBrace: () => 'unexpected "}"',
  unexpectedToken: (token: string) => `unexpected "${token}"`,
  unexpectedEndOfFile: (directive: string) =>
    `unexpected end of file, expecting ";" or "}" after "${directive}"`,
  missingTerminator: (directive: string) => `directive "${directive}" is not terminated by ";"`,
  unknownDirective: (directive: string) => `unknown directive "${directive}"`,
  notAllowedHere: (directive: string) => `"${directive}" directive is not allowed here`,
  invalidArgumentCount: (directive: string) => `invalid number of arguments in "${directive}" directive`,
  invalidFlag: (directive: string, value: string) =>
    `invalid value "${value}" in "${directive}" directive, it must be "on" or "off"`,
  missingBlock: (directive: string) => `directive "${directive}" has no opening "{"`,
  includeDepthExceeded: (target: string, limit: number) =>
    `include depth exceeded while including "${target}" (limit ${limit})`,
  includeRepeatLimit: (target: string, limit: number) =>
    `include depth exceeded: "${target}" was already included ${limit} times`,
  includeIsDirectory: (target: string) => `include path is a directory: ${target}`,
  globExpansionFailure: (pattern: string, reason: string) =>
    `failed to expand include pattern "${pattern}": ${reason}`,
  fileNotFound: (target: string) => `file not found: ${target}`,
  permissionDenied: (target: string) => `permission denied: ${target}`,
  readError: (target: string, reason: string) => `cannot read ${target}: ${reason}`,
} as const;

/**
 * Convert a failure of the file system layer into a parse error
 */
export function fileAccessError(filePath: string, error: unknown): ParseError {
  switch (getSystemErrorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return createParseError('FileNotFound', ParseErrorMessages.fileNotFound(filePath), filePath);
    case 'EACCES':
    case 'EPERM':
      return createParseError('PermissionDenied', ParseErrorMessages.permissionDenied(filePath), filePath);
    case 'EISDIR':
      return createParseError('IncludeIsDirectory', ParseErrorMessages.includeIsDirectory(filePath), filePath);
    default:
      return createParseError(
        'ReadError',
        ParseErrorMessages.readError(filePath, getErrorMessage(error)),
        filePath
      );
  }
}

// ============================================================================
// File Record Helpers
// ============================================================================

/**
 * Attach errors to a file record, marking it failed when there are any
 */
export function recordErrors(record: ParsedFile, errors: readonly ParseError[]): void {
  if (errors.length === 0) {
    return;
  }
  record.errors.push(...errors);
  record.status = 'failed';
}

/**
 * Errors of all file records in list order
 */
export function collectErrors(files: readonly ParsedFile[]): ParseError[] {
  return files.flatMap(file => file.errors);
}
