/**
 * NGINX Parser Logger
 * @module parsers/nginx/logger
 *
 * Structured logging for parse invocations: lifecycle stages, per-file
 * outcomes and include expansion. All events go through the core pino
 * logger, so they land on stderr and honour LOG_LEVEL.
 *
 * @example
 * ```typescript
 * const logger = createNginxLogger();
 * logParseStart(logger, '/etc/nginx/nginx.conf', config);
 * // ... parsing ...
 * logParseComplete(logger, '/etc/nginx/nginx.conf', summary, duration);
 * ```
 */

import { createModuleLogger, StructuredLogger } from '../../logging/logger';
import { NginxParserOptions } from './config';
import { FileStatus, ParseError, ParsedFile } from './types';

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a namespaced logger for NGINX parsing operations.
 *
 * @param subModule - Optional sub-module name for further namespacing
 */
export function createNginxLogger(subModule?: string): StructuredLogger {
  const moduleName = subModule
    ? `nginx:parser:${subModule}`
    : 'nginx:parser';
  return createModuleLogger(moduleName);
}

// ============================================================================
// Lifecycle Logging
// ============================================================================

/**
 * Parse lifecycle stages of one invocation
 */
export type ParseStage =
  | 'start'
  | 'lexing'
  | 'parsing'
  | 'filtering'
  | 'projecting'
  | 'done';

/**
 * Outcome summary logged when an invocation finishes
 */
export interface ParseSummary {
  readonly status: FileStatus;
  readonly fileCount: number;
  readonly errorCount: number;
}

/**
 * Log the start of a parse invocation.
 */
export function logParseStart(
  logger: StructuredLogger,
  filePath: string,
  config: NginxParserOptions
): void {
  logger.debug(
    {
      event: 'nginx_parse_start',
      filePath,
      singleFile: config.singleFile,
      technicalFormat: config.technicalFormat,
      combineIncludes: config.combineIncludes,
      strict: config.strict,
      maxIncludeDepth: config.maxIncludeDepth,
      ignoredDirectives: config.ignoreDirectives.length,
    },
    `Starting NGINX parse: ${filePath}`
  );
}

/**
 * Log a lifecycle stage transition.
 */
export function logStageChange(
  logger: StructuredLogger,
  filePath: string,
  stage: ParseStage
): void {
  logger.trace(
    {
      event: 'nginx_parse_stage',
      filePath,
      stage,
    },
    `NGINX parse stage: ${stage}`
  );
}

/**
 * Log the completion of a parse invocation.
 *
 * @param duration - Duration in milliseconds
 */
export function logParseComplete(
  logger: StructuredLogger,
  filePath: string,
  summary: ParseSummary,
  duration: number
): void {
  const level = summary.status === 'ok' ? 'info' : 'warn';
  logger[level](
    {
      event: 'nginx_parse_complete',
      filePath,
      status: summary.status,
      fileCount: summary.fileCount,
      errorCount: summary.errorCount,
      durationMs: duration,
    },
    `NGINX parse ${summary.status === 'ok' ? 'complete' : 'failed'}: ${summary.fileCount} files, ${summary.errorCount} errors in ${duration.toFixed(2)}ms`
  );
}

/**
 * Log a parse error attached to a file record.
 */
export function logParseError(logger: StructuredLogger, error: ParseError): void {
  logger.debug(
    {
      event: 'nginx_parse_error',
      kind: error.kind,
      filePath: error.file,
      line: error.line,
    },
    `NGINX parse error in ${error.file}:${error.line}: ${error.message}`
  );
}

// ============================================================================
// File and Include Logging
// ============================================================================

/**
 * Log the outcome of parsing one physical file.
 */
export function logFileParsed(logger: StructuredLogger, record: ParsedFile, depth: number): void {
  logger.debug(
    {
      event: 'nginx_file_parsed',
      filePath: record.file,
      status: record.status,
      directiveCount: record.parsed.length,
      errorCount: record.errors.length,
      depth,
    },
    `Parsed ${record.file} (${record.status})`
  );
}

/**
 * Log the expansion of one include directive.
 */
export function logIncludeResolved(
  logger: StructuredLogger,
  includingFile: string,
  pattern: string,
  matches: readonly string[]
): void {
  logger.debug(
    {
      event: 'nginx_include_resolved',
      filePath: includingFile,
      pattern,
      matchCount: matches.length,
      matches,
    },
    `Include "${pattern}" matched ${matches.length} file(s)`
  );
}
