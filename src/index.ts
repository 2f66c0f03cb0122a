/**
 * NGINX Configuration Discovery
 * @module nginx-config-discovery
 *
 * Main entry point. Parses NGINX configuration trees into structured
 * documents for the discovery pipeline.
 *
 * @example
 * ```typescript
 * import { parseNginxConfig, CONFIG_PRESETS } from 'nginx-config-discovery';
 *
 * const doc = parseNginxConfig('/etc/nginx/nginx.conf', {
 *   ...CONFIG_PRESETS.safe,
 *   technicalFormat: true,
 * });
 * ```
 */

// ============================================================================
// Parsers
// ============================================================================

export * from './parsers';

// ============================================================================
// Errors
// ============================================================================

export {
  BaseError,
  ErrorCodes,
  isBaseError,
  wrapError,
  getErrorMessage,
  type ErrorCode,
  type ErrorContext,
  type SerializedError,
} from './errors';

// ============================================================================
// Logging
// ============================================================================

export {
  createLogger,
  createModuleLogger,
  getLogger,
  setLogLevel,
  type StructuredLogger,
} from './logging';
