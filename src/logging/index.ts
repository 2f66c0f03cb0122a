/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  createModuleLogger,
  getLogger,
  resetLogger,
  setLogLevel,
  withTiming,
  type LogContext,
  type LoggerConfig,
  type StructuredLogger,
} from './logger';
