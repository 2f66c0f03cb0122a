/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the configuration discovery toolkit.
 * Log lines go to stderr so that command line output on stdout stays machine-readable.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  module?: string;
  operation?: string;
  host?: string;
  collector?: string;
  invocationId?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Logger type used across the code base
 */
export type StructuredLogger = Logger;

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
    redact: [
      'password',
      'token',
      'secret',
      'privateKey',
      'private_key',
      'ssl_certificate_key',
      'ssl_password_file',
      'auth_basic_user_file',
    ],
    service: process.env.SERVICE_NAME || 'nginx-config-discovery',
    version: process.env.SERVICE_VERSION || '1.0.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

// ============================================================================
// Redaction Utilities
// ============================================================================

/**
 * Expands redaction keys so nested occurrences are censored too
 */
function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, baseContext?: LogContext): StructuredLogger {
  const config = defaultConfig();

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream;

  if (config.pretty && config.environment !== 'production') {
    try {
      destination = pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      });
    } catch {
      // pino-pretty is a dev dependency; fall back to plain JSON lines
      destination = pino.destination(2);
    }
  } else {
    destination = pino.destination(2);
  }

  const baseLogger = pino(options, destination);

  return baseContext ? baseLogger.child(baseContext) : baseLogger;
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('nginx-config-discovery');
  }
  return rootLogger;
}

/**
 * Changes the level of the root logger and of loggers derived from it afterwards
 */
export function setLogLevel(level: string): void {
  getLogger().level = level;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}

/**
 * Runs a synchronous operation and logs its duration at debug level
 */
export function withTiming<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => T
): T {
  const startTime = performance.now();
  try {
    return fn();
  } finally {
    logger.debug(
      { event: 'performance_metric', operation, durationMs: performance.now() - startTime },
      `${operation}: ${(performance.now() - startTime).toFixed(2)}ms`
    );
  }
}
