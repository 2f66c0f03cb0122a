/**
 * Parsers Module Exports
 * @module parsers
 *
 * Central exports for the configuration parsers.
 */

export * from './nginx';
