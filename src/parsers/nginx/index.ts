/**
 * NGINX Parser Module
 * @module parsers/nginx
 *
 * Parses NGINX configuration trees (a root file plus everything it
 * includes) into a technical or a readable document.
 *
 * @example
 * ```typescript
 * import { createNginxParser, isReadableDocument } from './parsers/nginx';
 *
 * const parser = createNginxParser({ ignoreDirectives: ['ssl_certificate_key'] });
 * const doc = parser.parseFile('/etc/nginx/nginx.conf');
 *
 * if (doc.status === 'failed') {
 *   for (const entry of doc.errors) {
 *     console.error(`${entry.file}:${entry.line}: ${entry.error}`);
 *   }
 * }
 * if (isReadableDocument(doc)) {
 *   console.log(doc.config.http);
 * }
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export {
  type NginxTokenKind,
  type NginxToken,
  type ParseErrorKind,
  type ParseError,
  type DirectiveNode,
  type FileStatus,
  type ParsedFile,
  type ErrorEntry,
  type FileErrorEntry,
  type TechnicalDirective,
  type TechnicalFile,
  type ReadableValue,
  type ReadableMap,
  type ReadableInfo,
  type TechnicalDocument,
  type ReadableDocument,
  type ParseDocument,
  COMMENT_DIRECTIVE,
  isTechnicalDocument,
  isReadableDocument,
  isCommentNode,
} from './types';

// ============================================================================
// Parser
// ============================================================================

export {
  NginxConfigParser,
  createNginxParser,
  parseNginxConfig,
  parseNginxString,
  type NginxParserDependencies,
} from './nginx-parser';

// ============================================================================
// Pipeline Stages
// ============================================================================

export { NginxLexer, tokenize, isValueToken, type LexerOptions, type LexerResult } from './nginx-lexer';
export { BlockParser, parseTokens, stripIfParentheses, type BlockParseResult } from './block-parser';
export {
  IncludeResolver,
  createIncludeResolver,
  hasGlobMagic,
  type IncludeResolverOptions,
  type FileContentParser,
  type PathExpansion,
} from './include-resolver';
export {
  DirectivePolicy,
  createDirectivePolicy,
  filterDirectives,
  findArgumentProblem,
  type DirectivePolicyOptions,
  type PolicyResult,
} from './directive-policy';
export {
  DirectiveRegistry,
  RegistryValidationError,
  getDefaultRegistry,
  enterBlockContext,
  resolveContextName,
  acceptsArgumentCount,
  isFlagValue,
  type BlockContext,
  type DirectiveContext,
  type ArgumentStyle,
  type DirectiveSignature,
  type DirectiveRegistryData,
} from './directive-registry';
export {
  project,
  projectTechnical,
  projectReadable,
  argumentValue,
  overallStatus,
  toErrorEntries,
  REPEATABLE_BLOCKS,
  type ProjectionOptions,
} from './projection';

// ============================================================================
// Configuration
// ============================================================================

export {
  NginxParserOptionsSchema,
  DEFAULT_NGINX_PARSER_CONFIG,
  CONFIG_PRESETS,
  ConfigValidationError,
  createNginxParserConfig,
  createConfigFromEnv,
  getConfigPreset,
  mergeConfig,
  validateConfig,
  type NginxParserOptions,
  type NginxParserOptionsInput,
  type ConfigValidationIssue,
  type ConfigPresetName,
} from './config';

// ============================================================================
// Errors, Files and Logging
// ============================================================================

export {
  createParseError,
  fileAccessError,
  recordErrors,
  collectErrors,
  ParseErrorMessages,
} from './errors';
export { NodeFileSystem, nodeFileSystem, type ConfigFileSystem, type EntryType } from './file-system';
export {
  createNginxLogger,
  logParseStart,
  logParseComplete,
  logParseError,
  logStageChange,
  logFileParsed,
  logIncludeResolved,
  type ParseStage,
  type ParseSummary,
} from './logger';
