/**
 * NGINX Parser Type Definitions
 * @module parsers/nginx/types
 *
 * Data model shared by the lexer, block parser, include resolver,
 * directive policy and projection layer.
 */

// ============================================================================
// Tokens
// ============================================================================

/**
 * Lexical token kinds
 */
export type NginxTokenKind =
  | 'word'           // Bare directive names and arguments
  | 'quoted'         // Single or double quoted strings
  | 'block-open'     // {
  | 'block-close'    // }
  | 'statement-end'  // ;
  | 'comment';       // # to end of line

/**
 * A lexical unit produced by the lexer
 */
export interface NginxToken {
  readonly kind: NginxTokenKind;
  /** Literal text; quotes stripped for quoted tokens, `#` kept for comments */
  readonly value: string;
  readonly file: string;
  readonly line: number;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Every kind of problem the parser reports as data
 */
export type ParseErrorKind =
  | 'FileNotFound'
  | 'PermissionDenied'
  | 'ReadError'
  | 'UnterminatedString'
  | 'UnterminatedBlock'
  | 'UnexpectedClosingBrace'
  | 'UnexpectedToken'
  | 'UnexpectedEndOfFile'
  | 'MissingTerminator'
  | 'UnknownDirective'
  | 'DirectiveNotAllowed'
  | 'InvalidArguments'
  | 'IncludeDepthExceeded'
  | 'IncludeIsDirectory'
  | 'GlobExpansionFailure';

/**
 * A problem found while reading, lexing, parsing or filtering one file
 */
export interface ParseError {
  readonly kind: ParseErrorKind;
  readonly message: string;
  readonly file: string;
  /** 1-based line, 0 when the problem is not tied to a line */
  readonly line: number;
}

// ============================================================================
// Parse Tree
// ============================================================================

/**
 * Directive name used for comment nodes
 */
export const COMMENT_DIRECTIVE = '#';

/**
 * One directive, comment or block in the parse tree.
 * A node owns its children; `includes` only refers to file records by index.
 */
export interface DirectiveNode {
  readonly directive: string;
  args: string[];
  readonly file: string;
  readonly line: number;
  /** Child directives; absent when the directive has no block */
  block?: DirectiveNode[];
  /** Comment text without the leading `#` (comment nodes only) */
  comment?: string;
  /** Indices of the ParsedFile records an include expanded into */
  includes?: number[];
}

export type FileStatus = 'ok' | 'failed';

/**
 * The outcome of parsing one physical file
 */
export interface ParsedFile {
  readonly file: string;
  status: FileStatus;
  errors: ParseError[];
  parsed: DirectiveNode[];
  /** Block context the file was included in (empty for the main file) */
  readonly context: readonly string[];
}

// ============================================================================
// Projected Output
// ============================================================================

/**
 * Error entry as consumed by the orchestration and dashboard layers
 */
export interface ErrorEntry {
  readonly error: string;
  readonly file: string;
  readonly line: number;
}

/**
 * Per-file error entry in the technical projection
 */
export interface FileErrorEntry {
  readonly error: string;
  readonly line: number;
}

/**
 * Directive as rendered by the technical projection
 */
export interface TechnicalDirective {
  readonly file?: string;
  readonly directive: string;
  readonly line: number;
  readonly args: readonly string[];
  readonly includes?: readonly number[];
  readonly block?: readonly TechnicalDirective[];
  readonly comment?: string;
}

/**
 * File record as rendered by the technical projection
 */
export interface TechnicalFile {
  readonly file: string;
  readonly status: FileStatus;
  readonly errors: readonly FileErrorEntry[];
  readonly parsed: readonly TechnicalDirective[];
}

/**
 * A value in the readable projection
 */
export type ReadableValue = string | null | ReadableValue[] | ReadableMap;

/**
 * A block in the readable projection
 */
export interface ReadableMap {
  [key: string]: ReadableValue;
}

/**
 * Summary of the files behind a readable projection
 */
export interface ReadableInfo {
  readonly mainFile: string;
  readonly includedFiles: readonly string[];
  readonly totalFilesProcessed: number;
}

/**
 * Per-file, provenance-preserving output
 */
export interface TechnicalDocument {
  readonly format: 'technical';
  readonly status: FileStatus;
  readonly errors: readonly ErrorEntry[];
  readonly config: readonly TechnicalFile[];
}

/**
 * Merged, metadata-free output
 */
export interface ReadableDocument {
  readonly format: 'readable';
  readonly status: FileStatus;
  readonly errors: readonly ErrorEntry[];
  readonly config: ReadableMap;
  readonly info: ReadableInfo;
}

/**
 * The parser's result: exactly one of the two projections
 */
export type ParseDocument = TechnicalDocument | ReadableDocument;

// ============================================================================
// Type Guards
// ============================================================================

export function isTechnicalDocument(doc: ParseDocument): doc is TechnicalDocument {
  return doc.format === 'technical';
}

export function isReadableDocument(doc: ParseDocument): doc is ReadableDocument {
  return doc.format === 'readable';
}

export function isCommentNode(node: DirectiveNode): boolean {
  return node.directive === COMMENT_DIRECTIVE && node.comment !== undefined;
}
