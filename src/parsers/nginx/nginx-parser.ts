/**
 * NGINX Configuration Parser
 * @module parsers/nginx/nginx-parser
 *
 * Entry point of the NGINX parser. One call runs the whole pipeline for a
 * root file: lexing and block parsing of every file reached through
 * includes, directive filtering, then projection into the technical or
 * readable document. Calls share no state; malformed input never throws
 * and is reported through the document's `status` and `errors`.
 */

import * as path from 'path';
import { StructuredLogger, withTiming } from '../../logging/logger';
import { createNginxParserConfig, mergeConfig, NginxParserOptions, NginxParserOptionsInput } from './config';
import { DirectivePolicy } from './directive-policy';
import { DirectiveRegistry, getDefaultRegistry } from './directive-registry';
import { collectErrors } from './errors';
import { ConfigFileSystem, nodeFileSystem } from './file-system';
import { FileContentParser, IncludeResolver } from './include-resolver';
import {
  createNginxLogger,
  logParseComplete,
  logParseError,
  logParseStart,
  logStageChange,
} from './logger';
import { parseTokens } from './block-parser';
import { tokenize } from './nginx-lexer';
import { overallStatus, project } from './projection';
import { ParseDocument, ParsedFile } from './types';

// ============================================================================
// Parser Types
// ============================================================================

/**
 * Collaborators the parser can be given instead of the defaults
 */
export interface NginxParserDependencies {
  /** File access (default: the local disk) */
  readonly fileSystem?: ConfigFileSystem;
  /** Logger (default: the `nginx:parser` module logger) */
  readonly logger?: StructuredLogger;
  /** Directive registry (default: the bundled table) */
  readonly registry?: DirectiveRegistry;
}

const CONTENT_MARKERS = [/^\s*http\s*\{/m, /^\s*server\s*\{/m, /^\s*events\s*\{/m, /^\s*location\s+[^{]*\{/m];

// ============================================================================
// NGINX Parser
// ============================================================================

/**
 * Parser for NGINX configuration trees.
 *
 * Options given to the constructor are defaults for every call; options
 * given to a call are layered on top for that call only.
 *
 * @example
 * ```typescript
 * const parser = new NginxConfigParser({ ignoreDirectives: ['ssl_certificate_key'] });
 *
 * // Readable projection of a file and its includes
 * const doc = parser.parseFile('/etc/nginx/nginx.conf');
 *
 * // Technical projection of in-memory text
 * const technical = parser.parseString('events { }', 'nginx.conf', { technicalFormat: true });
 * ```
 */
export class NginxConfigParser {
  readonly name = 'nginx-conf';
  readonly version = '1.0.0';
  readonly supportedExtensions = ['.conf'];

  private readonly config: NginxParserOptions;
  private readonly fileSystem: ConfigFileSystem;
  private readonly logger: StructuredLogger;
  private readonly registry: DirectiveRegistry;

  /**
   * @throws ConfigValidationError when an option is invalid
   */
  constructor(options: NginxParserOptionsInput = {}, dependencies: NginxParserDependencies = {}) {
    this.config = createNginxParserConfig(options);
    this.fileSystem = dependencies.fileSystem ?? nodeFileSystem;
    this.logger = dependencies.logger ?? createNginxLogger();
    this.registry = dependencies.registry ?? getDefaultRegistry();
  }

  /**
   * Whether a path looks like an NGINX configuration file
   */
  canParse(filePath: string, content?: string): boolean {
    const filename = path.basename(filePath).toLowerCase();

    if (filename === 'nginx.conf') {
      return true;
    }

    if (filename.endsWith('.conf') && content !== undefined) {
      return CONTENT_MARKERS.some(marker => marker.test(content));
    }

    return false;
  }

  // ============================================================================
  // Public Methods
  // ============================================================================

  /**
   * Parse a root file and everything it includes.
   *
   * @throws ConfigValidationError when an option is invalid
   */
  parseFile(rootPath: string, options?: NginxParserOptionsInput): ParseDocument {
    const config = mergeConfig(this.config, options);
    return this.run(rootPath, config, undefined);
  }

  /**
   * Parse configuration text as if it were the file at `filePath`.
   * Includes resolve against `baseDir`, or the directory of `filePath`.
   *
   * @throws ConfigValidationError when an option is invalid
   */
  parseString(content: string, filePath: string = 'nginx.conf', options?: NginxParserOptionsInput): ParseDocument {
    const config = mergeConfig(this.config, options);
    return this.run(filePath, config, content);
  }

  /**
   * Parse into unfiltered, unprojected file records. The records can be
   * passed to {@link project} any number of times.
   *
   * @param content - Root file text; read from `rootPath` when omitted
   * @throws ConfigValidationError when an option is invalid
   */
  parseTree(rootPath: string, options?: NginxParserOptionsInput, content?: string): ParsedFile[] {
    const config = mergeConfig(this.config, options);
    return this.buildTree(rootPath, config, content);
  }

  /**
   * Filter and project file records produced by {@link parseTree}.
   * The records are not modified.
   *
   * @throws ConfigValidationError when an option is invalid
   */
  project(files: readonly ParsedFile[], options?: NginxParserOptionsInput): ParseDocument {
    const config = mergeConfig(this.config, options);
    const rootPath = files.length > 0 ? files[0].file : '';
    return this.filterAndProject(rootPath, files, config);
  }

  // ============================================================================
  // Pipeline
  // ============================================================================

  private run(rootPath: string, config: NginxParserOptions, content: string | undefined): ParseDocument {
    const startTime = performance.now();
    logParseStart(this.logger, rootPath, config);
    logStageChange(this.logger, rootPath, 'start');

    return withTiming(this.logger, 'nginx_parse', () => {
      const files = this.buildTree(rootPath, config, content);
      return this.filterAndProject(rootPath, files, config, startTime);
    });
  }

  private buildTree(rootPath: string, config: NginxParserOptions, content: string | undefined): ParsedFile[] {
    const baseDir = config.baseDir
      ? path.resolve(config.baseDir)
      : path.dirname(path.resolve(rootPath));

    const parseContent: FileContentParser = (text, filePath) => {
      logStageChange(this.logger, filePath, 'lexing');
      const lexed = tokenize(text, filePath, { includeComments: config.includeComments });
      logStageChange(this.logger, filePath, 'parsing');
      const parsed = parseTokens(lexed.tokens, filePath);
      return { nodes: parsed.nodes, errors: [...lexed.errors, ...parsed.errors] };
    };

    const resolver = new IncludeResolver(
      {
        baseDir,
        singleFile: config.singleFile,
        allowIncludeRepeats: config.allowIncludeRepeats,
        includeDirectories: config.includeDirectories,
        followSymlinks: config.followSymlinks,
        maxIncludeDepth: config.maxIncludeDepth,
        ignoreDirectives: config.ignoreDirectives,
      },
      parseContent,
      this.fileSystem,
      this.logger
    );

    return resolver.resolveTree(rootPath, content);
  }

  private filterAndProject(
    rootPath: string,
    files: readonly ParsedFile[],
    config: NginxParserOptions,
    startTime: number = performance.now()
  ): ParseDocument {
    logStageChange(this.logger, rootPath, 'filtering');
    const policy = new DirectivePolicy(
      {
        ignoreDirectives: config.ignoreDirectives,
        strict: config.strict,
        checkContext: config.checkContext,
        checkArguments: config.checkArguments,
      },
      this.registry
    );
    const filtered = policy.apply(files).files;

    logStageChange(this.logger, rootPath, 'projecting');
    const document = project(filtered, config);

    const errors = collectErrors(filtered);
    for (const error of errors) {
      logParseError(this.logger, error);
    }
    logParseComplete(
      this.logger,
      rootPath,
      { status: overallStatus(filtered), fileCount: filtered.length, errorCount: errors.length },
      performance.now() - startTime
    );
    logStageChange(this.logger, rootPath, 'done');

    return document;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new NGINX parser instance
 */
export function createNginxParser(
  options?: NginxParserOptionsInput,
  dependencies?: NginxParserDependencies
): NginxConfigParser {
  return new NginxConfigParser(options, dependencies);
}

/**
 * Parse an NGINX configuration file and its includes
 */
export function parseNginxConfig(
  filePath: string,
  options?: NginxParserOptionsInput,
  dependencies?: NginxParserDependencies
): ParseDocument {
  return createNginxParser(options, dependencies).parseFile(filePath);
}

/**
 * Parse NGINX configuration text
 */
export function parseNginxString(
  content: string,
  filePath: string = 'nginx.conf',
  options?: NginxParserOptionsInput,
  dependencies?: NginxParserDependencies
): ParseDocument {
  return createNginxParser(options, dependencies).parseString(content, filePath);
}
