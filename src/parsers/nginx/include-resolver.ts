/**
 * NGINX Include Resolver
 * @module parsers/nginx/include-resolver
 *
 * Expands `include` directives into file records. Starting from the root
 * file, every include pattern is resolved against the base directory,
 * globs are expanded segment by segment and each matched file is read and
 * parsed in turn. Records are numbered in the order they are first
 * visited; an include node refers to the records it expanded into by index.
 */

import * as path from 'path';
import { minimatch } from 'minimatch';
import { getErrorMessage, getSystemErrorCode } from '../../errors';
import { StructuredLogger } from '../../logging/logger';
import { BlockContext, enterBlockContext } from './directive-registry';
import { createParseError, fileAccessError, ParseErrorMessages, recordErrors } from './errors';
import { ConfigFileSystem, EntryType, nodeFileSystem } from './file-system';
import { createNginxLogger, logFileParsed, logIncludeResolved } from './logger';
import { DirectiveNode, ParseError, ParsedFile } from './types';

// ============================================================================
// Resolution Types
// ============================================================================

/**
 * Options for include resolution
 */
export interface IncludeResolverOptions {
  /** Directory relative include patterns resolve against */
  readonly baseDir: string;
  /** Do not expand includes at all */
  readonly singleFile: boolean;
  /** Parse a file again each time it is included */
  readonly allowIncludeRepeats: boolean;
  /** Expand an include naming a directory into the files inside it */
  readonly includeDirectories: boolean;
  /** Descend into symlinked directories while expanding globs */
  readonly followSymlinks: boolean;
  /** Maximum length of an include chain below the root file */
  readonly maxIncludeDepth: number;
  /** Directive names the policy removes; an ignored `include` is not expanded */
  readonly ignoreDirectives: readonly string[];
}

/**
 * Lexes and parses the text of one file
 */
export type FileContentParser = (
  content: string,
  filePath: string
) => { nodes: DirectiveNode[]; errors: ParseError[] };

/**
 * Files an include pattern resolved to. `error` is reported on the
 * including file.
 */
export interface PathExpansion {
  readonly paths: string[];
  readonly error: ParseError | null;
}

/**
 * Where an include directive stands
 */
interface IncludeSite {
  readonly record: ParsedFile;
  readonly node: DirectiveNode;
  readonly depth: number;
  readonly context: BlockContext;
}

const INCLUDE_DIRECTIVE = 'include';

/**
 * Times one path may be parsed within an invocation when repeats are allowed
 */
export const MAX_VISITS_PER_PATH = 8;

// ============================================================================
// Include Resolver Class
// ============================================================================

/**
 * Builds the list of file records for one parse invocation.
 * An instance holds the state of a single invocation.
 *
 * @example
 * ```typescript
 * const resolver = new IncludeResolver(options, parseContent, fileSystem, logger);
 * const files = resolver.resolveTree('/etc/nginx/nginx.conf');
 * ```
 */
export class IncludeResolver {
  private readonly options: IncludeResolverOptions;
  private readonly parseContent: FileContentParser;
  private readonly fileSystem: ConfigFileSystem;
  private readonly logger: StructuredLogger;
  private readonly files: ParsedFile[] = [];
  private readonly indexByPath = new Map<string, number>();
  private readonly visitCounts = new Map<string, number>();

  constructor(
    options: IncludeResolverOptions,
    parseContent: FileContentParser,
    fileSystem: ConfigFileSystem = nodeFileSystem,
    logger: StructuredLogger = createNginxLogger('include-resolver')
  ) {
    this.options = options;
    this.parseContent = parseContent;
    this.fileSystem = fileSystem;
    this.logger = logger;
  }

  // ============================================================================
  // Public Methods
  // ============================================================================

  /**
   * Parse the root file and everything it includes.
   *
   * @param rootPath - Root file path
   * @param rootContent - Root file text, when it was not read from disk
   * @returns File records; the root is always at index 0
   */
  resolveTree(rootPath: string, rootContent?: string): ParsedFile[] {
    this.visit(rootPath, 0, [], rootContent);
    return this.files;
  }

  /**
   * Resolve an include pattern to the files it names, without parsing them.
   *
   * @param pattern - The include argument as written
   * @param includingFile - File the include appears in
   * @param line - Line of the include directive
   */
  expand(pattern: string, includingFile: string, line: number): PathExpansion {
    const target = path.isAbsolute(pattern)
      ? path.normalize(pattern)
      : path.resolve(this.options.baseDir, pattern);

    if (hasGlobMagic(pattern)) {
      return this.expandGlob(target, pattern, includingFile, line);
    }

    let entryType: EntryType | null;
    try {
      entryType = this.fileSystem.getEntryType(target);
    } catch {
      // Reading the path reports the failure on its own record
      return { paths: [target], error: null };
    }

    if (entryType === 'directory') {
      return this.expandDirectory(target, pattern, includingFile, line);
    }

    return { paths: [target], error: null };
  }

  // ============================================================================
  // Traversal
  // ============================================================================

  /**
   * Read, parse and expand one file. Its index is taken before its own
   * includes are visited, so the list is in pre-order.
   */
  private visit(filePath: string, depth: number, context: BlockContext, content?: string): number {
    const index = this.files.length;
    const record: ParsedFile = {
      file: filePath,
      status: 'ok',
      errors: [],
      parsed: [],
      context,
    };
    this.files.push(record);
    const key = path.resolve(filePath);
    this.visitCounts.set(key, (this.visitCounts.get(key) ?? 0) + 1);
    if (!this.options.allowIncludeRepeats) {
      this.indexByPath.set(key, index);
    }

    let text = content;
    if (text === undefined) {
      try {
        text = this.fileSystem.readFile(filePath);
      } catch (error) {
        recordErrors(record, [fileAccessError(filePath, error)]);
        logFileParsed(this.logger, record, depth);
        return index;
      }
    }

    const { nodes, errors } = this.parseContent(text, filePath);
    record.parsed = nodes;
    recordErrors(record, errors);
    logFileParsed(this.logger, record, depth);

    if (!this.options.singleFile && !this.options.ignoreDirectives.includes(INCLUDE_DIRECTIVE)) {
      this.expandIncludes(record, nodes, depth, context);
    }

    return index;
  }

  private expandIncludes(
    record: ParsedFile,
    nodes: readonly DirectiveNode[],
    depth: number,
    context: BlockContext
  ): void {
    for (const node of nodes) {
      if (node.directive === INCLUDE_DIRECTIVE && node.block === undefined && node.args.length > 0) {
        node.includes = this.includeFiles({ record, node, depth, context });
      }
      if (node.block) {
        this.expandIncludes(record, node.block, depth, enterBlockContext(context, node.directive));
      }
    }
  }

  /**
   * Expand one include directive into record indices. A file that already
   * has a record is referenced whatever the depth; only new visits count
   * against the depth and per-path limits.
   */
  private includeFiles(site: IncludeSite): number[] {
    const { record, node, depth, context } = site;
    const pattern = node.args[0];
    const childDepth = depth + 1;

    const { paths, error } = this.expand(pattern, record.file, node.line);
    if (error) {
      recordErrors(record, [error]);
    }
    logIncludeResolved(this.logger, record.file, pattern, paths);

    const indices: number[] = [];
    let depthExceeded = false;
    for (const filePath of paths) {
      const key = path.resolve(filePath);
      const existing = this.options.allowIncludeRepeats ? undefined : this.indexByPath.get(key);
      if (existing !== undefined) {
        indices.push(existing);
        continue;
      }

      if (childDepth > this.options.maxIncludeDepth) {
        if (!depthExceeded) {
          depthExceeded = true;
          recordErrors(record, [
            createParseError(
              'IncludeDepthExceeded',
              ParseErrorMessages.includeDepthExceeded(pattern, this.options.maxIncludeDepth),
              record.file,
              node.line
            ),
          ]);
        }
        continue;
      }

      if ((this.visitCounts.get(key) ?? 0) >= MAX_VISITS_PER_PATH) {
        recordErrors(record, [
          createParseError(
            'IncludeDepthExceeded',
            ParseErrorMessages.includeRepeatLimit(filePath, MAX_VISITS_PER_PATH),
            record.file,
            node.line
          ),
        ]);
        continue;
      }

      indices.push(this.visit(filePath, childDepth, context));
    }
    return indices;
  }

  // ============================================================================
  // Path Expansion
  // ============================================================================

  /**
   * Match a pattern one path segment at a time. Intermediate wildcard
   * segments only descend into directories, and only into symlinked ones
   * when followSymlinks is set; the final segment only matches files.
   */
  private expandGlob(target: string, pattern: string, includingFile: string, line: number): PathExpansion {
    const { root } = path.parse(target);
    const segments = target.slice(root.length).split(path.sep).filter(segment => segment.length > 0);

    try {
      let candidates = [root];

      segments.forEach((segment, i) => {
        const isLast = i === segments.length - 1;
        const next: string[] = [];

        for (const dir of candidates) {
          if (!hasGlobMagic(segment)) {
            next.push(path.join(dir, segment));
            continue;
          }
          for (const name of this.listDirectory(dir)) {
            if (!minimatch(name, segment, { dot: false })) {
              continue;
            }
            const entry = path.join(dir, name);
            if (isLast || this.canDescend(entry)) {
              next.push(entry);
            }
          }
        }

        candidates = next;
      });

      const paths = candidates
        .filter(candidate => this.fileSystem.getEntryType(candidate) === 'file')
        .sort();
      return { paths, error: null };
    } catch (error) {
      return {
        paths: [],
        error: createParseError(
          'GlobExpansionFailure',
          ParseErrorMessages.globExpansionFailure(pattern, getErrorMessage(error)),
          includingFile,
          line
        ),
      };
    }
  }

  private expandDirectory(target: string, pattern: string, includingFile: string, line: number): PathExpansion {
    if (!this.options.includeDirectories) {
      return {
        paths: [],
        error: createParseError(
          'IncludeIsDirectory',
          ParseErrorMessages.includeIsDirectory(pattern),
          includingFile,
          line
        ),
      };
    }

    try {
      const paths = this.listDirectory(target)
        .map(name => path.join(target, name))
        .filter(entry => this.fileSystem.getEntryType(entry) === 'file')
        .sort();
      return { paths, error: null };
    } catch (error) {
      return {
        paths: [],
        error: createParseError(
          'GlobExpansionFailure',
          ParseErrorMessages.globExpansionFailure(pattern, getErrorMessage(error)),
          includingFile,
          line
        ),
      };
    }
  }

  /**
   * Entries of a directory in lexicographic order. A directory that does
   * not exist has no entries; other failures propagate.
   */
  private listDirectory(dir: string): string[] {
    try {
      return [...this.fileSystem.readDirectory(dir)].sort();
    } catch (error) {
      const code = getSystemErrorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return [];
      }
      throw error;
    }
  }

  private canDescend(entry: string): boolean {
    if (this.fileSystem.getEntryType(entry) !== 'directory') {
      return false;
    }
    return this.options.followSymlinks || !this.fileSystem.isSymbolicLink(entry);
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Whether a pattern contains glob wildcards
 */
export function hasGlobMagic(pattern: string): boolean {
  return /[*?[]/.test(pattern);
}

/**
 * Create an include resolver for one parse invocation
 */
export function createIncludeResolver(
  options: IncludeResolverOptions,
  parseContent: FileContentParser,
  fileSystem?: ConfigFileSystem,
  logger?: StructuredLogger
): IncludeResolver {
  return new IncludeResolver(options, parseContent, fileSystem, logger);
}
