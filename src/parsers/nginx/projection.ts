/**
 * NGINX Projection Layer
 * @module parsers/nginx/projection
 *
 * Renders parsed file records into one of two output documents:
 * - technical: one record per physical file with line numbers and include
 *   provenance, optionally combined into a single record;
 * - readable: a single nested map mirroring the logical configuration,
 *   with includes merged inline and parser metadata dropped.
 *
 * Projection is a pure function of the file records: projecting the same
 * records twice yields identical documents.
 */

import { collectErrors } from './errors';
import {
  DirectiveNode,
  ErrorEntry,
  FileStatus,
  isCommentNode,
  ParseDocument,
  ParsedFile,
  ReadableDocument,
  ReadableInfo,
  ReadableMap,
  ReadableValue,
  TechnicalDirective,
  TechnicalDocument,
  TechnicalFile,
} from './types';

// ============================================================================
// Projection Types
// ============================================================================

/**
 * Options selecting and shaping the projection
 */
export interface ProjectionOptions {
  /** Emit the technical projection instead of the readable one */
  readonly technicalFormat: boolean;
  /** Technical projection only: splice includes into one file record */
  readonly combineIncludes: boolean;
}

/**
 * Block types that always project to a list of maps
 */
export const REPEATABLE_BLOCKS: ReadonlySet<string> = new Set([
  'server',
  'location',
  'upstream',
  'if',
  'map',
  'geo',
  'split_clients',
  'limit_except',
  'match',
]);

/**
 * Key the arguments of a block directive are stored under, per directive
 */
const BLOCK_ARGUMENT_KEYS: Readonly<Record<string, string>> = {
  location: 'match',
  if: 'condition',
  upstream: 'name',
};

const DEFAULT_BLOCK_ARGUMENT_KEY = 'args';

const INCLUDE_DIRECTIVE = 'include';

/**
 * A node reached while flattening includes, with the chain of file
 * indices it was reached through
 */
interface FlatNode {
  readonly node: DirectiveNode;
  readonly ancestry: readonly number[];
}

// ============================================================================
// Envelope
// ============================================================================

/**
 * Overall status: failed when any contributing file failed
 */
export function overallStatus(files: readonly ParsedFile[]): FileStatus {
  return files.some(file => file.status === 'failed') ? 'failed' : 'ok';
}

/**
 * Errors of all files in envelope form
 */
export function toErrorEntries(files: readonly ParsedFile[]): ErrorEntry[] {
  return collectErrors(files).map(error => ({
    error: error.message,
    file: error.file,
    line: error.line,
  }));
}

// ============================================================================
// Technical Projection
// ============================================================================

/**
 * Per-file projection. With combineIncludes every include is replaced by
 * the directives of the files it expanded into and every node is tagged
 * with the file it came from.
 */
export function projectTechnical(
  files: readonly ParsedFile[],
  combineIncludes: boolean = false
): TechnicalDocument {
  const status = overallStatus(files);
  const errors = toErrorEntries(files);

  if (!combineIncludes) {
    return {
      format: 'technical',
      status,
      errors,
      config: files.map(file => ({
        file: file.file,
        status: file.status,
        errors: file.errors.map(error => ({ error: error.message, line: error.line })),
        parsed: file.parsed.map(node => toTechnicalDirective(node, false)),
      })),
    };
  }

  const root = files[0];
  const combined: TechnicalFile = {
    file: root ? root.file : '',
    status,
    errors: collectErrors(files).map(error => ({ error: error.message, line: error.line })),
    parsed: root ? combineNodes(root.parsed, files, [0]) : [],
  };

  return { format: 'technical', status, errors, config: [combined] };
}

function toTechnicalDirective(node: DirectiveNode, tagFile: boolean): TechnicalDirective {
  return {
    ...(tagFile ? { file: node.file } : {}),
    directive: node.directive,
    line: node.line,
    args: [...node.args],
    ...(node.includes !== undefined ? { includes: [...node.includes] } : {}),
    ...(node.block !== undefined ? { block: node.block.map(child => toTechnicalDirective(child, tagFile)) } : {}),
    ...(node.comment !== undefined ? { comment: node.comment } : {}),
  };
}

function combineNodes(
  nodes: readonly DirectiveNode[],
  files: readonly ParsedFile[],
  ancestry: readonly number[]
): TechnicalDirective[] {
  const result: TechnicalDirective[] = [];

  for (const node of nodes) {
    if (node.directive === INCLUDE_DIRECTIVE && node.includes !== undefined) {
      for (const index of node.includes) {
        const included = files[index];
        if (included && !ancestry.includes(index)) {
          result.push(...combineNodes(included.parsed, files, [...ancestry, index]));
        }
      }
      continue;
    }

    const { block, ...rest } = node;
    const directive = toTechnicalDirective(rest, true);
    result.push(
      block !== undefined ? { ...directive, block: combineNodes(block, files, ancestry) } : directive
    );
  }

  return result;
}

// ============================================================================
// Readable Projection
// ============================================================================

/**
 * Merged projection of the whole include tree
 */
export function projectReadable(files: readonly ParsedFile[]): ReadableDocument {
  const root = files[0];
  const config = root ? buildMap(flattenIncludes(root.parsed, files, [0]), files, {}) : {};

  const includedFiles: string[] = [];
  for (const file of files.slice(1)) {
    if (!includedFiles.includes(file.file)) {
      includedFiles.push(file.file);
    }
  }

  const info: ReadableInfo = {
    mainFile: root ? root.file : '',
    includedFiles,
    totalFilesProcessed: files.length,
  };

  return {
    format: 'readable',
    status: overallStatus(files),
    errors: toErrorEntries(files),
    config,
    info,
  };
}

/**
 * Replace expanded includes with the nodes of the files they name.
 * A file already on the current include chain is not entered again.
 */
function flattenIncludes(
  nodes: readonly DirectiveNode[],
  files: readonly ParsedFile[],
  ancestry: readonly number[]
): FlatNode[] {
  const result: FlatNode[] = [];

  for (const node of nodes) {
    if (node.directive === INCLUDE_DIRECTIVE && node.includes !== undefined) {
      for (const index of node.includes) {
        const included = files[index];
        if (included && !ancestry.includes(index)) {
          result.push(...flattenIncludes(included.parsed, files, [...ancestry, index]));
        }
      }
      continue;
    }
    result.push({ node, ancestry });
  }

  return result;
}

/**
 * Build the map for one level. `map` may already hold the block arguments.
 */
function buildMap(entries: readonly FlatNode[], files: readonly ParsedFile[], map: ReadableMap): ReadableMap {
  const lists = new Map<string, ReadableValue[]>();

  entries.forEach(({ node, ancestry }, position) => {
    if (isCommentNode(node)) {
      setKey(map, `#${position}`, (node.comment ?? '').trim());
      return;
    }

    if (node.block === undefined) {
      addValue(map, lists, node.directive, argumentValue(node.args), false);
      return;
    }

    const seed: ReadableMap = {};
    if (node.args.length > 0) {
      seed[BLOCK_ARGUMENT_KEYS[node.directive] ?? DEFAULT_BLOCK_ARGUMENT_KEY] = node.args.join(' ');
    }
    const child = buildMap(flattenIncludes(node.block, files, ancestry), files, seed);
    addValue(map, lists, node.directive, child, REPEATABLE_BLOCKS.has(node.directive));
  });

  return map;
}

/**
 * Store a value; a key seen a second time (or any repeatable block)
 * becomes an ordered list
 */
function addValue(
  map: ReadableMap,
  lists: Map<string, ReadableValue[]>,
  key: string,
  value: ReadableValue,
  alwaysList: boolean
): void {
  const list = lists.get(key);
  if (list) {
    list.push(value);
    return;
  }

  const seen = Object.prototype.hasOwnProperty.call(map, key);
  if (alwaysList || seen) {
    const created = seen ? [map[key], value] : [value];
    lists.set(key, created);
    setKey(map, key, created);
    return;
  }

  setKey(map, key, value);
}

/**
 * Define an own enumerable key, so names such as `__proto__` stay plain data
 */
function setKey(map: ReadableMap, key: string, value: ReadableValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * No arguments project to null, one to a string, more to a list
 */
export function argumentValue(args: readonly string[]): ReadableValue {
  if (args.length === 0) {
    return null;
  }
  return args.length === 1 ? args[0] : [...args];
}

// ============================================================================
// Projection Entry Point
// ============================================================================

/**
 * Project file records into the document selected by the options
 */
export function project(files: readonly ParsedFile[], options: ProjectionOptions): ParseDocument {
  return options.technicalFormat
    ? projectTechnical(files, options.combineIncludes)
    : projectReadable(files);
}
