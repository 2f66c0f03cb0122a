/**
 * File System Access
 * @module parsers/nginx/file-system
 *
 * The parser only reads. Everything it needs from the file system goes
 * through ConfigFileSystem so callers (and tests) can substitute their own.
 * Implementations signal failures by throwing errors with errno-style
 * `code` properties (ENOENT, EACCES, EPERM, EISDIR).
 */

import * as fs from 'fs';

// ============================================================================
// Interface
// ============================================================================

/**
 * Type of a path after following symbolic links
 */
export type EntryType = 'file' | 'directory' | 'other';

/**
 * Read-only file system operations used by the parser
 */
export interface ConfigFileSystem {
  /** Read a whole file as UTF-8 text */
  readFile(filePath: string): string;
  /** Names of the entries of a directory (not sorted) */
  readDirectory(dirPath: string): string[];
  /** Type of the entry, following symbolic links; null when it does not exist */
  getEntryType(entryPath: string): EntryType | null;
  /** Whether the entry itself is a symbolic link */
  isSymbolicLink(entryPath: string): boolean;
}

// ============================================================================
// Node.js Implementation
// ============================================================================

/**
 * ConfigFileSystem backed by the local disk
 */
export class NodeFileSystem implements ConfigFileSystem {
  readFile(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  readDirectory(dirPath: string): string[] {
    return fs.readdirSync(dirPath);
  }

  getEntryType(entryPath: string): EntryType | null {
    const stats = fs.statSync(entryPath, { throwIfNoEntry: false });
    if (!stats) {
      return null;
    }
    if (stats.isFile()) {
      return 'file';
    }
    return stats.isDirectory() ? 'directory' : 'other';
  }

  isSymbolicLink(entryPath: string): boolean {
    const stats = fs.lstatSync(entryPath, { throwIfNoEntry: false });
    return stats ? stats.isSymbolicLink() : false;
  }
}

/**
 * Shared instance for callers that do not inject their own
 */
export const nodeFileSystem: ConfigFileSystem = new NodeFileSystem();
