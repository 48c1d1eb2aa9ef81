/**
 * File system operations used by the resolvers.
 *
 * Everything here is synchronous: graph walks and include loads run to
 * completion on the calling thread.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';

/**
 * Read a file as UTF-8 text.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Check if a path exists (file, directory or anything else).
 */
export function fileExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Check if a path exists and is a regular file (symlinks followed).
 */
export function isFileSync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Resolve symlinks and relative segments.
 * Falls back to the path as given when it cannot be resolved (e.g. missing file).
 */
export function canonicalizeSync(filePath: string): string {
  try {
    return fs.realpathSync(filePath);
  } catch {
    return filePath;
  }
}

/**
 * Find files matching glob patterns below `cwd`.
 */
export function globFilesSync(
  patterns: string | string[],
  options: {
    cwd: string;
    ignore?: string[];
    caseSensitiveMatch?: boolean;
  }
): string[] {
  return fg.sync(patterns, {
    cwd: options.cwd,
    ignore: options.ignore ?? [],
    absolute: true,
    onlyFiles: true,
    dot: true,
    caseSensitiveMatch: options.caseSensitiveMatch ?? true,
  });
}

