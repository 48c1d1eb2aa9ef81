/**
 * Recursive include loading (merge mode).
 */
import * as path from 'node:path';
import { canonicalizeSync, isFileSync, readFileSync } from '../../utils/file-system.js';
import { CyclicIncludeError, IncludeIoError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { resolveTargets } from '../source/expander.js';
import { extractIncludePatterns } from './directives.js';
import { parseDocument } from './document.js';
import { mergeTables } from './merge.js';
import type { ConfigTable } from './types.js';

interface LoadContext {
  includeKey: string;
  homeDir: string;
  /** Canonical paths currently being loaded, outermost first */
  loading: Set<string>;
}

/**
 * Load a structured document and recursively merge in the files named by its
 * top-level `includeKey` array.
 *
 * Includes are merged in declaration order, then glob-match order, each on
 * top of the including document: tables merge by key, later leaves win.
 * A file may be reached more than once through different branches; it only
 * fails when it includes one of its own ancestors.
 *
 * Include targets that do not exist (or are not regular files) are skipped.
 * The file passed in here is read strictly.
 *
 * @throws CyclicIncludeError when a file is reached again while still open
 * @throws IncludeIoError when a file being loaded cannot be read
 * @throws IncludeParseError when a file is not a valid document
 */
export function loadWithIncludes(filePath: string, includeKey: string, homeDir: string): ConfigTable {
  return loadFile(filePath, { includeKey, homeDir, loading: new Set() });
}

function loadFile(filePath: string, context: LoadContext): ConfigTable {
  const canonical = canonicalizeSync(filePath);
  if (context.loading.has(canonical)) {
    throw new CyclicIncludeError(canonical, [...context.loading, canonical]);
  }

  context.loading.add(canonical);
  try {
    let content: string;
    try {
      content = readFileSync(filePath);
    } catch (error) {
      throw new IncludeIoError(filePath, error);
    }

    const document = parseDocument(content, filePath);
    const baseDir = path.dirname(filePath);

    for (const pattern of extractIncludePatterns(document, context.includeKey)) {
      for (const includePath of resolveTargets(pattern, baseDir, context.homeDir)) {
        if (!isFileSync(includePath)) {
          logger.debug(`include: skipping missing target ${includePath}`, { from: filePath, pattern });
          continue;
        }

        mergeTables(document, loadFile(includePath, context));
      }
    }

    return document;
  } finally {
    context.loading.delete(canonical);
  }
}
