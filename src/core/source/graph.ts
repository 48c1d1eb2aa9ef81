/**
 * Flat `source` graph collection.
 */
import * as path from 'node:path';
import { canonicalizeSync, isFileSync, readFileSync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { parseSourceValue, splitLines } from './directives.js';
import { resolveTargets } from './expander.js';

/**
 * Collect every file reachable from `root` through `source = ...` directives.
 *
 * Each file appears once, keyed by its canonical path, so cycles and diamonds
 * simply stop descending. Files that cannot be read are listed but not
 * descended into. Paths are returned as they were reached (not canonicalized),
 * in work-stack pop order.
 */
export function collectSourceGraph(root: string, homeDir: string): string[] {
  const out: string[] = [];
  const stack: string[] = [root];
  const seen = new Set<string>();

  let file: string | undefined;
  while ((file = stack.pop()) !== undefined) {
    const canonical = canonicalizeSync(file);
    if (seen.has(canonical)) {
      continue;
    }
    seen.add(canonical);
    out.push(file);

    let content: string;
    try {
      content = readFileSync(file);
    } catch (error) {
      logger.debug(`source graph: not descending into unreadable file ${file}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    const baseDir = path.dirname(file);
    for (const line of splitLines(content)) {
      const value = parseSourceValue(line);
      if (value === undefined) {
        continue;
      }

      for (const target of resolveTargets(value, baseDir, homeDir)) {
        if (isFileSync(target)) {
          stack.push(target);
        } else {
          logger.debug(`source graph: skipping missing target ${target}`, { from: file, value });
        }
      }
    }
  }

  return out;
}
