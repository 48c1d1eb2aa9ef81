/**
 * Locating config files by extension and metadata header.
 */
import * as path from 'node:path';
import { globFilesSync, isFileSync, readFileSync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { matchesSpec, type ConfigMetaSpec } from './header.js';

/**
 * Check whether a file has an allowed extension and a matching header.
 * Unreadable files never match.
 */
export function fileMatches(filePath: string, spec: ConfigMetaSpec): boolean {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  if (!spec.extensions.some((candidate) => candidate.toLowerCase() === ext)) {
    return false;
  }

  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    logger.debug(`metadata: cannot read ${filePath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }

  return matchesSpec(content, spec);
}

/**
 * Find every matching config file below `root`, sorted.
 */
export function discoverConfigFiles(root: string, spec: ConfigMetaSpec): string[] {
  if (spec.extensions.length === 0) {
    return [];
  }

  const candidates = globFilesSync(
    spec.extensions.map((ext) => `**/*.${ext}`),
    { cwd: root, caseSensitiveMatch: false }
  );

  return candidates.filter((candidate) => fileMatches(candidate, spec)).sort();
}

/**
 * Resolve a config path, strictly: the fallback when it exists and matches,
 * otherwise the first discovered file, otherwise undefined.
 */
export function resolveConfigPathStrict(
  root: string,
  fallback: string,
  spec: ConfigMetaSpec
): string | undefined {
  if (isFileSync(fallback) && fileMatches(fallback, spec)) {
    return fallback;
  }

  return discoverConfigFiles(root, spec)[0];
}

/**
 * Resolve a config path, returning `fallback` (even if missing) when nothing matches.
 */
export function resolveConfigPath(root: string, fallback: string, spec: ConfigMetaSpec): string {
  return resolveConfigPathStrict(root, fallback, spec) ?? fallback;
}
