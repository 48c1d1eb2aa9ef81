/**
 * Include directives stored as an ordinary top-level key of a structured
 * document, e.g. `include = ["themes/*.conf", "~/local.conf"]`.
 */
import type { ConfigTable } from './types.js';

export const DEFAULT_INCLUDE_KEY = 'include';

/**
 * Collect the string entries of the array bound to `includeKey`.
 * Non-string entries are skipped; a missing key or non-array value yields [].
 */
export function extractIncludePatterns(document: ConfigTable, includeKey: string): string[] {
  if (!Object.hasOwn(document, includeKey)) {
    return [];
  }

  const includes = document[includeKey];
  if (!Array.isArray(includes)) {
    return [];
  }

  return includes.filter((include): include is string => typeof include === 'string');
}
