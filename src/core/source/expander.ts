/**
 * Expansion of `source` / `include` expressions into concrete paths.
 *
 * Supported forms:
 * - `${HOME}` and `$HOME` anywhere in the expression
 * - a leading `~/`
 * - absolute paths, kept as-is
 * - relative paths, resolved from the declaring file's directory
 * - glob wildcards `*`, `?` and `[...]`, expanded against the filesystem
 */
import * as path from 'node:path';
import { globSync } from 'glob';
import { Minimatch } from 'minimatch';
import { isFileSync } from '../../utils/file-system.js';

// Only `*`, `?` and `[...]` are wildcards; braces and extglobs stay literal
const GLOB_OPTIONS = { dot: true, nobrace: true, noext: true } as const;

/**
 * Returns true when the value contains glob wildcard syntax.
 */
export function hasGlobChars(value: string): boolean {
  return value.includes('*') || value.includes('?') || value.includes('[');
}

/**
 * Expand an expression into an absolute or base-relative path.
 * Pure string manipulation: the filesystem is not consulted.
 */
export function expandExpression(expression: string, baseDir: string, homeDir: string): string {
  const out = expression
    .trim()
    .replaceAll('${HOME}', () => homeDir)
    .replaceAll('$HOME', () => homeDir);

  if (out.startsWith('~/')) {
    return path.join(homeDir, out.slice(2));
  }

  if (path.isAbsolute(out)) {
    return out;
  }

  return path.join(baseDir, out);
}

/**
 * Resolve one expression to concrete file targets.
 *
 * A non-glob expression always yields exactly one path, whether or not it
 * exists. A glob expression yields the regular files that currently match,
 * sorted; a malformed pattern yields nothing.
 */
export function resolveTargets(expression: string, baseDir: string, homeDir: string): string[] {
  const expanded = expandExpression(expression, baseDir, homeDir);

  if (!hasGlobChars(expanded)) {
    return [expanded];
  }

  if (compilePattern(expanded) === undefined) {
    return [];
  }

  try {
    return globSync(expanded, { ...GLOB_OPTIONS, nodir: true, absolute: true })
      .filter((match) => isFileSync(match))
      .sort();
  } catch {
    // glob rejects some patterns minimatch accepts; both mean "no matches"
    return [];
  }
}

/**
 * Returns true when `target` is covered by the expression.
 * Glob expressions are matched as patterns; anything else needs an exact match.
 * Wildcards never cross a `/`, so a path matches exactly when `resolveTargets`
 * could have produced it.
 */
export function expressionMatchesPath(
  expression: string,
  baseDir: string,
  homeDir: string,
  target: string
): boolean {
  const expanded = expandExpression(expression, baseDir, homeDir);

  if (hasGlobChars(expanded)) {
    const pattern = compilePattern(expanded);
    return pattern !== undefined && pattern.match(target);
  }

  return expanded === target;
}

/**
 * Compile a glob pattern, or undefined when it cannot be turned into a matcher.
 */
function compilePattern(pattern: string): Minimatch | undefined {
  if (!isWellFormed(pattern)) {
    return undefined;
  }

  try {
    const matcher = new Minimatch(pattern, GLOB_OPTIONS);
    return matcher.makeRe() === false ? undefined : matcher;
  } catch {
    return undefined;
  }
}

/**
 * Check bracket classes and `**` placement.
 *
 * A `]` right after `[` or `[!` belongs to the class, so `[]` and `[!]` are
 * unclosed. `**` is only valid as a whole path component.
 */
function isWellFormed(pattern: string): boolean {
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];

    if (char === '[') {
      let j = i + 1;
      if (pattern[j] === '!') j++;
      if (pattern[j] === ']') j++;
      const close = pattern.indexOf(']', j);
      if (close === -1) {
        return false;
      }
      i = close + 1;
      continue;
    }

    if (char === '*' && pattern[i + 1] === '*') {
      const end = i + 2;
      const startsComponent = i === 0 || pattern[i - 1] === '/';
      const endsComponent = end === pattern.length || pattern[end] === '/';
      if (!startsComponent || !endsComponent) {
        return false;
      }
      i = end;
      continue;
    }

    i++;
  }

  return true;
}
