/**
 * Line-oriented `source = ...` directives.
 *
 * The directive is a line of the form `source = "<expression>"`, optionally
 * followed by a `#` comment. Quotes around the value are optional.
 */

export const SOURCE_KEYWORD = 'source';

/**
 * Result of stripping every `source` directive out of a document.
 */
export interface ExtractedSources {
  /** Directive values in document order */
  sources: string[];
  /** Every non-directive line, each terminated by `\n` */
  remaining: string;
}

/**
 * Parse the value of a `source = ...` directive from a single line.
 * Returns undefined when the line is not a directive or its value is empty.
 */
export function parseSourceValue(line: string): string | undefined {
  const clean = stripComment(line).trim();
  if (!clean) {
    return undefined;
  }

  const eqIndex = clean.indexOf('=');
  if (eqIndex === -1) {
    return undefined;
  }

  if (clean.slice(0, eqIndex).trim() !== SOURCE_KEYWORD) {
    return undefined;
  }

  const value = unquote(clean.slice(eqIndex + 1).trim());
  return value || undefined;
}

/**
 * Extract all `source` directives and return the remaining content.
 *
 * TOML has no `source` statement, so table-based configs that borrow it
 * need the directive lines removed before the rest can be parsed.
 */
export function extractSources(content: string): ExtractedSources {
  const sources: string[] = [];
  let remaining = '';

  for (const line of splitLines(content)) {
    const source = parseSourceValue(line);
    if (source !== undefined) {
      sources.push(source);
      continue;
    }

    remaining += `${line}\n`;
  }

  return { sources, remaining };
}

/**
 * Split text into lines, accepting `\n` and `\r\n` endings.
 * A final newline does not start an extra empty line.
 */
export function splitLines(content: string): string[] {
  if (content === '') {
    return [];
  }

  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

function stripComment(line: string): string {
  const hashIndex = line.indexOf('#');
  return hashIndex === -1 ? line : line.slice(0, hashIndex);
}

/**
 * Remove one layer of matching `"` or `'` quotes.
 */
function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}
