/**
 * Metadata headers that identify a config file by content instead of name.
 *
 * ```
 * # hypr metadata
 * # type = bar
 * ```
 */
import { splitLines } from '../source/directives.js';

/** Primary metadata key for config type. */
export const TYPE_KEY = 'type';
/** Required first-line marker for metadata-enabled config files. */
export const HEADER_LINE = '# hypr metadata';
/** Lines inspected, header line included. */
export const HEADER_SCAN_LINES = 64;

/**
 * Metadata contract for selecting config files.
 */
export interface ConfigMetaSpec {
  /** Logical config type, e.g. `theme`, `bar`, `logging` */
  configType: string;
  /** Allowed file extensions, without the leading dot */
  extensions: readonly string[];
}

export interface ConfigMetadata {
  configType: string;
}

export function metaSpecFor(configType: string, extensions: readonly string[]): ConfigMetaSpec {
  return { configType, extensions };
}

/**
 * Parse `# key = value` / `# key: value` comment lines from the file header.
 * Returns an empty map unless the first line is the metadata marker.
 */
export function parseMetadataHeader(content: string): Map<string, string> {
  const out = new Map<string, string>();
  const lines = splitLines(content).slice(0, HEADER_SCAN_LINES);

  const firstLine = lines.shift();
  if (firstLine === undefined) {
    return out;
  }
  if (firstLine.replace(/^\uFEFF+/, '').trim().toLowerCase() !== HEADER_LINE) {
    return out;
  }

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('#')) {
      continue;
    }

    const body = trimmed.replace(/^#+/, '').trim();
    const pair = splitOnce(body, '=') ?? splitOnce(body, ':');
    if (!pair) {
      continue;
    }

    const key = pair[0].trim().toLowerCase();
    const value = trimChar(trimChar(pair[1].trim(), '"'), "'");
    if (value) {
      out.set(key, value);
    }
  }

  return out;
}

/**
 * Metadata carried by the content, or undefined when it declares no type.
 */
export function metadataFromContent(content: string): ConfigMetadata | undefined {
  const configType = parseMetadataHeader(content).get(TYPE_KEY);
  return configType === undefined ? undefined : { configType };
}

/**
 * Check whether content declares the requested config type.
 */
export function matchesSpec(content: string, spec: ConfigMetaSpec): boolean {
  return metadataFromContent(content)?.configType === spec.configType;
}

function splitOnce(value: string, separator: string): [string, string] | undefined {
  const index = value.indexOf(separator);
  return index === -1 ? undefined : [value.slice(0, index), value.slice(index + separator.length)];
}

/**
 * Remove every leading and trailing occurrence of `char`.
 */
function trimChar(value: string, char: string): string {
  let start = 0;
  let end = value.length;

  while (start < end && value[start] === char) start++;
  while (end > start && value[end - 1] === char) end--;

  return value.slice(start, end);
}
