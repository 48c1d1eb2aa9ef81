/**
 * Parsing and serialization of structured documents.
 *
 * The parser is picked from the file extension: `.yaml`/`.yml` and `.json`
 * have their own parsers, everything else (`.toml`, `.conf`, none) is TOML.
 */
import * as path from 'node:path';
import * as TOML from 'smol-toml';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { IncludeParseError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { isConfigTable, isConfigValue, type ConfigTable, type DocumentFormat } from './types.js';

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.json': 'json',
};

/**
 * Document format implied by a file's extension.
 */
export function detectFormat(filePath: string): DocumentFormat {
  return EXTENSION_FORMATS[path.extname(filePath).toLowerCase()] ?? 'toml';
}

/**
 * Parse file content into a top-level table.
 * @throws IncludeParseError when the content is malformed or not a table
 */
export function parseDocument(
  content: string,
  filePath: string,
  format: DocumentFormat = detectFormat(filePath)
): ConfigTable {
  let parsed: unknown;
  try {
    parsed = parseByFormat(content, format);
  } catch (error) {
    throw new IncludeParseError(filePath, error);
  }

  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isConfigTable(parsed) || !isConfigValue(parsed)) {
    throw new IncludeParseError(filePath, `expected a ${format} table at the top level`);
  }

  return parsed;
}

function parseByFormat(content: string, format: DocumentFormat): unknown {
  switch (format) {
    case 'toml':
      return TOML.parse(content);
    case 'yaml':
      return parseYaml(content);
    case 'json':
      return JSON.parse(content);
  }
}

/**
 * Render a document in the given format.
 */
export function serializeDocument(document: ConfigTable, format: DocumentFormat): string {
  try {
    switch (format) {
      case 'toml':
        return TOML.stringify(document);
      case 'yaml':
        return stringifyYaml(document, { indent: 2, lineWidth: 100 });
      case 'json':
        return JSON.stringify(document, jsonReplacer, 2);
    }
  } catch (error) {
    throw new SystemError(
      ErrorCodes.SERIALIZE_ERROR,
      `Failed to serialize document as ${format}: ${error instanceof Error ? error.message : String(error)}`,
      { format }
    );
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
