/**
 * Structured document model shared by the parsers, the merger and the loader.
 */

export type ConfigScalar = string | number | bigint | boolean | Date | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigTable;

export interface ConfigTable {
  [key: string]: ConfigValue;
}

export type DocumentFormat = 'toml' | 'yaml' | 'json';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['toml', 'yaml', 'json'];

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

/**
 * A table is a plain key/value object; arrays, dates and null are leaves.
 */
export function isConfigTable(value: unknown): value is ConfigTable {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Deep check that an untyped parse result only holds document values.
 */
export function isConfigValue(value: unknown): value is ConfigValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return true;
    case 'object':
      if (value === null || value instanceof Date) {
        return true;
      }
      if (Array.isArray(value)) {
        return value.every(isConfigValue);
      }
      return Object.values(value).every(isConfigValue);
    default:
      return false;
  }
}
