/**
 * Structural merge of documents.
 *
 * Tables merge key by key, recursing into keys present on both sides. Any
 * other pairing (scalar, array, or a table against a non-table) is replaced
 * by the incoming value. An included file can therefore add settings or
 * override individual leaves without clobbering their siblings.
 */
import { isConfigTable, type ConfigTable, type ConfigValue } from './types.js';

/**
 * Merge `incoming` into `base`. Tables in `base` are updated in place;
 * always use the returned value, which is `incoming` when it replaces `base`.
 */
export function mergeValues(base: ConfigValue, incoming: ConfigValue): ConfigValue {
  if (isConfigTable(base) && isConfigTable(incoming)) {
    return mergeTables(base, incoming);
  }

  return incoming;
}

/**
 * Merge one table into another in place and return it.
 */
export function mergeTables(base: ConfigTable, incoming: ConfigTable): ConfigTable {
  for (const [key, value] of Object.entries(incoming)) {
    const merged = Object.hasOwn(base, key) ? mergeValues(base[key], value) : value;
    // defineProperty so a "__proto__" key from JSON stays an ordinary entry
    Object.defineProperty(base, key, {
      value: merged,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  return base;
}
