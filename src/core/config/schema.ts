import { z } from 'zod';
import { DEFAULT_INCLUDE_KEY } from '../include/directives.js';

/**
 * Helper to create an optional object field that still gets its inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Metadata discovery defaults. */
export const MetadataConfigSchema = z.object({
  /** Extensions searched when a command is not given --ext */
  extensions: z.array(z.string().min(1)).default(['conf']),
});

/** Configuration file schema (.confweave.yaml). */
export const ConfigSchema = z.object({
  /** Top-level key holding include patterns in structured documents */
  include_key: z.string().min(1).default(DEFAULT_INCLUDE_KEY),
  /** Home directory used for `~/`, `$HOME` and `${HOME}`; defaults to the user's */
  home: z.string().min(1).nullable().default(null),
  log_level: LogLevelSchema.default('info'),
  metadata: withDefaults(MetadataConfigSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type MetadataConfig = z.infer<typeof MetadataConfigSchema>;
