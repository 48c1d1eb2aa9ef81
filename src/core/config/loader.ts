import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExistsSync } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_FILE = '.confweave.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration.
 *
 * With an explicit `configPath` the file must exist. Otherwise
 * `.confweave.yaml` in `projectRoot` is used when present, and defaults when not.
 */
export function loadConfig(projectRoot: string, configPath?: string): Config {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_FILE);

  if (!fileExistsSync(fullPath)) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Home directory for path expansion: the configured override, else the user's.
 */
export function resolveHomeDir(config: Config): string {
  return config.home ?? os.homedir();
}
