/**
 * Per-command setup shared by every CLI command.
 */
import { loadConfig, resolveHomeDir } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { logger } from '../utils/logger.js';

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

export interface RunContext {
  projectRoot: string;
  config: Config;
  homeDir: string;
}

/**
 * Load configuration and apply the log level for one command run.
 * `--verbose` wins over the configured `log_level`.
 */
export function prepareRun(options: CommonOptions): RunContext {
  const projectRoot = process.cwd();
  const config = loadConfig(projectRoot, options.config);

  logger.setLevel(options.verbose ? 'debug' : config.log_level);

  return { projectRoot, config, homeDir: resolveHomeDir(config) };
}
