import { Command } from 'commander';
import * as path from 'node:path';
import { discoverConfigFiles, resolveConfigPath } from '../../core/metadata/discovery.js';
import { metaSpecFor } from '../../core/metadata/header.js';
import { logger as log } from '../../utils/logger.js';
import { prepareRun, type CommonOptions } from '../context.js';

interface DiscoverOptions extends CommonOptions {
  type: string;
  ext?: string[];
  fallback?: string;
  json?: boolean;
}

/**
 * Create the discover command.
 */
export function createDiscoverCommand(): Command {
  return new Command('discover')
    .description('Find config files by their "# hypr metadata" header')
    .argument('<root>', 'Directory to search')
    .requiredOption('-t, --type <type>', 'Config type declared in the header (e.g. bar, theme)')
    .option('-e, --ext <ext...>', 'Allowed file extensions, without the dot')
    .option('--fallback <path>', 'Print the single resolved config path, preferring this file')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Verbose logging')
    .option('--json', 'Output as JSON')
    .action((root: string, options: DiscoverOptions) => {
      try {
        runDiscover(root, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

function runDiscover(root: string, options: DiscoverOptions): void {
  const { projectRoot, config } = prepareRun(options);
  const searchRoot = path.resolve(projectRoot, root);
  const spec = metaSpecFor(options.type, options.ext ?? config.metadata.extensions);

  if (options.fallback !== undefined) {
    const resolved = resolveConfigPath(searchRoot, path.resolve(projectRoot, options.fallback), spec);
    console.log(options.json ? JSON.stringify({ path: resolved }, null, 2) : resolved);
    return;
  }

  const files = discoverConfigFiles(searchRoot, spec);
  if (files.length === 0) {
    log.warn(`No "${spec.configType}" config found below ${searchRoot}`);
  }

  if (options.json) {
    console.log(JSON.stringify(files, null, 2));
    return;
  }

  for (const file of files) {
    console.log(file);
  }
}
