import { Command } from 'commander';
import * as path from 'node:path';
import { collectSourceGraph } from '../../core/source/graph.js';
import { logger as log } from '../../utils/logger.js';
import { prepareRun, type CommonOptions } from '../context.js';

interface GraphOptions extends CommonOptions {
  sort?: boolean;
  json?: boolean;
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('List every file reachable from a config through `source = ...` lines')
    .argument('<file>', 'Root config file')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Log skipped files and resolved targets')
    .option('--sort', 'Sort paths instead of printing them in visitation order')
    .option('--json', 'Output as JSON')
    .action((file: string, options: GraphOptions) => {
      try {
        runGraph(file, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

function runGraph(file: string, options: GraphOptions): void {
  const { projectRoot, homeDir } = prepareRun(options);

  const files = collectSourceGraph(path.resolve(projectRoot, file), homeDir);
  if (options.sort) {
    files.sort();
  }

  log.debug(`Collected ${files.length} file(s)`);

  if (options.json) {
    console.log(JSON.stringify(files, null, 2));
    return;
  }

  for (const entry of files) {
    console.log(entry);
  }
}
