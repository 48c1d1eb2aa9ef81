import { Command } from 'commander';
import * as path from 'node:path';
import { expandExpression, expressionMatchesPath, resolveTargets } from '../../core/source/expander.js';
import { logger as log } from '../../utils/logger.js';
import { prepareRun, type CommonOptions } from '../context.js';

interface ExpandOptions extends CommonOptions {
  base?: string;
  match?: string;
  json?: boolean;
}

/**
 * Create the expand command.
 */
export function createExpandCommand(): Command {
  return new Command('expand')
    .description('Debug: show the files a source/include expression resolves to')
    .argument('<expression>', 'Expression as written in a config, e.g. "~/themes/*.conf"')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Verbose logging')
    .option('-b, --base <dir>', 'Directory relative expressions resolve from (default: cwd)')
    .option('-m, --match <path>', 'Only report whether this path is covered by the expression')
    .option('--json', 'Output as JSON')
    .action((expression: string, options: ExpandOptions) => {
      try {
        runExpand(expression, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

function runExpand(expression: string, options: ExpandOptions): void {
  const { projectRoot, homeDir } = prepareRun(options);
  const baseDir = path.resolve(projectRoot, options.base ?? '.');

  if (options.match !== undefined) {
    const target = path.resolve(projectRoot, options.match);
    const matches = expressionMatchesPath(expression, baseDir, homeDir, target);
    console.log(options.json ? JSON.stringify({ target, matches }, null, 2) : String(matches));
    return;
  }

  const expanded = expandExpression(expression, baseDir, homeDir);
  const targets = resolveTargets(expression, baseDir, homeDir);

  if (options.json) {
    console.log(JSON.stringify({ expanded, targets }, null, 2));
    return;
  }

  for (const target of targets) {
    console.log(target);
  }
}
