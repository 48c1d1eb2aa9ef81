import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createGraphCommand } from './commands/graph.js';
import { createLoadCommand } from './commands/load.js';
import { createExpandCommand } from './commands/expand.js';
import { createDiscoverCommand } from './commands/discover.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('confweave')
    .description('Resolve source/include graphs of desktop tool config files')
    .version(readVersion());

  [createGraphCommand, createLoadCommand, createExpandCommand, createDiscoverCommand]
    .forEach((cmd) => program.addCommand(cmd()));

  return program;
}
