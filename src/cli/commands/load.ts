import { Command } from 'commander';
import * as path from 'node:path';
import { loadWithIncludes } from '../../core/include/loader.js';
import { serializeDocument } from '../../core/include/document.js';
import { DOCUMENT_FORMATS, isDocumentFormat } from '../../core/include/types.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { prepareRun, type CommonOptions } from '../context.js';

interface LoadOptions extends CommonOptions {
  includeKey?: string;
  format: string;
}

/**
 * Create the load command.
 */
export function createLoadCommand(): Command {
  return new Command('load')
    .description('Load a structured config with its includes merged in')
    .argument('<file>', 'Root config file')
    .option('-c, --config <path>', 'Path to config file')
    .option('-v, --verbose', 'Log skipped include targets')
    .option('-k, --include-key <key>', 'Top-level key holding include patterns')
    .option('-f, --format <format>', `Output format (${DOCUMENT_FORMATS.join(', ')})`, 'toml')
    .action((file: string, options: LoadOptions) => {
      try {
        runLoad(file, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

function runLoad(file: string, options: LoadOptions): void {
  const format = options.format;
  if (!isDocumentFormat(format)) {
    throw new SystemError(
      ErrorCodes.UNKNOWN_FORMAT,
      `Invalid format: ${format}. Use: ${DOCUMENT_FORMATS.join(', ')}`,
      { format }
    );
  }

  const { projectRoot, config, homeDir } = prepareRun(options);
  const includeKey = options.includeKey ?? config.include_key;

  const document = loadWithIncludes(path.resolve(projectRoot, file), includeKey, homeDir);
  console.log(serializeDocument(document, format));
}
