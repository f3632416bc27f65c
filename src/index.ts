#!/usr/bin/env node

/**
 * CLI entry point: converts a Confluence HTML export folder in place
 */

import { Command } from 'commander';
import { loadConfig, type CLIOptions } from './cli/configLoader.js';
import { promptForFolder } from './cli/prompt.js';
import { BatchRunner } from './core/batchRunner.js';
import { ConfigError, describeError } from './core/errors.js';
import { EXIT_CODES, exitCodeFor } from './core/exitStatus.js';
import { logger } from './util/logger.js';

async function resolveFolder(folder: string | undefined): Promise<string> {
  if (folder) return folder;
  if (!process.stdin.isTTY) {
    throw new ConfigError('No export folder given. Pass it as an argument.');
  }
  const answer = await promptForFolder();
  if (!answer) throw new ConfigError('No export folder given.');
  return answer;
}

/**
 * Handles the main convert action
 */
async function handleConvertAction(folder: string | undefined, options: CLIOptions): Promise<void> {
  let rootDir: string;
  let config: Awaited<ReturnType<typeof loadConfig>>;
  try {
    rootDir = await resolveFolder(folder);
    config = await loadConfig(rootDir, options);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exitCode = EXIT_CODES.INVALID_USAGE;
      return;
    }
    throw error;
  }

  logger.info('Starting conversion', {
    rootDir: config.rootDir,
    concurrency: config.concurrency,
    dryRun: config.dryRun,
  });

  const summary = await new BatchRunner(config).run();
  process.exitCode = exitCodeFor(summary);
}

const program = new Command();

program
  .name('convert-export')
  .description('Rewrite a Confluence HTML export into editor-ready HTML files')
  .version('0.1.0')
  .argument('[folder]', 'Root folder of the HTML export (prompted for when omitted)')
  .option('--concurrency <number>', 'Number of documents converted at the same time')
  .option('--dry-run', 'Convert and report without writing any files', false)
  .option('--log-level <level>', 'Log level: error, warn, info, debug')
  .option('--log-format <format>', 'Log format: human, json')
  .option('--config <file>', 'YAML or JSON configuration file (optional)')
  .action(handleConvertAction);

program.parseAsync().catch((error: unknown) => {
  logger.error('Conversion aborted', { error: describeError(error) });
  process.exitCode = EXIT_CODES.CONTENT_FAILURE;
});
