/**
 * Configuration loader and validation for CLI
 */

import { existsSync, statSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import type { ConverterConfig } from '../models/entities.js';
import { ConfigError } from '../core/errors.js';
import { logger } from '../util/logger.js';
import { buildConfig, parseFileConfig, type CliFlags, type FileConfig, type RawEnv } from '../util/config.js';

export interface CLIOptions {
  concurrency?: string;
  dryRun?: boolean;
  logLevel?: string;
  logFormat?: string;
  config?: string;
}

/**
 * Parses and validates CLI options
 */
function parseCliOptions(rootDir: string, options: CLIOptions): CliFlags {
  let concurrency: number | undefined;
  if (options.concurrency !== undefined) {
    concurrency = Number(options.concurrency);
    if (!Number.isInteger(concurrency)) {
      throw new ConfigError('Concurrency must be a whole number');
    }
  }

  return {
    rootDir,
    concurrency,
    dryRun: options.dryRun,
    logLevel: options.logLevel,
    logFormat: options.logFormat,
  };
}

function loadEnvironment(): RawEnv {
  return {
    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_FORMAT: process.env.LOG_FORMAT,
    CONVERT_CONCURRENCY: process.env.CONVERT_CONCURRENCY,
  };
}

function validateRootDir(rootDir: string): void {
  if (!existsSync(rootDir) || !statSync(rootDir).isDirectory()) {
    throw new ConfigError(`Export folder not found: ${rootDir}`);
  }
}

/**
 * Loads optional configuration file (.yaml, .yml or .json)
 */
export async function loadConfigFile(configPath?: string): Promise<FileConfig> {
  if (!configPath) {
    return {};
  }

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  const configContent = await readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = extname(configPath).toLowerCase() === '.json' ? JSON.parse(configContent) : parseYaml(configContent);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} could not be parsed: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseFileConfig(parsed);
}

/**
 * Loads and validates configuration from CLI options, environment and config file
 */
export async function loadConfig(rootDir: string, options: CLIOptions, env: RawEnv = loadEnvironment()): Promise<ConverterConfig> {
  try {
    const cliFlags = parseCliOptions(rootDir, options);
    const fileConfig = await loadConfigFile(options.config);
    const config = buildConfig(env, cliFlags, fileConfig);
    validateRootDir(config.rootDir);

    logger.setLevel(config.logLevel);
    logger.setFormat(config.logFormat);

    logger.debug('Configuration loaded successfully', {
      rootDir: config.rootDir,
      concurrency: config.concurrency,
      dryRun: config.dryRun,
      outputPrefix: config.outputPrefix,
    });

    return config;
  } catch (error) {
    logger.error('Configuration loading failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw error;
  }
}
