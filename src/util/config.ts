import { resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import type { CheckboxEmojiIds, ConverterConfig } from '../models/entities.js';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_CHECKBOX_EMOJI } from '../transform/macroRules.js';
import { DEFAULT_OUTPUT_PREFIX } from '../transform/outputNamer.js';
import { isLogFormat, isLogLevel } from './logger.js';

// Load .env file if it exists
loadDotenv();

export const MAX_CONCURRENCY = 16;

export interface RawEnv {
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
  CONVERT_CONCURRENCY?: string;
}

export interface CliFlags {
  rootDir?: string;
  concurrency?: number;
  dryRun?: boolean;
  logLevel?: string;
  logFormat?: string;
}

/**
 * Shape of the optional YAML/JSON config file; every key is optional.
 */
export interface FileConfig {
  concurrency?: number;
  logLevel?: string;
  logFormat?: string;
  outputPrefix?: string;
  checkboxEmoji?: Partial<CheckboxEmojiIds>;
  codeLanguages?: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ConfigError(`Config key "${key}" must be a string`);
  return value;
}

function stringMap(value: unknown, key: string): Record<string, string> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) throw new ConfigError(`Config key "${key}" must be a mapping`);
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') throw new ConfigError(`Config key "${key}.${name}" must be a string`);
    result[name.toLowerCase()] = entry;
  }
  return result;
}

/**
 * Checks the parsed contents of a config file and narrows them to FileConfig.
 */
export function parseFileConfig(raw: unknown): FileConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ConfigError('Config file must contain a mapping at the top level');

  if (raw.concurrency !== undefined && typeof raw.concurrency !== 'number') {
    throw new ConfigError('Config key "concurrency" must be a number');
  }
  const concurrency = typeof raw.concurrency === 'number' ? raw.concurrency : undefined;

  const checkboxEmoji = stringMap(raw.checkboxEmoji, 'checkboxEmoji');

  return {
    concurrency,
    logLevel: optionalString(raw, 'logLevel'),
    logFormat: optionalString(raw, 'logFormat'),
    outputPrefix: optionalString(raw, 'outputPrefix'),
    checkboxEmoji: checkboxEmoji && { unchecked: checkboxEmoji.unchecked, checked: checkboxEmoji.checked },
    codeLanguages: stringMap(raw.codeLanguages, 'codeLanguages'),
  };
}

function validateConcurrency(value: number | undefined): number {
  const concurrency = value ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new ConfigError(`Concurrency must be a whole number between 1 and ${MAX_CONCURRENCY}`);
  }
  return concurrency;
}

function parseEnvNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) throw new ConfigError(`${name} must be a number`);
  return parsed;
}

function validateLogLevel(value: string | undefined): ConverterConfig['logLevel'] {
  const lvl = value || 'info';
  if (!isLogLevel(lvl)) {
    throw new ConfigError(`Invalid logLevel: ${lvl}`);
  }
  return lvl;
}

function validateLogFormat(value: string | undefined): ConverterConfig['logFormat'] {
  const format = value || 'human';
  if (!isLogFormat(format)) {
    throw new ConfigError(`Invalid logFormat: ${format}`);
  }
  return format;
}

function validateOutputPrefix(value: string | undefined): string {
  const prefix = value ?? DEFAULT_OUTPUT_PREFIX;
  if (!prefix.trim() || /[\\/]/.test(prefix)) {
    throw new ConfigError('outputPrefix must be non-empty and must not contain path separators');
  }
  return prefix;
}

/**
 * Defaults < config file < environment < CLI flags.
 */
export function buildConfig(env: RawEnv, flags: CliFlags, file: FileConfig = {}): ConverterConfig {
  if (!flags.rootDir) throw new ConfigError('A root folder is required');

  const concurrency = validateConcurrency(
    flags.concurrency ?? parseEnvNumber(env.CONVERT_CONCURRENCY, 'CONVERT_CONCURRENCY') ?? file.concurrency
  );

  return {
    rootDir: resolve(flags.rootDir),
    concurrency,
    dryRun: !!flags.dryRun,
    logLevel: validateLogLevel(flags.logLevel || env.LOG_LEVEL || file.logLevel),
    logFormat: validateLogFormat(flags.logFormat || env.LOG_FORMAT || file.logFormat),
    outputPrefix: validateOutputPrefix(file.outputPrefix),
    checkboxEmoji: {
      unchecked: file.checkboxEmoji?.unchecked || DEFAULT_CHECKBOX_EMOJI.unchecked,
      checked: file.checkboxEmoji?.checked || DEFAULT_CHECKBOX_EMOJI.checked,
    },
    codeLanguages: file.codeLanguages ?? {},
  };
}
