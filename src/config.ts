/**
 * Release configuration.
 * @module config
 *
 * Precedence: CLI overrides, then the YAML config file, then
 * SOURCE_DATE_EPOCH (timestamp only), then defaults.
 */
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError, toError } from './errors';
import { SchemaValidator } from './services/SchemaValidator';
import type { ArchiveLayout, ReleaseConfig } from './types';

export const CONFIG_FILE_NAME = '.xrnx-release.yml';

export const DEFAULT_CONFIG: Readonly<ReleaseConfig> = {
  manifestFile: 'manifest.xml',
  releaseDir: 'release',
  scriptExtension: '.lua',
  archiveExtension: 'xrnx',
  layout: 'wrapped',
  compressionLevel: 9,
};

export interface LoadConfigOptions {
  /** Explicit config file; unlike the default file, it must exist */
  configFile?: string;
  overrides?: Partial<ReleaseConfig>;
  env?: NodeJS.ProcessEnv;
  schemaDir?: string;
}

export function isArchiveLayout(value: unknown): value is ArchiveLayout {
  return value === 'flat' || value === 'wrapped';
}

/** Last instant a zip (DOS) timestamp can hold; earlier dates are clamped to 1980 by the writer */
export const MAX_TIMESTAMP = new Date(Date.UTC(2107, 11, 31, 23, 59, 58));

/**
 * @param source - Where the value came from, for the error message
 * @throws ConfigError for an invalid date or one after 2107
 */
export function checkTimestamp(date: Date, source: string): Date {
  if (Number.isNaN(date.getTime())) {
    throw new ConfigError(`${source} is not a valid date`);
  }
  if (date.getTime() > MAX_TIMESTAMP.getTime()) {
    throw new ConfigError(`${source} is after ${MAX_TIMESTAMP.toISOString()}, the latest zip timestamp`);
  }
  return date;
}

/**
 * Convert a SOURCE_DATE_EPOCH value (seconds since the Unix epoch) to a Date.
 */
export function timestampFromEpoch(value: string): Date {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`SOURCE_DATE_EPOCH must be a non-negative integer (got "${value}")`);
  }
  return checkTimestamp(new Date(Number(value.trim()) * 1000), `SOURCE_DATE_EPOCH "${value}"`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromValidatedRecord(data: Record<string, unknown>): Partial<ReleaseConfig> {
  const config: Partial<ReleaseConfig> = {};
  if (typeof data.manifestFile === 'string') {
    config.manifestFile = data.manifestFile;
  }
  if (typeof data.releaseDir === 'string') {
    config.releaseDir = data.releaseDir;
  }
  if (typeof data.scriptExtension === 'string') {
    config.scriptExtension = data.scriptExtension;
  }
  if (typeof data.archiveExtension === 'string') {
    config.archiveExtension = data.archiveExtension;
  }
  if (isArchiveLayout(data.layout)) {
    config.layout = data.layout;
  }
  if (typeof data.compressionLevel === 'number') {
    config.compressionLevel = data.compressionLevel;
  }
  if (typeof data.timestamp === 'string') {
    config.timestamp = checkTimestamp(new Date(data.timestamp), `timestamp "${data.timestamp}"`);
  }
  return config;
}

/**
 * Read and validate a YAML config file.
 * @param configFile - Absolute path to the file
 * @param validator - Schema validator to use
 * @returns The settings present in the file
 * @throws ConfigError if the file cannot be read, is not valid YAML, or fails the schema
 */
export function readConfigFile(configFile: string, validator: SchemaValidator = new SchemaValidator()): Partial<ReleaseConfig> {
  let data: unknown;
  try {
    // CORE_SCHEMA keeps timestamps as strings
    data = yaml.load(fs.readFileSync(configFile, 'utf8'), { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${configFile}: ${toError(error).message}`);
  }

  // An empty file means "no settings"
  if (data === undefined || data === null) {
    return {};
  }

  const result = validator.validateReleaseConfig(data);
  if (!result.valid) {
    throw new ConfigError(`Invalid config file ${configFile}`, result.errors);
  }
  if (!isRecord(data)) {
    throw new ConfigError(`Invalid config file ${configFile}`, ['(root): must be object']);
  }
  return fromValidatedRecord(data);
}

/**
 * Resolve the effective configuration for a project directory.
 */
export function loadReleaseConfig(cwd: string, options: LoadConfigOptions = {}): ReleaseConfig {
  const env = options.env ?? process.env;
  const validator = new SchemaValidator(options.schemaDir);

  let fileConfig: Partial<ReleaseConfig> = {};
  if (options.configFile) {
    const configFile = path.resolve(cwd, options.configFile);
    if (!fs.existsSync(configFile)) {
      throw new ConfigError(`Config file not found: ${configFile}`);
    }
    fileConfig = readConfigFile(configFile, validator);
  } else {
    const defaultFile = path.join(cwd, CONFIG_FILE_NAME);
    if (fs.existsSync(defaultFile)) {
      fileConfig = readConfigFile(defaultFile, validator);
    }
  }

  const config: ReleaseConfig = { ...DEFAULT_CONFIG, ...fileConfig, ...options.overrides };
  if (!config.timestamp && env.SOURCE_DATE_EPOCH) {
    config.timestamp = timestampFromEpoch(env.SOURCE_DATE_EPOCH);
  }
  return config;
}
