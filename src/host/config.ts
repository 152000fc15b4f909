/**
 * Host configuration
 *
 * Sources, lowest precedence first:
 *   1. YAML host file (`yamlFile`)
 *   2. `.env` file (`envFile`, read with dotenv, never written to process.env)
 *   3. the environment (`env`, default process.env)
 *
 * Recognized variables: PINWIRE_DOMAIN, PINWIRE_LOG_LEVEL, PINWIRE_LOG_SHOW,
 * PINWIRE_LOG_HIDE, PINWIRE_LOG_SOLO (comma separated), PINWIRE_MODES_FILE,
 * PINWIRE_INITIAL_MODE, PINWIRE_TRACE_DIR, PINWIRE_STORE_DIR,
 * PINWIRE_EXPECTED_CLASSES (comma separated).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import * as yaml from 'js-yaml';
import { Errors } from '../errors';
import { isLogLevel, LoggerConfig } from '../logging/logger';
import type { Domain } from '../nodes/types';

export interface HostConfig {
  domain: Domain;
  log: Partial<LoggerConfig>;
  /** YAML mode table loaded before init */
  modesFile?: string;
  /** Mode switched to between init and start */
  initialMode?: string;
  /** Directory for JSONL traces; memory tracing when absent */
  traceDir?: string;
  /** Directory for the JSON attribute store; memory store when absent */
  storeDir?: string;
  /** Classes that must be registered before the bus initializes */
  expectedClasses: string[];
}

export interface LoadHostConfigOptions {
  envFile?: string;
  yamlFile?: string;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_HOST_CONFIG: HostConfig = {
  domain: 'shared',
  log: {},
  expectedClasses: []
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDomain(value: unknown): value is Domain {
  return value === 'server' || value === 'client' || value === 'shared';
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function stringList(value: unknown, key: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw Errors.invalidDefinition(`Host config: ${key} must be a list of strings`);
  }
  return [...value];
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw Errors.invalidDefinition(`Host config: ${key} must be a string`);
  }
  return value;
}

function parseGroups(value: unknown): Record<string, string[]> {
  if (!isRecord(value)) {
    throw Errors.invalidDefinition('Host config: log.groups must map group names to lists');
  }
  const groups: Record<string, string[]> = {};
  for (const [name, members] of Object.entries(value)) {
    groups[name] = stringList(members, `log.groups.${name}`);
  }
  return groups;
}

function parseLogSection(value: unknown): Partial<LoggerConfig> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw Errors.invalidDefinition('Host config: log must be a map');
  }

  const log: Partial<LoggerConfig> = {};
  if (value.level !== undefined) {
    if (!isLogLevel(value.level)) {
      throw Errors.invalidDefinition(`Host config: unknown log level '${String(value.level)}'`);
    }
    log.level = value.level;
  }
  if (value.show !== undefined) log.show = stringList(value.show, 'log.show');
  if (value.hide !== undefined) log.hide = stringList(value.hide, 'log.hide');
  if (value.solo !== undefined) log.solo = stringList(value.solo, 'log.solo');
  if (value.groups !== undefined) log.groups = parseGroups(value.groups);
  return log;
}

/**
 * Parse a YAML host document. Relative paths resolve against `baseDir`.
 */
export function parseHostYaml(text: string, baseDir = process.cwd()): Partial<HostConfig> {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw Errors.invalidDefinition(
      `Invalid host YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (document === undefined || document === null) return {};
  if (!isRecord(document)) {
    throw Errors.invalidDefinition('Host YAML must be a map');
  }

  const config: Partial<HostConfig> = {};
  if (document.domain !== undefined) {
    if (!isDomain(document.domain)) {
      throw Errors.invalidDefinition(`Host config: unknown domain '${String(document.domain)}'`);
    }
    config.domain = document.domain;
  }
  config.log = parseLogSection(document.log);

  const resolvePath = (value: unknown, key: string): string | undefined => {
    const raw = optionalString(value, key);
    return raw === undefined ? undefined : path.resolve(baseDir, raw);
  };
  config.modesFile = resolvePath(document.modesFile, 'modesFile');
  config.traceDir = resolvePath(document.traceDir, 'traceDir');
  config.storeDir = resolvePath(document.storeDir, 'storeDir');
  config.initialMode = optionalString(document.initialMode, 'initialMode');
  if (document.expectedClasses !== undefined) {
    config.expectedClasses = stringList(document.expectedClasses, 'expectedClasses');
  }
  return config;
}

/**
 * Read PINWIRE_* variables
 */
export function configFromEnv(env: Record<string, string | undefined>): Partial<HostConfig> {
  const config: Partial<HostConfig> = {};
  const log: Partial<LoggerConfig> = {};

  const domain = env.PINWIRE_DOMAIN;
  if (domain !== undefined && domain !== '') {
    if (!isDomain(domain)) {
      throw Errors.invalidDefinition(`PINWIRE_DOMAIN: unknown domain '${domain}'`);
    }
    config.domain = domain;
  }

  const level = env.PINWIRE_LOG_LEVEL;
  if (level !== undefined && level !== '') {
    if (!isLogLevel(level)) {
      throw Errors.invalidDefinition(`PINWIRE_LOG_LEVEL: unknown log level '${level}'`);
    }
    log.level = level;
  }
  if (env.PINWIRE_LOG_SHOW !== undefined) log.show = splitList(env.PINWIRE_LOG_SHOW);
  if (env.PINWIRE_LOG_HIDE !== undefined) log.hide = splitList(env.PINWIRE_LOG_HIDE);
  if (env.PINWIRE_LOG_SOLO !== undefined) log.solo = splitList(env.PINWIRE_LOG_SOLO);
  config.log = log;

  if (env.PINWIRE_MODES_FILE) config.modesFile = env.PINWIRE_MODES_FILE;
  if (env.PINWIRE_INITIAL_MODE) config.initialMode = env.PINWIRE_INITIAL_MODE;
  if (env.PINWIRE_TRACE_DIR) config.traceDir = env.PINWIRE_TRACE_DIR;
  if (env.PINWIRE_STORE_DIR) config.storeDir = env.PINWIRE_STORE_DIR;
  if (env.PINWIRE_EXPECTED_CLASSES !== undefined) {
    config.expectedClasses = splitList(env.PINWIRE_EXPECTED_CLASSES);
  }
  return config;
}

/**
 * Overlay configs left to right; later values win, log settings merge per key
 */
export function mergeHostConfig(...layers: Array<Partial<HostConfig>>): HostConfig {
  const result: HostConfig = { ...DEFAULT_HOST_CONFIG, log: {}, expectedClasses: [] };
  for (const layer of layers) {
    result.domain = layer.domain ?? result.domain;
    result.log = { ...result.log, ...layer.log };
    result.modesFile = layer.modesFile ?? result.modesFile;
    result.initialMode = layer.initialMode ?? result.initialMode;
    result.traceDir = layer.traceDir ?? result.traceDir;
    result.storeDir = layer.storeDir ?? result.storeDir;
    result.expectedClasses = layer.expectedClasses ?? result.expectedClasses;
  }
  return result;
}

export function loadHostConfig(options: LoadHostConfigOptions = {}): HostConfig {
  const fromYaml = options.yamlFile
    ? parseHostYaml(fs.readFileSync(options.yamlFile, 'utf-8'), path.dirname(options.yamlFile))
    : {};

  const fromDotenv = options.envFile && fs.existsSync(options.envFile)
    ? dotenv.parse(fs.readFileSync(options.envFile))
    : {};

  const env = { ...fromDotenv, ...(options.env ?? process.env) };
  return mergeHostConfig(fromYaml, configFromEnv(env));
}
