/**
 * triage-inbox Configuration
 * Resolves settings from defaults, config.json and the environment
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import {
  ConfigError,
  type TriageConfig,
  type TriageLocalConfig,
  type UserCommand,
} from '../types/index.js';
import {
  APP_NAME,
  DEFAULT_API_BASE_URL,
  DEFAULT_MAX_NOTIFICATIONS,
  DEFAULT_TOKEN_COMMAND,
  GRAPHQL_BATCH_SIZE,
  GRAPHQL_MAX_NODES,
  PRELOAD_CONCURRENCY,
  PRELOAD_COUNT,
  REQUEST_TIMEOUT_MS,
} from './constants.js';

type Env = Record<string, string | undefined>;

/**
 * Path to config.json, following XDG conventions
 */
export function getConfigPath(env: Env = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, APP_NAME, 'config.json');
}

/**
 * Directory holding the cache database, following XDG conventions
 */
export function getDefaultDataDir(env: Env = process.env): string {
  const base = env.XDG_DATA_HOME || join(homedir(), '.local', 'share');
  return join(base, APP_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function optionalString(raw: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${key} in ${path} must be a non-empty string`);
  }
  return value;
}

function optionalPositiveInt(raw: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} in ${path} must be a positive integer`);
  }
  return value;
}

function validateCommand(entry: unknown, index: number, path: string): UserCommand {
  if (!isRecord(entry)) {
    throw new ConfigError(`Command ${index} in ${path} must be an object`);
  }
  for (const field of ['name', 'args', 'mode']) {
    if (!(field in entry)) {
      throw new ConfigError(`Command ${index} in ${path} is missing required field '${field}'`);
    }
  }
  const { name, args, mode, cwd, env } = entry;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ConfigError(`Command ${index} in ${path}: name must be a non-empty string`);
  }
  if (!isStringArray(args) || args.length === 0) {
    throw new ConfigError(`Command ${index} in ${path}: args must be a non-empty array of strings`);
  }
  if (mode !== 'foreground' && mode !== 'background') {
    throw new ConfigError(`Command ${index} in ${path}: mode must be 'foreground' or 'background'`);
  }
  if (cwd !== undefined && typeof cwd !== 'string') {
    throw new ConfigError(`Command ${index} in ${path}: cwd must be a string`);
  }
  let envVars: Record<string, string> | undefined;
  if (env !== undefined) {
    if (!isRecord(env) || !Object.values(env).every((v) => typeof v === 'string')) {
      throw new ConfigError(`Command ${index} in ${path}: env must map names to strings`);
    }
    envVars = Object.fromEntries(Object.entries(env).map(([k, v]) => [k, String(v)]));
  }

  return { name, args, mode, ...(cwd !== undefined ? { cwd } : {}), ...(envVars ? { env: envVars } : {}) };
}

/**
 * Validate parsed config.json contents
 */
export function validateLocalConfig(raw: unknown, path: string): TriageLocalConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid configuration in ${path}: must be a JSON object`);
  }

  const tokenCommand = raw.tokenCommand;
  if (tokenCommand !== undefined && (!isStringArray(tokenCommand) || tokenCommand.length === 0)) {
    throw new ConfigError(`tokenCommand in ${path} must be a non-empty array of strings`);
  }

  const graphqlBatchSize = optionalPositiveInt(raw, 'graphqlBatchSize', path);
  if (graphqlBatchSize !== undefined && graphqlBatchSize > GRAPHQL_MAX_NODES) {
    throw new ConfigError(`graphqlBatchSize in ${path} must be ${GRAPHQL_MAX_NODES} or less`);
  }

  const commands = raw.commands;
  if (commands !== undefined && !Array.isArray(commands)) {
    throw new ConfigError(`commands in ${path} must be an array`);
  }

  return {
    apiBaseUrl: optionalString(raw, 'apiBaseUrl', path),
    graphqlUrl: optionalString(raw, 'graphqlUrl', path),
    tokenCommand,
    maxNotifications: optionalPositiveInt(raw, 'maxNotifications', path),
    preloadCount: optionalPositiveInt(raw, 'preloadCount', path),
    preloadConcurrency: optionalPositiveInt(raw, 'preloadConcurrency', path),
    graphqlBatchSize,
    requestTimeoutMs: optionalPositiveInt(raw, 'requestTimeoutMs', path),
    dataDir: optionalString(raw, 'dataDir', path),
    commands: commands?.map((entry, index) => validateCommand(entry, index, path)),
  };
}

/**
 * Load config.json. A missing file yields an empty config; a malformed one throws.
 */
export function loadLocalConfig(path: string = getConfigPath()): TriageLocalConfig {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return validateLocalConfig(parsed, path);
}

/**
 * Merge defaults, file settings and environment overrides
 */
export function resolveConfig(local: TriageLocalConfig = {}, env: Env = process.env): TriageConfig {
  const apiBaseUrl = (env.TRIAGE_API_URL || local.apiBaseUrl || DEFAULT_API_BASE_URL).replace(/\/+$/, '');

  return {
    apiBaseUrl,
    graphqlUrl: local.graphqlUrl || `${apiBaseUrl}/graphql`,
    tokenCommand: local.tokenCommand ?? DEFAULT_TOKEN_COMMAND,
    maxNotifications: local.maxNotifications ?? DEFAULT_MAX_NOTIFICATIONS,
    preloadCount: local.preloadCount ?? PRELOAD_COUNT,
    preloadConcurrency: local.preloadConcurrency ?? PRELOAD_CONCURRENCY,
    graphqlBatchSize: local.graphqlBatchSize ?? GRAPHQL_BATCH_SIZE,
    requestTimeoutMs: local.requestTimeoutMs ?? REQUEST_TIMEOUT_MS,
    dataDir: env.TRIAGE_DATA_DIR || local.dataDir || getDefaultDataDir(env),
    commands: local.commands ?? [],
  };
}

/**
 * Load and resolve configuration in one step
 */
export function loadConfig(path: string = getConfigPath(), env: Env = process.env): TriageConfig {
  return resolveConfig(loadLocalConfig(path), env);
}

/**
 * Save configuration
 */
export function saveConfig(config: TriageLocalConfig, path: string = getConfigPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  writeFileSync(path, JSON.stringify(config, null, 2), { mode: 0o600 });
}

const STRING_SETTINGS = ['apiBaseUrl', 'graphqlUrl', 'dataDir'];
const INTEGER_SETTINGS = ['maxNotifications', 'preloadCount', 'preloadConcurrency', 'graphqlBatchSize', 'requestTimeoutMs'];

/** Keys `triage config set` accepts; commands are edited in the file itself */
export const SETTABLE_KEYS: readonly string[] = [...STRING_SETTINGS, ...INTEGER_SETTINGS, 'tokenCommand'];

function parseSetting(key: string, value: string): unknown {
  if (INTEGER_SETTINGS.includes(key)) {
    return /^\d+$/.test(value) ? Number(value) : value;
  }
  if (key === 'tokenCommand') {
    return value.split(/\s+/).filter((part) => part.length > 0);
  }
  return value;
}

/**
 * Set one setting in config.json, or remove it when value is undefined.
 * The whole file is validated before anything is written.
 */
export function setConfigValue(
  key: string,
  value: string | undefined,
  path: string = getConfigPath()
): TriageLocalConfig {
  if (!SETTABLE_KEYS.includes(key)) {
    throw new ConfigError(`Unknown setting '${key}'. Settable: ${SETTABLE_KEYS.join(', ')}`);
  }
  const raw: Record<string, unknown> = { ...loadLocalConfig(path) };
  if (value === undefined) {
    delete raw[key];
  } else {
    raw[key] = parseSetting(key, value);
  }
  const next = validateLocalConfig(raw, path);
  saveConfig(next, path);
  return next;
}

/**
 * Expand {owner}, {repo}, {number} placeholders in a user command
 */
export function expandCommand(
  command: UserCommand,
  vars: { owner: string; repo: string; number: number }
): UserCommand {
  const expand = (value: string): string =>
    value
      .replace(/\{owner\}/g, vars.owner)
      .replace(/\{repo\}/g, vars.repo)
      .replace(/\{number\}/g, String(vars.number));

  return {
    ...command,
    args: command.args.map(expand),
    ...(command.cwd !== undefined ? { cwd: expand(command.cwd) } : {}),
    ...(command.env
      ? { env: Object.fromEntries(Object.entries(command.env).map(([k, v]) => [k, expand(v)])) }
      : {}),
  };
}
