/**
 * stock-sentinel: Configuration Management
 *
 * Reads settings from the environment (optionally layered over a JSON file),
 * validates them and resolves the data directory layout.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type CacheName, type Config, ConfigSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT BINDINGS
// ═══════════════════════════════════════════════════════════════════════════

type Section = keyof Config;
type RawSections = Record<Section, Record<string, unknown>>;

const ENV_BINDINGS: ReadonlyArray<readonly [variable: string, section: Section, key: string]> = [
  ['BOT_TOKEN', 'telegram', 'bot_token'],
  ['CHAT_ID', 'telegram', 'chat_id'],
  ['TG_MESSAGE_LIMIT', 'telegram', 'message_limit'],
  ['TG_CHUNK_DELAY_MS', 'telegram', 'chunk_delay_ms'],
  ['ALLOWED_USER_IDS', 'telegram', 'allowed_user_ids'],
  ['MS_TOKEN', 'moysklad', 'token'],
  ['API_REQUEST_LIMIT', 'moysklad', 'page_size'],
  ['API_REQUEST_TIMEOUT_SECONDS', 'moysklad', 'request_timeout_seconds'],
  ['EXPIRATION_ATTRIBUTE', 'moysklad', 'expiration_attribute'],
  ['COUNTERPARTY_TAGS', 'moysklad', 'counterparty_tags'],
  ['CHECK_INTERVAL_MINUTES', 'monitor', 'check_interval_minutes'],
  ['ALERT_DAYS', 'monitor', 'alert_days'],
  ['ALERT_SUPPRESSION_HOURS', 'monitor', 'alert_suppression_hours'],
  ['FETCH_TIMEOUT_SECONDS', 'monitor', 'fetch_timeout_seconds'],
  ['CACHE_RESET_DAYS', 'cache', 'reset_days'],
  ['CACHE_PURGE_EVERY_CYCLES', 'cache', 'purge_every_cycles'],
  ['MAX_ATTEMPTS', 'lookup', 'max_attempts'],
  ['RETRY_DELAY', 'lookup', 'retry_delay_seconds'],
  ['DATA_DIR', 'paths', 'data_dir'],
  ['LOG_LEVEL', 'logging', 'level'],
  ['DAYS_TO_KEEP', 'logging', 'days_to_keep'],
];

const LIST_VARIABLES = new Set(['ALLOWED_USER_IDS', 'COUNTERPARTY_TAGS']);

const CACHE_FILES: Record<CacheName, string> = {
  stock: 'stocks_cache.json',
  expiration: 'expiration_cache.json',
  phones: 'phones.json',
};

function emptySections(): RawSections {
  return {
    telegram: {},
    moysklad: {},
    monitor: {},
    cache: {},
    lookup: {},
    paths: {},
    logging: {},
  };
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function readEnvironment(env: NodeJS.ProcessEnv): RawSections {
  const sections = emptySections();

  for (const [variable, section, key] of ENV_BINDINGS) {
    const raw = env[variable]?.trim();
    if (raw === undefined || raw === '') continue;
    sections[section][key] = LIST_VARIABLES.has(variable) ? splitList(raw) : raw;
  }

  return sections;
}

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getDataDir(config: Pick<Config, 'paths'>): string {
  return path.resolve(expandPath(config.paths.data_dir));
}

export function getCacheDir(config: Pick<Config, 'paths'>): string {
  return path.join(getDataDir(config), 'cache');
}

export function getLogsPath(config: Pick<Config, 'paths'>): string {
  return path.join(getDataDir(config), 'logs');
}

export function getCachePath(config: Pick<Config, 'paths'>, name: CacheName): string {
  return path.join(getCacheDir(config), CACHE_FILES[name]);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function ensureDirectories(config: Pick<Config, 'paths'>): Result<void, Error> {
  try {
    for (const dir of [getCacheDir(config), getLogsPath(config)]) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }
    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON file whose sections sit underneath the environment */
  configFile?: string;
}

/**
 * Load configuration. Environment variables override values from the file.
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, Error> {
  try {
    let fileConfig: Record<string, unknown> = {};

    if (options.configFile !== undefined) {
      const expandedPath = expandPath(options.configFile);
      const parsed: unknown = JSON.parse(fs.readFileSync(expandedPath, 'utf-8'));
      if (!isRecord(parsed)) {
        return err(new Error(`Configuration file must contain a JSON object: ${expandedPath}`));
      }
      fileConfig = parsed;
    }

    const merged = deepMerge(
      deepMerge(emptySections(), fileConfig),
      readEnvironment(options.env ?? process.env),
    );

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      return err(new Error(`Invalid configuration: ${issues}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
