import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ensureDirectories,
  getCachePath,
  getLogsPath,
  loadConfig,
  readEnvironment,
} from '../../../src/config/config.js';

const REQUIRED = { BOT_TOKEN: 'test-secret', CHAT_ID: '-100123', MS_TOKEN: 'test-secret' };

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should apply defaults for everything but the credentials', () => {
    const result = loadConfig({ env: REQUIRED });
    if (!result.success) throw result.error;

    expect(result.data.telegram).toEqual({
      bot_token: 'test-secret',
      chat_id: '-100123',
      message_limit: 4096,
      chunk_delay_ms: 1000,
      allowed_user_ids: [],
    });
    expect(result.data.monitor).toEqual({
      check_interval_minutes: 720,
      alert_days: 7,
      alert_suppression_hours: 24,
      fetch_timeout_seconds: 300,
    });
    expect(result.data.moysklad.expiration_attribute).toBe('Expiration date');
    expect(result.data.cache).toEqual({ reset_days: 30, purge_every_cycles: 12 });
    expect(result.data.lookup).toEqual({ max_attempts: 5, retry_delay_seconds: 60 });
    expect(result.data.paths.data_dir).toBe('data');
    expect(result.data.logging).toEqual({ level: 'info', days_to_keep: 30 });
  });

  it('should coerce numbers and split lists from the environment', () => {
    const result = loadConfig({
      env: { ...REQUIRED, ALERT_DAYS: '3', ALLOWED_USER_IDS: '11, 22,,33', COUNTERPARTY_TAGS: 'cash, retail' },
    });
    if (!result.success) throw result.error;

    expect(result.data.monitor.alert_days).toBe(3);
    expect(result.data.telegram.allowed_user_ids).toEqual([11, 22, 33]);
    expect(result.data.moysklad.counterparty_tags).toEqual(['cash', 'retail']);
  });

  it('should report a missing credential', () => {
    const result = loadConfig({ env: { CHAT_ID: '1', MS_TOKEN: 'test-secret' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Invalid configuration: telegram.bot_token: Required');
    }
  });

  it('should reject a non-numeric interval', () => {
    const result = loadConfig({ env: { ...REQUIRED, CHECK_INTERVAL_MINUTES: 'often' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toContain('monitor.check_interval_minutes');
    }
  });

  it('should reject a fetch timeout longer than one timer can hold', () => {
    const result = loadConfig({ env: { ...REQUIRED, FETCH_TIMEOUT_SECONDS: '3000000' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        'Invalid configuration: monitor.fetch_timeout_seconds: Number must be less than or equal to 2147483',
      );
    }
  });

  it('should accept a check interval longer than one timer can hold', () => {
    const result = loadConfig({ env: { ...REQUIRED, CHECK_INTERVAL_MINUTES: '43200' } });
    if (!result.success) throw result.error;

    expect(result.data.monitor.check_interval_minutes).toBe(43200);
  });

  it('should let the environment override the file', () => {
    const file = join(dir, 'config.json');
    writeFileSync(file, JSON.stringify({ monitor: { alert_days: 3, check_interval_minutes: 60 } }));

    const result = loadConfig({ env: { ...REQUIRED, ALERT_DAYS: '5' }, configFile: file });
    if (!result.success) throw result.error;

    expect(result.data.monitor.alert_days).toBe(5);
    expect(result.data.monitor.check_interval_minutes).toBe(60);
  });

  it('should reject a file that is not a JSON object', () => {
    const file = join(dir, 'list.json');
    writeFileSync(file, '[1, 2]');

    const result = loadConfig({ env: REQUIRED, configFile: file });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(`Configuration file must contain a JSON object: ${file}`);
    }
  });
});

describe('readEnvironment', () => {
  it('should skip blank variables', () => {
    expect(readEnvironment({ LOG_LEVEL: '  ', DATA_DIR: '/srv/monitor' }).paths).toEqual({ data_dir: '/srv/monitor' });
    expect(readEnvironment({ LOG_LEVEL: '  ' }).logging).toEqual({});
  });
});

describe('data layout', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'layout-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should place caches and logs under the data directory', () => {
    const config = { paths: { data_dir: dir } };

    expect(getCachePath(config, 'stock')).toBe(join(dir, 'cache', 'stocks_cache.json'));
    expect(getCachePath(config, 'expiration')).toBe(join(dir, 'cache', 'expiration_cache.json'));
    expect(getCachePath(config, 'phones')).toBe(join(dir, 'cache', 'phones.json'));
    expect(getLogsPath(config)).toBe(join(dir, 'logs'));
  });

  it('should create the cache and log directories', () => {
    const config = { paths: { data_dir: join(dir, 'nested') } };

    expect(ensureDirectories(config).success).toBe(true);
    expect(existsSync(join(dir, 'nested', 'cache'))).toBe(true);
    expect(existsSync(join(dir, 'nested', 'logs'))).toBe(true);
  });
});
