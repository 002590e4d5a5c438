import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../../src/config/config.js';
import { buildMonitorApp, MonitorApp } from '../../../src/ops/monitor-app.js';
import type { CycleReport } from '../../../src/monitor/types.js';
import { SetupError } from '../../../src/types/errors.js';
import type { Config } from '../../../src/types/index.js';
import { createLogger } from '../../../src/utils/logger.js';

const logger = createLogger('test', { level: 'silent' });
const REPORT: CycleReport = { cycle: 1, fetched: true, products: 4, notifications: 1, durationMs: 12 };

function parts(order: string[]) {
  let finishRun: () => void = () => undefined;
  let finishPolling: () => void = () => undefined;

  const scheduler = {
    run: vi.fn(() => new Promise<void>((resolve) => {
      finishRun = resolve;
    })),
    runOnce: vi.fn(async () => REPORT),
    stop: vi.fn(async () => {
      order.push('scheduler');
      finishRun();
    }),
    getState: vi.fn(() => 'running' as const),
  };
  const bot = {
    start: vi.fn(() => new Promise<void>((resolve) => {
      finishPolling = resolve;
    })),
    stop: vi.fn(async () => {
      order.push('bot');
      finishPolling();
    }),
  };
  const lookup = {
    stop: vi.fn(() => {
      order.push('lookup');
    }),
  };
  const notifier = {
    close: vi.fn(async () => {
      order.push('notifier');
    }),
  };
  const warmUp = (signal: AbortSignal) =>
    new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => {
        order.push('warm-up');
        resolve();
      });
    });

  return { logger, scheduler, bot, lookup, notifier, warmUp };
}

describe('MonitorApp', () => {
  it('should stop components in order and close the transport last', async () => {
    const order: string[] = [];
    const app = new MonitorApp(parts(order));

    const running = app.run();
    await app.shutdown();
    await running;

    expect(order).toEqual(['scheduler', 'lookup', 'bot', 'warm-up', 'notifier']);
  });

  it('should shut down only once however often it is asked', async () => {
    const order: string[] = [];
    const components = parts(order);
    const app = new MonitorApp(components);

    const running = app.run();
    const first = app.shutdown();
    const second = app.shutdown();
    await Promise.all([first, second, running]);

    expect(first).toBe(second);
    expect(components.notifier.close).toHaveBeenCalledTimes(1);
    expect(components.scheduler.stop).toHaveBeenCalledTimes(1);
  });

  it('should still close the transport when a step fails', async () => {
    const order: string[] = [];
    const components = parts(order);
    components.scheduler.stop.mockRejectedValueOnce(new Error('stuck'));
    const app = new MonitorApp({ ...components, bot: null, warmUp: null });

    await app.shutdown();

    expect(order).toEqual(['lookup', 'notifier']);
  });

  it('should run a single cycle and then shut down', async () => {
    const order: string[] = [];
    const components = parts(order);
    const app = new MonitorApp({ ...components, bot: null, lookup: null, warmUp: null });

    await expect(app.runOnce()).resolves.toEqual(REPORT);
    expect(order).toEqual(['scheduler', 'notifier']);
    expect(components.bot.start).not.toHaveBeenCalled();
  });
});

describe('buildMonitorApp', () => {
  let dir: string;

  function config(dataDir: string): Config {
    const result = loadConfig({
      env: { BOT_TOKEN: 'test:token', CHAT_ID: '-100123', MS_TOKEN: 'test-secret', DATA_DIR: dataDir },
    });
    if (!result.success) throw result.error;
    return result.data;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'monitor-app-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should prepare the data directory for a single check', async () => {
    const app = await buildMonitorApp(config(join(dir, 'data')), logger, { interactive: false });

    expect(app.getState()).toBe('idle');
    expect(existsSync(join(dir, 'data', 'cache'))).toBe(true);
    expect(existsSync(join(dir, 'data', 'logs'))).toBe(true);
  });

  it('should fail setup when the data directory cannot be created', async () => {
    const blocker = join(dir, 'not-a-dir');
    writeFileSync(blocker, '');

    await expect(buildMonitorApp(config(join(blocker, 'data')), logger, { interactive: false })).rejects.toBeInstanceOf(
      SetupError,
    );
  });
});
