import type { Command } from 'commander';
import { CacheStore } from '../../cache/cache-store.js';
import { getCachePath } from '../../config/config.js';
import { CacheNameSchema, type CacheName } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

interface CacheCommandOptions {
  dataDir: string;
}

function parseCacheName(value: string): CacheName {
  const parsed = CacheNameSchema.safeParse(value);
  if (!parsed.success) {
    process.stderr.write(`Unknown cache "${value}". Expected one of: ${CacheNameSchema.options.join(', ')}\n`);
    process.exit(1);
  }
  return parsed.data;
}

async function openStore(name: string, options: CacheCommandOptions): Promise<CacheStore> {
  const logger = createLogger('stock-sentinel-cli', { level: 'warn' });
  const store = new CacheStore(getCachePath({ paths: { data_dir: options.dataDir } }, parseCacheName(name)), { logger });
  await store.load();
  return store;
}

export function registerCacheCommand(program: Command): void {
  const cache = program
    .command('cache')
    .description('Inspect or reset the alert and phone caches');

  cache
    .command('list <name>')
    .description('List records of a cache (stock, expiration, phones)')
    .option('-d, --data-dir <dir>', 'Data directory', process.env.DATA_DIR ?? 'data')
    .action(async (name: string, options: CacheCommandOptions) => {
      const store = await openStore(name, options);

      if (store.size === 0) {
        process.stdout.write('Cache is empty\n');
        return;
      }

      for (const [key, record] of store.entries()) {
        process.stdout.write(
          `${key}\t${record.fingerprint}\tfirst seen ${record.firstSeen.toISOString()}\tlast alerted ${record.lastAlerted.toISOString()}\n`,
        );
      }
      process.stdout.write(`${store.size} records\n`);
    });

  cache
    .command('clear <name>')
    .description('Remove every record of a cache')
    .option('-d, --data-dir <dir>', 'Data directory', process.env.DATA_DIR ?? 'data')
    .action(async (name: string, options: CacheCommandOptions) => {
      const store = await openStore(name, options);
      const count = store.size;
      store.clear();
      await store.persist({ force: true });
      process.stdout.write(`Removed ${count} records from ${store.filePath}\n`);
    });
}
