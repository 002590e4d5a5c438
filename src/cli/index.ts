#!/usr/bin/env node

/**
 * stock-sentinel: Command Line Interface
 *
 * Runs the inventory monitor and manages its caches.
 *
 * @module cli
 */

import { Command } from 'commander';
import { registerCacheCommand } from './commands/cache.js';
import { registerCheckCommand } from './commands/check.js';
import { registerRunCommand } from './commands/run.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('stock-sentinel')
  .description('Inventory monitor: stock and expiration alerts delivered to Telegram')
  .version('1.0.0')
  .option('-c, --config <file>', 'JSON configuration file (environment variables take precedence)');

registerRunCommand(program);
registerCheckCommand(program);
registerCacheCommand(program);

await program.parseAsync(process.argv);
