import type { Command } from 'commander';
import { buildMonitorApp } from '../../ops/monitor-app.js';
import { createLogger } from '../../utils/logger.js';
import { describeError, loadConfigOrExit, type GlobalOptions } from './shared.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Run a single check cycle and exit')
    .action(async () => {
      const config = loadConfigOrExit(program.opts<GlobalOptions>());
      const logger = createLogger('stock-sentinel', { level: config.logging.level });

      try {
        const app = await buildMonitorApp(config, logger, { interactive: false });
        const report = await app.runOnce();

        process.stdout.write(
          `Cycle ${report.cycle}: ${report.fetched ? `${report.products} products, ${report.notifications} alerts` : 'fetch failed'} ` +
          `(${report.durationMs} ms)\n`,
        );
        if (!report.fetched) process.exitCode = 1;
      } catch (error) {
        logger.fatal({ err: error }, 'Check failed');
        process.stderr.write(`Check failed: ${describeError(error)}\n`);
        process.exitCode = 1;
      }
    });
}
