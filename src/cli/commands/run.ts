import type { Command } from 'commander';
import { getLogsPath } from '../../config/config.js';
import { buildMonitorApp, type MonitorApp } from '../../ops/monitor-app.js';
import { SetupError } from '../../types/errors.js';
import { createFileLogger, redact } from '../../utils/logger.js';
import { describeError, loadConfigOrExit, type GlobalOptions } from './shared.js';

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the monitor and the Telegram bot in the foreground')
    .action(async () => {
      const config = loadConfigOrExit(program.opts<GlobalOptions>());
      const logger = createFileLogger('stock-sentinel', getLogsPath(config), { level: config.logging.level });
      logger.debug({ config: redact(config) }, 'Configuration loaded');

      let app: MonitorApp;
      try {
        app = await buildMonitorApp(config, logger);
      } catch (error) {
        if (error instanceof SetupError) {
          logger.fatal({ err: error, cause: error.cause }, 'Startup failed');
        } else {
          logger.fatal({ err: error }, 'Unexpected startup failure');
        }
        process.stderr.write(`Failed to start: ${describeError(error)}\n`);
        process.exitCode = 1;
        return;
      }

      const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        logger.info({ signal }, 'Signal received, stopping');
        await app.shutdown();
      };

      process.once('SIGINT', () => void shutdown('SIGINT'));
      process.once('SIGTERM', () => void shutdown('SIGTERM'));

      await app.run();
      logger.info('Monitor exited');
    });
}
