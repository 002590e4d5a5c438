import type { Context, NextFunction } from 'grammy';
import type { Logger } from '../../../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MIDDLEWARE: one line per incoming update, with handling time
// ═══════════════════════════════════════════════════════════════════════════════

export function createLoggingMiddleware(logger: Logger) {
  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const started = Date.now();
    const text = ctx.message?.text ?? '';
    const command = text.startsWith('/') ? text.split(' ')[0].slice(1).split('@')[0] : undefined;

    await next();

    logger.info(
      { userId: ctx.from?.id, chatId: ctx.chat?.id, command, ms: Date.now() - started },
      'Update handled',
    );
  };
}
