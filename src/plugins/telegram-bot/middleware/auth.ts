import type { Context, NextFunction } from 'grammy';
import type { EventBus } from '../../../kernel/event-bus.js';
import type { Logger } from '../../../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ACCESS CONTROL: only allow-listed users reach the handlers
// ═══════════════════════════════════════════════════════════════════════════════

export const ACCESS_DENIED_TEXT = '🚫 Access denied.';

export interface AccessControlOptions {
  /** Empty list lets everyone in */
  allowedUserIds: readonly number[];
  eventBus: EventBus;
  logger: Logger;
  clock?: () => Date;
}

export function createAuthMiddleware(options: AccessControlOptions) {
  const { allowedUserIds, eventBus, logger } = options;
  const clock = options.clock ?? (() => new Date());
  const allowed = new Set(allowedUserIds);

  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const user = ctx.from;
    if (!user) return;

    if (allowed.size === 0 || allowed.has(user.id)) {
      await next();
      return;
    }

    logger.warn({ userId: user.id, username: user.username }, 'Unauthorised access attempt');
    eventBus.emit('telegram:auth_rejected', {
      userId: user.id,
      chatId: ctx.chat?.id ?? 0,
      timestamp: clock().toISOString(),
    });

    // Only messages get an answer; callbacks and edits are dropped quietly
    if (ctx.message) {
      await ctx.reply(ACCESS_DENIED_TEXT);
    }
  };
}
