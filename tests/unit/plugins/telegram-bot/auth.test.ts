import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../../src/kernel/event-bus.js';
import { ACCESS_DENIED_TEXT, createAuthMiddleware } from '../../../../src/plugins/telegram-bot/middleware/auth.js';
import { createLogger } from '../../../../src/utils/logger.js';

const logger = createLogger('test', { level: 'silent' });

function middlewareFor(allowedUserIds: number[], eventBus = new EventBus()) {
  return createAuthMiddleware({
    allowedUserIds,
    eventBus,
    logger,
    clock: () => new Date('2026-03-10T08:00:00.000Z'),
  });
}

describe('Auth Middleware', () => {
  it('should let allow-listed users through', async () => {
    const next = vi.fn();
    const reply = vi.fn();

    await middlewareFor([123, 456])({ from: { id: 456 }, chat: { id: 100 }, message: {}, reply } as never, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(reply).not.toHaveBeenCalled();
  });

  it('should answer other users with a refusal and emit a rejection', async () => {
    const eventBus = new EventBus();
    const rejected: Array<{ userId: number; chatId: number; timestamp: string }> = [];
    eventBus.on('telegram:auth_rejected', (payload) => rejected.push(payload));
    const next = vi.fn();
    const reply = vi.fn(async () => undefined);

    await middlewareFor([123], eventBus)(
      { from: { id: 999, username: 'stranger' }, chat: { id: 100 }, message: { text: '291234567' }, reply } as never,
      next,
    );

    expect(next).not.toHaveBeenCalled();
    expect(reply).toHaveBeenCalledWith(ACCESS_DENIED_TEXT);
    expect(rejected).toEqual([{ userId: 999, chatId: 100, timestamp: '2026-03-10T08:00:00.000Z' }]);
  });

  it('should drop non-message updates from other users without answering', async () => {
    const next = vi.fn();
    const reply = vi.fn();

    await middlewareFor([123])({ from: { id: 999 }, chat: { id: 100 }, message: undefined, reply } as never, next);

    expect(next).not.toHaveBeenCalled();
    expect(reply).not.toHaveBeenCalled();
  });

  it('should let everyone through when the allow-list is empty', async () => {
    const next = vi.fn();

    await middlewareFor([])({ from: { id: 999 }, chat: { id: 100 } } as never, next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should ignore updates without a sender', async () => {
    const next = vi.fn();

    await middlewareFor([])({ from: undefined, chat: { id: 100 } } as never, next);

    expect(next).not.toHaveBeenCalled();
  });
});
