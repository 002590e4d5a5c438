import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  it('should deliver payloads to subscribers', () => {
    const handler = vi.fn();

    eventBus.on('monitor:cache_purged', handler);
    eventBus.emit('monitor:cache_purged', { checker: 'stock', removed: 2 });

    expect(handler).toHaveBeenCalledWith({ checker: 'stock', removed: 2 });
  });

  it('should unsubscribe via the returned function', () => {
    const handler = vi.fn();

    const unsubscribe = eventBus.on('monitor:cache_purged', handler);
    unsubscribe();
    eventBus.emit('monitor:cache_purged', { checker: 'stock', removed: 0 });

    expect(handler).not.toHaveBeenCalled();
    expect(eventBus.listenerCount('monitor:cache_purged')).toBe(0);
  });

  it('should fire once() handlers a single time', () => {
    const handler = vi.fn();

    eventBus.once('monitor:fetch_failed', handler);
    eventBus.emit('monitor:fetch_failed', { cycle: 1, error: 'a' });
    eventBus.emit('monitor:fetch_failed', { cycle: 2, error: 'b' });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ cycle: 1, error: 'a' });
  });

  it('should resolve next() with the following payload', async () => {
    const next = eventBus.next('monitor:fetch_failed');
    eventBus.emit('monitor:fetch_failed', { cycle: 7, error: 'timeout' });

    await expect(next).resolves.toEqual({ cycle: 7, error: 'timeout' });
  });

  it('should isolate a throwing handler and report it', () => {
    const after = vi.fn();
    const reported = vi.fn();
    eventBus.on('system:handler_error', reported);
    eventBus.on('monitor:cache_purged', () => {
      throw new Error('handler broke');
    });
    eventBus.on('monitor:cache_purged', after);

    eventBus.emit('monitor:cache_purged', { checker: 'stock', removed: 1 });

    expect(after).toHaveBeenCalledTimes(1);
    expect(eventBus.getHandlerErrorCount()).toBe(1);
    expect(reported).toHaveBeenCalledWith(expect.objectContaining({ event: 'monitor:cache_purged', error: 'handler broke' }));
  });

  it('should drop every listener on clear()', () => {
    eventBus.on('monitor:cache_purged', vi.fn());
    eventBus.clear();
    expect(eventBus.listenerCount('monitor:cache_purged')).toBe(0);
  });
});
