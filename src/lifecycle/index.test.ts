/**
 * Tests for the lifecycle manager
 */

import { describe, it, expect, jest } from '@jest/globals';
import { EventEmitter } from 'events';
import { LifecycleManager } from './index.js';
import { createTestLogger } from '../__tests__/utils.js';

function createManager(shutdownTimeout = 1000) {
  const { logger, entries } = createTestLogger();
  const signals = new EventEmitter();
  const exit = jest.fn<(code: number) => void>();
  const manager = new LifecycleManager(logger, { shutdownTimeout, exit, signals });
  return { manager, signals, exit, entries };
}

describe('LifecycleManager', () => {
  it('should run startup hooks in registration order', async () => {
    const { manager } = createManager();
    const order: string[] = [];
    manager.onStartup('first', async () => {
      order.push('first');
    });
    manager.onStartup('second', async () => {
      order.push('second');
    });

    await manager.startup();

    expect(order).toEqual(['first', 'second']);
  });

  it('should stop startup at the first failing hook', async () => {
    const { manager } = createManager();
    const later = jest.fn(async () => undefined);
    manager.onStartup('open-terminal', async () => {
      throw new Error('no tty');
    });
    manager.onStartup('later', later);

    await expect(manager.startup()).rejects.toThrow('no tty');
    expect(later).not.toHaveBeenCalled();
  });

  it('should run shutdown hooks in reverse order and exit cleanly', async () => {
    const { manager, exit } = createManager();
    const order: string[] = [];
    manager.onShutdown('flush-logger', async () => {
      order.push('flush-logger');
    });
    manager.onShutdown('restore-terminal', async () => {
      order.push('restore-terminal');
    });

    await manager.shutdown('quit');

    expect(order).toEqual(['restore-terminal', 'flush-logger']);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should keep running hooks after one fails', async () => {
    const { manager, exit, entries } = createManager();
    const flush = jest.fn(async () => undefined);
    manager.onShutdown('flush-logger', flush);
    manager.onShutdown('restore-terminal', async () => {
      throw new Error('terminal gone');
    });

    await manager.shutdown();

    expect(flush).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(entries.some(entry => entry.message === 'Shutdown hook failed: restore-terminal')).toBe(true);
  });

  it('should shut down only once', async () => {
    const { manager, exit } = createManager();
    const hook = jest.fn(async () => undefined);
    manager.onShutdown('hook', hook);

    await Promise.all([manager.shutdown('quit'), manager.shutdown('SIGTERM')]);

    expect(hook).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it('should exit with 1 when the hooks outlast the timeout', async () => {
    const { manager, exit } = createManager(10);
    manager.onShutdown('stuck', () => new Promise<void>(resolve => setTimeout(resolve, 200)));

    await manager.shutdown();

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should shut down on a signal', async () => {
    const { manager, signals, exit } = createManager();
    const hook = jest.fn(async () => undefined);
    manager.onShutdown('hook', hook);

    signals.emit('SIGTERM');
    await new Promise(resolve => setImmediate(resolve));

    expect(hook).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should exit with 1 after an uncaught exception', async () => {
    const { signals, exit } = createManager();

    signals.emit('uncaughtException', new Error('boom'));
    await new Promise(resolve => setImmediate(resolve));

    expect(exit).toHaveBeenCalledWith(1);
  });
});
