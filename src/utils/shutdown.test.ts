/**
 * Tests for ShutdownManager
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ShutdownManager, withCleanup } from './shutdown.js';

describe('ShutdownManager', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it('should run callbacks newest first and forget them', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const order: string[] = [];
    manager.onCleanup(() => {
      order.push('first');
    });
    manager.onCleanup(async () => {
      order.push('second');
    });

    await manager.runCleanup();

    expect(order).toEqual(['second', 'first']);
    expect(manager.pendingCount()).toBe(0);
  });

  it('should keep running after a failing callback', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const after = vi.fn();
    manager.onCleanup(after);
    manager.onCleanup(() => {
      throw new Error('disk busy');
    });

    await manager.runCleanup();

    expect(after).toHaveBeenCalledTimes(1);
    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
  });

  it('should remove a registered callback', () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const callback = vi.fn();
    manager.onCleanup(callback);
    manager.removeCleanup(callback);

    expect(manager.pendingCount()).toBe(0);
  });
});

describe('withCleanup', () => {
  it('should run cleanup after success and unregister it', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const cleanup = vi.fn();

    const result = await withCleanup(cleanup, async () => {
      expect(manager.pendingCount()).toBe(1);
      return 42;
    }, manager);

    expect(result).toBe(42);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(manager.pendingCount()).toBe(0);
  });

  it('should run cleanup when the body throws', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const cleanup = vi.fn();

    await expect(
      withCleanup(cleanup, async () => {
        throw new Error('walk failed');
      }, manager)
    ).rejects.toThrow('walk failed');

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(manager.pendingCount()).toBe(0);
  });
});
