import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('./logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { ShutdownManager } from './shutdown.js';
import { logger } from './logger.js';

describe('ShutdownManager', () => {
  let manager: ShutdownManager;
  const originalExitCode = process.exitCode;

  beforeEach(() => {
    vi.clearAllMocks();
    manager = new ShutdownManager();
  });

  afterEach(() => {
    process.exitCode = originalExitCode;
    vi.restoreAllMocks();
  });

  it('starts with a live signal', () => {
    expect(manager.isShuttingDown()).toBe(false);
    expect(manager.signal.aborted).toBe(false);
  });

  it('aborts the signal and rejects new operations once shutdown starts', async () => {
    const pending = manager.shutdown();

    expect(manager.signal.aborted).toBe(true);
    expect(manager.isShuttingDown()).toBe(true);
    expect(() => manager.trackOperation('late')).toThrow('shutting down');

    await pending;
  });

  it('reports the operations in flight and sets the interrupted exit code', async () => {
    const release1 = manager.trackOperation('op1');
    const release2 = manager.trackOperation('op2');
    release2();
    manager.signal.addEventListener('abort', () => release1());

    await manager.shutdown();

    expect(logger.warn).toHaveBeenCalledWith('Interrupted — aborting 1 operation(s) in flight');
    expect(process.exitCode).toBe(130);
  });

  it('waits for in-flight operations that react to the abort', async () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation((code): never => {
      throw new Error(`process.exit(${String(code)})`);
    });
    const order: string[] = [];
    const release = manager.trackOperation('diagnostics');
    manager.signal.addEventListener('abort', () => {
      setTimeout(() => {
        order.push('released');
        release();
      }, 60);
    });

    await manager.shutdown();
    order.push('shutdown finished');

    expect(order).toEqual(['released', 'shutdown finished']);
    expect(exit).not.toHaveBeenCalled();
  });

  it('only shuts down once', async () => {
    await manager.shutdown();
    await manager.shutdown();

    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
