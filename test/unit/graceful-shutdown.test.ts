import { describe, it, expect, vi, afterEach } from 'vitest';
import { GracefulShutdownService, createGracefulShutdown } from '../../src/services/graceful-shutdown.service.js';

describe('GracefulShutdownService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs the shutdown callback and exits with the requested code', async () => {
    const exit = vi.fn();
    const onShutdown = vi.fn(async () => undefined);
    const shutdown = new GracefulShutdownService({ timeout: 1000, onShutdown, exit });

    await shutdown.handleShutdown('SIGTERM');

    expect(onShutdown).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(shutdown.isShutdownInProgress()).toBe(true);
  });

  it('ignores a second signal', async () => {
    const exit = vi.fn();
    const onShutdown = vi.fn(async () => undefined);
    const shutdown = createGracefulShutdown({ timeout: 1000, onShutdown, exit });

    await shutdown.handleShutdown('SIGTERM');
    await shutdown.handleShutdown('SIGINT');

    expect(onShutdown).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it('exits with 1 when the callback fails', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdownService({
      timeout: 1000,
      onShutdown: async () => {
        throw new Error('close failed');
      },
      exit,
    });

    await shutdown.handleShutdown('SIGTERM');

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('forces the exit when the callback hangs', async () => {
    vi.useFakeTimers();
    const exit = vi.fn();
    const shutdown = new GracefulShutdownService({
      timeout: 500,
      onShutdown: () => new Promise<void>(() => undefined),
      exit,
    });

    void shutdown.handleShutdown('SIGTERM');
    await vi.advanceTimersByTimeAsync(500);

    expect(exit).toHaveBeenCalledWith(1);
  });
});
