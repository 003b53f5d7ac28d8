import { describe, it, expect, vi, afterEach } from 'vitest';
import { PortTimeoutError } from '@/core/errors.js';
import { createMockLogger } from '@/testing/fixtures/workflow.js';
import { guardPortCall } from './port-guard.js';

describe('guardPortCall', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('Payroll');
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await guardPortCall('classification', fn, {
      timeoutMs: 1_000,
      maxAttempts: 3,
      retryDelayMs: 100,
      sleep,
    });

    expect(result).toBe('Payroll');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries with linearly increasing delays', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('503'))
      .mockRejectedValueOnce(new Error('503'))
      .mockResolvedValue('ok');
    const sleep = vi.fn().mockResolvedValue(undefined);
    const logger = createMockLogger();

    const result = await guardPortCall('responder', fn, {
      timeoutMs: 1_000,
      maxAttempts: 3,
      retryDelayMs: 100,
      sleep,
      logger,
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('rethrows the last error after the final attempt', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(
      guardPortCall('knowledge', fn, { timeoutMs: 1_000, maxAttempts: 2, retryDelayMs: 50, sleep }),
    ).rejects.toThrow('second');
    expect(sleep.mock.calls).toEqual([[50]]);
  });

  it('times out a hanging call and aborts its signal', async () => {
    vi.useFakeTimers();
    let received: AbortSignal | undefined;
    const fn = vi.fn((signal: AbortSignal) => {
      received = signal;
      return new Promise<string>(() => undefined);
    });

    const promise = guardPortCall('classification', fn, {
      timeoutMs: 500,
      maxAttempts: 1,
      retryDelayMs: 0,
    });
    const assertion = expect(promise).rejects.toBeInstanceOf(PortTimeoutError);

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    expect(received?.aborted).toBe(true);
  });

  it('treats maxAttempts below 1 as a single attempt', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(
      guardPortCall('knowledge', fn, { timeoutMs: 1_000, maxAttempts: 0, retryDelayMs: 0 }),
    ).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
