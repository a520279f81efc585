import { describe, it, expect, vi } from 'vitest';
import { CircuitBreaker, CircuitOpenError, RetryExhaustedError, RetryManager } from '../../src/lib/scraping/retry.js';

describe('RetryManager', () => {
  it('returns the first successful result', async () => {
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`flaky ${attempt}`);
      return 'loaded';
    });

    const result = await RetryManager.withRetry(operation, { maxAttempts: 3, initialDelay: 1, onRetry: () => {} });

    expect(result).toBe('loaded');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('gives up with RetryExhaustedError after the attempt budget', async () => {
    const failure = new Error('connection reset');
    const onRetry = vi.fn();

    const error = await RetryManager.withRetry(async () => { throw failure; }, { maxAttempts: 2, initialDelay: 1, onRetry })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(2);
      expect(error.lastError).toBe(failure);
    }
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('rethrows errors that shouldRetry declines', async () => {
    const operation = vi.fn(async () => { throw new TypeError('bad input'); });

    await expect(RetryManager.withRetry(operation, {
      maxAttempts: 5,
      initialDelay: 1,
      shouldRetry: error => !(error instanceof TypeError)
    })).rejects.toThrow('bad input');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      controller.abort();
      throw new Error('aborted mid-flight');
    });

    await expect(RetryManager.withRetry(operation, { maxAttempts: 3, initialDelay: 1, signal: controller.signal }))
      .rejects.toThrow('aborted mid-flight');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and rejects without calling', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, resetTimeout: 60000 });
    const failing = vi.fn(async () => { throw new Error('model unavailable'); });

    await expect(breaker.execute(failing)).rejects.toThrow('model unavailable');
    await expect(breaker.execute(failing)).rejects.toThrow('model unavailable');
    expect(breaker.getState()).toBe('OPEN');

    await expect(breaker.execute(failing)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(failing).toHaveBeenCalledTimes(2);
  });

  it('closes again after a successful half-open call', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, resetTimeout: 0 });
    await expect(breaker.execute(async () => { throw new Error('down'); })).rejects.toThrow('down');
    expect(breaker.getState()).toBe('OPEN');

    await new Promise(resolve => setTimeout(resolve, 5));
    await expect(breaker.execute(async () => 'up')).resolves.toBe('up');
    expect(breaker.getState()).toBe('CLOSED');
  });
});
