import { SCRAPING_CONFIG } from './config.js';
import { errorMessage } from '../errors.js';

export interface RetryOptions {
  /** Total attempts, including the first one. */
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  signal?: AbortSignal;
  /** Label used in retry log lines. */
  label?: string;
}

interface RetryPolicy {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  shouldRetry: (error: unknown) => boolean;
}

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

export class RetryManager {
  private static defaultOptions: RetryPolicy = {
    maxAttempts: SCRAPING_CONFIG.MAX_NAVIGATION_ATTEMPTS,
    initialDelay: SCRAPING_CONFIG.INITIAL_RETRY_DELAY,
    maxDelay: SCRAPING_CONFIG.MAX_RETRY_DELAY,
    backoffMultiplier: SCRAPING_CONFIG.BACKOFF_MULTIPLIER,
    shouldRetry: (_error: unknown) => true
  };

  /**
   * Runs `operation` until it resolves or the attempt budget is spent.
   * Rejects with RetryExhaustedError once attempts run out, or with the
   * original error when `shouldRetry` declines it or the signal aborts.
   */
  static async withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const opts: RetryPolicy = { ...this.defaultOptions, ...stripUndefined(options) };
    let delay = opts.initialDelay;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (options.signal?.aborted || !opts.shouldRetry(error)) {
          throw error;
        }
        if (attempt >= opts.maxAttempts) {
          throw new RetryExhaustedError(attempt, error);
        }

        if (options.onRetry) {
          options.onRetry(error, attempt, delay);
        } else {
          console.warn(`[Retry] ${options.label ?? 'operation'} attempt ${attempt} failed, retrying in ${delay}ms:`, errorMessage(error));
        }

        await sleep(delay, options.signal);

        // Exponential backoff with jitter (±12.5% of delay)
        delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelay);
        const jitter = delay * 0.25 * (Math.random() - 0.5);
        delay = Math.max(0, Math.floor(delay + jitter));
      }
    }
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

function stripUndefined(options: RetryOptions): Partial<RetryPolicy> {
  const result: Partial<RetryPolicy> = {};
  if (options.maxAttempts !== undefined) result.maxAttempts = options.maxAttempts;
  if (options.initialDelay !== undefined) result.initialDelay = options.initialDelay;
  if (options.maxDelay !== undefined) result.maxDelay = options.maxDelay;
  if (options.backoffMultiplier !== undefined) result.backoffMultiplier = options.backoffMultiplier;
  if (options.shouldRetry !== undefined) result.shouldRetry = options.shouldRetry;
  return result;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  resetTimeout: number;
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export class CircuitOpenError extends Error {
  constructor() {
    super('Circuit breaker is OPEN');
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private failures = 0;
  private lastFailureTime = 0;
  private state: CircuitState = 'CLOSED';

  constructor(private options: CircuitBreakerOptions) {}

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      if (Date.now() - this.lastFailureTime > this.options.resetTimeout) {
        this.state = 'HALF_OPEN';
      } else {
        throw new CircuitOpenError();
      }
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onSuccess(): void {
    this.failures = 0;
    this.state = 'CLOSED';
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailureTime = Date.now();

    if (this.state === 'HALF_OPEN' || this.failures >= this.options.failureThreshold) {
      this.state = 'OPEN';
    }
  }

  getState(): CircuitState {
    return this.state;
  }
}
