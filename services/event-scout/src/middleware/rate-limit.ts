import type { Context, Next } from 'hono';
import { createMiddleware } from 'hono/factory';

// Rate limit configuration
export interface RateLimitConfig {
  windowMs: number;    // Time window in milliseconds
  maxRequests: number; // Maximum requests allowed in the window
  message?: string;
  keyGenerator?: (c: Context) => string;
}

// Default configurations for different endpoints
export const rateLimitConfigs = {
  standard: {
    windowMs: 15 * 60 * 1000, // 15 minutes
    maxRequests: 100,
    message: 'Too many requests, please try again later'
  },

  // Each search drives a real browser session
  search: {
    windowMs: 60 * 1000,      // 1 minute
    maxRequests: 5,
    message: 'Search rate limit exceeded, please wait before starting another search'
  }
} as const;

const SWEEP_EVERY = 100;

// Create rate limiting middleware with sliding window algorithm
export function createRateLimit(config: RateLimitConfig) {
  // One store per limiter; entries are swept lazily
  const requestStore = new Map<string, number[]>();
  let requestsSinceSweep = 0;

  return createMiddleware(async (c: Context, next: Next) => {
    const now = Date.now();
    const windowStart = now - config.windowMs;

    if (++requestsSinceSweep >= SWEEP_EVERY) {
      requestsSinceSweep = 0;
      sweep(requestStore, windowStart);
    }

    const key = config.keyGenerator ? config.keyGenerator(c) : generateDefaultKey(c);

    // Remove old requests outside the window (sliding window)
    const requests = (requestStore.get(key) || []).filter(timestamp => timestamp > windowStart);

    if (requests.length >= config.maxRequests) {
      const resetTime = requests[0] + config.windowMs;

      return c.json({
        success: false,
        error: 'Rate limit exceeded',
        message: config.message || 'Too many requests',
        retryAfter: Math.ceil((resetTime - now) / 1000),
        limit: config.maxRequests,
        window: Math.ceil(config.windowMs / 1000),
        remaining: 0
      }, 429);
    }

    requests.push(now);
    requestStore.set(key, requests);

    c.header('X-RateLimit-Limit', config.maxRequests.toString());
    c.header('X-RateLimit-Remaining', (config.maxRequests - requests.length).toString());
    c.header('X-RateLimit-Reset', new Date(now + config.windowMs).toISOString());

    await next();
  });
}

function sweep(store: Map<string, number[]>, windowStart: number): void {
  for (const [key, requests] of store.entries()) {
    const valid = requests.filter(timestamp => timestamp > windowStart);
    if (valid.length === 0) {
      store.delete(key);
    } else if (valid.length < requests.length) {
      store.set(key, valid);
    }
  }
}

// Composite key of client address, API key prefix and user agent
function generateDefaultKey(c: Context): string {
  const ip = c.req.header('x-forwarded-for') || c.req.header('x-real-ip') || 'unknown';
  const apiKey = c.req.header('x-api-key') || 'anonymous';
  const userAgent = c.req.header('user-agent') || 'unknown';

  return `${ip}:${apiKey.substring(0, 8)}:${userAgent.substring(0, 20)}`;
}

// Authenticated callers are limited per key rather than per address
function generateAuthenticatedKey(c: Context): string {
  const apiKey = c.req.header('x-api-key') || c.req.header('authorization')?.replace(/^Bearer\s+/i, '');
  if (apiKey) {
    return `auth:${apiKey}`;
  }
  return generateDefaultKey(c);
}

// Each app gets its own limiters so windows are never shared between instances
export function createStandardRateLimit() {
  return createRateLimit(rateLimitConfigs.standard);
}

export function createSearchRateLimit() {
  return createRateLimit({
    ...rateLimitConfigs.search,
    keyGenerator: generateAuthenticatedKey
  });
}
