import type { Context, Next } from 'hono';
import { createMiddleware } from 'hono/factory';
import { HTMLSanitizer } from '../lib/scraping/sanitizer.js';

// Security headers configuration
interface SecurityConfig {
  contentSecurityPolicy?: string;
  hsts?: {
    maxAge: number;
    includeSubDomains?: boolean;
    preload?: boolean;
  };
  noSniff?: boolean;
  frameOptions?: 'DENY' | 'SAMEORIGIN';
  xssProtection?: boolean;
  referrerPolicy?: string;
  permissionsPolicy?: string;
}

// Default security configuration
const defaultSecurityConfig: Required<SecurityConfig> = {
  contentSecurityPolicy: "default-src 'none'; frame-ancestors 'none';",
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
    preload: true
  },
  noSniff: true,
  frameOptions: 'DENY',
  xssProtection: true,
  referrerPolicy: 'strict-origin-when-cross-origin',
  permissionsPolicy: 'camera=(), microphone=(), geolocation=(), payment=()'
};

// Security headers middleware
export function securityHeaders(config: SecurityConfig = {}) {
  const finalConfig = { ...defaultSecurityConfig, ...config };

  return createMiddleware(async (c: Context, next: Next) => {
    await next();

    if (finalConfig.contentSecurityPolicy) {
      c.res.headers.set('Content-Security-Policy', finalConfig.contentSecurityPolicy);
    }

    if (finalConfig.hsts) {
      let hstsValue = `max-age=${finalConfig.hsts.maxAge}`;
      if (finalConfig.hsts.includeSubDomains) hstsValue += '; includeSubDomains';
      if (finalConfig.hsts.preload) hstsValue += '; preload';
      c.res.headers.set('Strict-Transport-Security', hstsValue);
    }

    if (finalConfig.noSniff) {
      c.res.headers.set('X-Content-Type-Options', 'nosniff');
    }

    if (finalConfig.frameOptions) {
      c.res.headers.set('X-Frame-Options', finalConfig.frameOptions);
    }

    if (finalConfig.xssProtection) {
      c.res.headers.set('X-XSS-Protection', '1; mode=block');
    }

    if (finalConfig.referrerPolicy) {
      c.res.headers.set('Referrer-Policy', finalConfig.referrerPolicy);
    }

    if (finalConfig.permissionsPolicy) {
      c.res.headers.set('Permissions-Policy', finalConfig.permissionsPolicy);
    }

    // Hide technology stack
    c.res.headers.set('X-Powered-By', 'event-scout');
    c.res.headers.set('Server', 'event-scout');
  });
}

// Input sanitization middleware
export const inputSanitization = createMiddleware(async (c: Context, next: Next) => {
  const contentType = c.req.header('content-type');

  if (contentType && contentType.includes('application/json')) {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({
        success: false,
        error: 'InvalidRequest: request body must be valid JSON'
      }, 400);
    }

    // Replace the request body with the sanitized version
    const headers = new Headers(c.req.raw.headers);
    headers.delete('content-length');
    c.req.raw = new Request(c.req.url, {
      method: c.req.method,
      headers,
      body: JSON.stringify(sanitizeValue(body))
    });
    c.req.bodyCache = {};
  }

  await next();
});

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, sanitizeValue(item)]));
  }
  return value;
}

// Sanitize individual strings
export function sanitizeString(str: string): string {
  return HTMLSanitizer.stripTags(str)
    .replace(/^\s*(?:javascript|vbscript|data|file):/i, '')
    .trim();
}

// URL validation middleware
export const urlValidation = createMiddleware(async (c: Context, next: Next) => {
  const urlParams = ['url', 'callback', 'redirect', 'return'];

  for (const param of urlParams) {
    const value = c.req.query(param);
    if (value && !isValidUrl(value)) {
      return c.json({
        success: false,
        error: `InvalidRequest: parameter '${param}' contains an invalid URL`
      }, 400);
    }
  }

  await next();
});

// Validate URL safety
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);

    // Only allow HTTP and HTTPS protocols
    if (!['http:', 'https:'].includes(parsed.protocol)) {
      return false;
    }

    // Block localhost and private IP ranges in production
    if (process.env.NODE_ENV === 'production') {
      const hostname = parsed.hostname.toLowerCase();

      if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '[::1]') {
        return false;
      }

      if (/^(10\.|172\.(1[6-9]|2[0-9]|3[01])\.|192\.168\.)/.test(hostname)) {
        return false;
      }

      if (hostname.endsWith('.local') || hostname.endsWith('.internal')) {
        return false;
      }
    }

    return true;
  } catch {
    return false;
  }
}

// Request size limitation middleware
export function requestSizeLimit(maxSize: number = 1024 * 1024) { // Default 1MB
  return createMiddleware(async (c: Context, next: Next) => {
    const contentLength = c.req.header('content-length');

    if (contentLength && parseInt(contentLength, 10) > maxSize) {
      return c.json({
        success: false,
        error: `InvalidRequest: request size exceeds maximum allowed size of ${Math.round(maxSize / 1024)}KB`
      }, 413);
    }

    await next();
  });
}

const DEVELOPMENT_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'];

// CORS middleware restricted to known origins
export function secureCors(allowedOrigins: string[] = []) {
  return createMiddleware(async (c: Context, next: Next) => {
    const origins = process.env.NODE_ENV === 'development'
      ? [...allowedOrigins, ...DEVELOPMENT_ORIGINS]
      : allowedOrigins;
    const origin = c.req.header('origin');

    if (origin && origins.includes(origin)) {
      c.header('Access-Control-Allow-Origin', origin);
      c.header('Vary', 'Origin');
    }

    c.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    c.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, x-api-key');
    c.header('Access-Control-Max-Age', '86400'); // 24 hours

    if (c.req.method === 'OPTIONS') {
      return c.body(null, 204);
    }

    await next();
  });
}

// Content type validation middleware
export const contentTypeValidation = createMiddleware(async (c: Context, next: Next) => {
  if (['POST', 'PUT', 'PATCH'].includes(c.req.method)) {
    const contentType = c.req.header('content-type');

    if (!contentType) {
      return c.json({
        success: false,
        error: 'InvalidRequest: Content-Type header is required for this request'
      }, 400);
    }

    if (!contentType.includes('application/json')) {
      return c.json({
        success: false,
        error: 'InvalidRequest: Content-Type must be application/json'
      }, 415);
    }
  }

  await next();
});

// Configured middleware instances
export const productionSecurity = securityHeaders();
export const developmentSecurity = securityHeaders({
  contentSecurityPolicy: "default-src 'self' 'unsafe-inline'; connect-src 'self' ws: wss: http: https:;"
});
