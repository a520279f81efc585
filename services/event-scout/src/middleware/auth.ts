import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';

export type AuthEnv = {
  Variables: {
    apiKey: string;
    authenticated: boolean;
  };
};

export const DEVELOPMENT_API_KEY = 'event-scout-dev-key';

/**
 * Keys are read from the environment on every request so rotating
 * API_KEY_PRIMARY / API_KEY_SECONDARY takes effect without a restart.
 */
export function loadApiKeys(env: NodeJS.ProcessEnv = process.env): Set<string> {
  const keys = new Set<string>();
  for (const key of [env.API_KEY_PRIMARY, env.API_KEY_SECONDARY, env.API_KEY_DEVELOPMENT]) {
    if (!key) continue;
    if (!validateApiKeyFormat(key)) {
      console.warn('[Auth] Ignoring configured API key with an invalid format');
      continue;
    }
    keys.add(key);
  }

  // Add default development key if in development mode
  if (env.NODE_ENV === 'development') {
    keys.add(DEVELOPMENT_API_KEY);
  }
  return keys;
}

function readApiKey(c: Context): string | undefined {
  return c.req.header('x-api-key') || c.req.header('authorization')?.replace(/^Bearer\s+/i, '') || undefined;
}

// API Key validation middleware
export const requireApiKey = createMiddleware<AuthEnv>(async (c, next) => {
  const apiKey = readApiKey(c);

  if (!apiKey) {
    return c.json({
      success: false,
      error: 'Authentication required',
      message: 'API key must be provided in x-api-key header or Authorization header'
    }, 401);
  }

  if (!loadApiKeys().has(apiKey)) {
    return c.json({
      success: false,
      error: 'Invalid API key',
      message: 'The provided API key is not valid'
    }, 403);
  }

  c.set('apiKey', apiKey);
  c.set('authenticated', true);

  await next();
});

// Optional API key middleware (allows unauthenticated access but tracks if authenticated)
export const optionalApiKey = createMiddleware<AuthEnv>(async (c, next) => {
  const apiKey = readApiKey(c);

  if (apiKey && loadApiKeys().has(apiKey)) {
    c.set('apiKey', apiKey);
    c.set('authenticated', true);
  } else {
    c.set('authenticated', false);
  }

  await next();
});

// Middleware to log API usage for monitoring
export const logApiUsage = createMiddleware<AuthEnv>(async (c, next) => {
  const startTime = Date.now();

  await next();

  const apiKey: string | undefined = c.get('apiKey');
  const logData = {
    method: c.req.method,
    path: c.req.path,
    authenticated: c.get('authenticated') === true,
    apiKey: apiKey ? `${apiKey.substring(0, 8)}...` : null, // Only log partial key
    duration: Date.now() - startTime,
    status: c.res.status,
    timestamp: new Date().toISOString(),
    userAgent: c.req.header('user-agent'),
    ip: c.req.header('x-forwarded-for') || c.req.header('x-real-ip') || 'unknown'
  };

  console.log('[API] Request:', JSON.stringify(logData));
});

// API keys are at least 10 characters of letters, digits and hyphens
export function validateApiKeyFormat(apiKey: string): boolean {
  return /^[a-zA-Z0-9-]{10,}$/.test(apiKey);
}
