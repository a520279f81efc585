import { Hono } from 'hono';
import { logger } from 'hono/logger';
import type { EventSearchService } from './lib/search/event-search.js';
import type { TargetEventsStore } from './lib/store/target-events-store.js';
import { createEventsRoutes } from './routes/events.js';
import { createSearchRoutes } from './routes/search.js';
import {
  productionSecurity,
  developmentSecurity,
  inputSanitization,
  contentTypeValidation,
  requestSizeLimit,
  secureCors
} from './middleware/security.js';
import { createSearchRateLimit, createStandardRateLimit } from './middleware/rate-limit.js';
import { logApiUsage, optionalApiKey, type AuthEnv } from './middleware/auth.js';

export interface AppDeps {
  service: EventSearchService;
  store: TargetEventsStore;
  allowedOrigins?: string[];
  /** Set false to skip per-request console logging (tests). */
  requestLogging?: boolean;
}

export function createApp({ service, store, allowedOrigins = [], requestLogging = true }: AppDeps) {
  const app = new Hono<AuthEnv>();

  // Security middleware
  app.use('*', process.env.NODE_ENV === 'production' ? productionSecurity : developmentSecurity);
  app.use('*', secureCors(allowedOrigins));
  app.use('*', requestSizeLimit(64 * 1024));
  app.use('*', contentTypeValidation);
  app.use('*', inputSanitization);

  // Logging and monitoring
  if (requestLogging) {
    app.use('*', logger());
    app.use('*', logApiUsage);
  }

  app.use('*', createStandardRateLimit());

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      store: store.path,
      service: 'event-scout'
    });
  });

  // Stored events (public, authentication tracked)
  app.use('/api/events/*', optionalApiKey);
  app.route('/api/events', createEventsRoutes(store));

  // Searches drive a real browser: key required, tighter limit
  app.route('/api/search', createSearchRoutes(service, createSearchRateLimit()));

  app.notFound((c) => {
    return c.json({
      success: false,
      error: 'Endpoint not found',
      path: c.req.path,
      method: c.req.method
    }, 404);
  });

  app.onError((err, c) => {
    console.error(`[API] Error occurred: ${err.message}`);
    console.error(err.stack);

    return c.json({
      success: false,
      error: `InternalError: ${process.env.NODE_ENV === 'development' ? err.message : 'internal server error'}`
    }, 500);
  });

  return app;
}
