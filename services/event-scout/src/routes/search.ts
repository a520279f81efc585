import { Hono, type MiddlewareHandler } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { searchRequestSchema } from '../types/events.js';
import { InvalidRequest, statusForError, toErrorPayload } from '../lib/errors.js';
import type { EventSearchService } from '../lib/search/event-search.js';
import { requireApiKey, type AuthEnv } from '../middleware/auth.js';

export function createSearchRoutes(service: EventSearchService, rateLimit: MiddlewareHandler) {
  const search = new Hono<AuthEnv>();

  // POST /api/search - Run one event search
  search.post(
    '/',
    requireApiKey,
    rateLimit,
    zValidator('json', searchRequestSchema, (result, c) => {
      if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`);
        return c.json(toErrorPayload(new InvalidRequest(issues.join('; '))), 400);
      }
    }),
    async (c) => {
      const response = await service.searchEvents(c.req.valid('json'));

      if (!response.success) {
        return c.json(response, statusForError(response));
      }
      return c.json(response);
    }
  );

  return search;
}
