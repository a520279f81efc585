import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type { TargetEventsStore } from '../lib/store/target-events-store.js';
import { InvalidRequest, toErrorPayload } from '../lib/errors.js';
import { urlValidation } from '../middleware/security.js';
import type { AuthEnv } from '../middleware/auth.js';

const filtersSchema = z.object({
  location: z.string().trim().min(1).optional(),
  q: z.string().trim().min(1).optional(),
  page: z.coerce.number().int().min(1).optional().default(1),
  limit: z.coerce.number().int().min(1).max(100).optional().default(20)
});

const lookupSchema = z.object({
  url: z.string().url()
});

function invalidQuery(issues: z.ZodIssue[]) {
  return toErrorPayload(new InvalidRequest(issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')));
}

export function createEventsRoutes(store: TargetEventsStore) {
  const events = new Hono<AuthEnv>();

  // GET /api/events - Stored target events with filters and pagination
  events.get(
    '/',
    zValidator('query', filtersSchema, (result, c) => {
      if (!result.success) return c.json(invalidQuery(result.error.issues), 400);
    }),
    async (c) => {
      try {
        const { page, limit, ...filters } = c.req.valid('query');
        const result = await store.list(filters, { page, limit });

        return c.json({
          success: true,
          data: result.events,
          pagination: result.pagination
        });
      } catch (error) {
        console.error('[Events] Error reading target events:', error);
        return c.json({
          success: false,
          error: 'InternalError: failed to read target events'
        }, 500);
      }
    }
  );

  // GET /api/events/lookup?url= - One stored event by its URL
  events.get(
    '/lookup',
    urlValidation,
    zValidator('query', lookupSchema, (result, c) => {
      if (!result.success) return c.json(invalidQuery(result.error.issues), 400);
    }),
    async (c) => {
      try {
        const { url } = c.req.valid('query');
        const event = await store.get(url);

        if (!event) {
          return c.json({
            success: false,
            error: 'Event not found'
          }, 404);
        }

        return c.json({
          success: true,
          data: event
        });
      } catch (error) {
        console.error('[Events] Error looking up target event:', error);
        return c.json({
          success: false,
          error: 'InternalError: failed to read target events'
        }, 500);
      }
    }
  );

  return events;
}
