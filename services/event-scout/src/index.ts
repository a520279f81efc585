import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadSearchSettings } from './lib/config.js';
import { createEventSearchService } from './lib/search/event-search.js';
import { TargetEventsStore } from './lib/store/target-events-store.js';

const settings = loadSearchSettings();
const store = new TargetEventsStore(settings.store);
const service = createEventSearchService(settings, { store });

const allowedOrigins = (process.env.ALLOWED_ORIGINS || '')
  .split(',')
  .map(origin => origin.trim())
  .filter(Boolean);

const app = createApp({ service, store, allowedOrigins });

// Graceful shutdown
const gracefulShutdown = async () => {
  console.log('Shutting down gracefully...');
  try {
    await service.shutdown();
  } catch (error) {
    console.error('Error closing browser during shutdown:', error);
  }
  process.exit(0);
};

process.on('SIGTERM', () => void gracefulShutdown());
process.on('SIGINT', () => void gracefulShutdown());

const port = parseInt(process.env.PORT || '3000', 10);

console.log(`Starting event-scout API server on port ${port}...`);

serve({
  fetch: app.fetch,
  port
}, (info) => {
  console.log(`event-scout API server is running on http://localhost:${info.port}`);
});
