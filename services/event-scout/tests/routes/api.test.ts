import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createApp } from '../../src/app.js';
import { createEventSearchService } from '../../src/lib/search/event-search.js';
import { TargetEventsStore } from '../../src/lib/store/target-events-store.js';
import { FakePageFactory, type FakeSite } from '../helpers/fake-browser.js';
import { FakeCompleter, promptEventTitle } from '../helpers/fake-completer.js';
import { searchPage } from '../helpers/pages.js';
import { testSettings } from '../helpers/settings.js';
import { DISCOVER, RELEVANCE, networkingSite } from '../helpers/site.js';

const API_KEY = 'test-secret-key';

describe('HTTP API', () => {
  let dir: string;
  let site: FakeSite;
  let completer: FakeCompleter;
  let store: TargetEventsStore;
  let app: ReturnType<typeof createApp>;

  function postSearch(body: unknown, headers: Record<string, string> = { 'x-api-key': API_KEY }) {
    return app.request('/api/search', {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: JSON.stringify(body)
    });
  }

  beforeEach(async () => {
    vi.stubEnv('API_KEY_PRIMARY', API_KEY);
    vi.stubEnv('NODE_ENV', 'test');
    dir = await mkdtemp(join(tmpdir(), 'event-scout-api-'));
    const settings = testSettings(join(dir, 'target_events.csv'));
    site = networkingSite();
    completer = new FakeCompleter({ relevance: request => RELEVANCE[promptEventTitle(request)] });
    store = new TargetEventsStore(settings.store);
    const service = createEventSearchService(settings, { pages: new FakePageFactory(site), completer, store });
    app = createApp({ service, store, requestLogging: false });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('reports health with the store location', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.status).toBe('ok');
    expect(body.service).toBe('event-scout');
    expect(body.store).toBe(store.path);
    expect(res.headers.get('X-Frame-Options')).toBe('DENY');
  });

  describe('POST /api/search', () => {
    it('requires an API key', async () => {
      const res = await postSearch({ intent: 'AI founders' }, {});
      expect(res.status).toBe(401);

      const body = await res.json();
      expect(body.error).toBe('Authentication required');
    });

    it('rejects a request without an intent', async () => {
      const res = await postSearch({ max_results: 3 });
      expect(res.status).toBe(400);

      const body = await res.json();
      expect(body).toEqual({ success: false, error: 'InvalidRequest: intent: Required' });
    });

    it('rejects bodies that are not JSON', async () => {
      const res = await app.request('/api/search', {
        method: 'POST',
        headers: { 'content-type': 'text/plain', 'x-api-key': API_KEY },
        body: 'AI founders'
      });
      expect(res.status).toBe(415);
    });

    it('runs the search and returns ranked events', async () => {
      const res = await postSearch({ intent: 'AI founders', max_results: 2 });
      expect(res.status).toBe(200);

      const body = await res.json();
      expect(body.success).toBe(true);
      expect(body.partial).toBe(false);
      expect(body.events.map((event: { title: string }) => event.title)).toEqual(['Seed Pitch Day', 'AI Mixer']);
    });

    it('strips markup from the intent before searching', async () => {
      await postSearch({ intent: '<b>AI</b> founders<script>alert(1)</script>', max_results: 1 });

      expect(JSON.parse(completer.requests[0].user).request.intent).toBe('AI founders');
    });

    it('maps a missing search control to 503', async () => {
      site.route(DISCOVER, searchPage({ batches: [[]], searchInput: false }));

      const res = await postSearch({ intent: 'AI founders' });
      expect(res.status).toBe(503);

      const body = await res.json();
      expect(body).toEqual({ success: false, error: 'SearchUIError: Search control not found on https://lu.ma/discover' });
    });

    it('limits searches per API key', async () => {
      site.route(DISCOVER, searchPage({ batches: [[]] }));

      for (let i = 0; i < 5; i++) {
        const res = await postSearch({ intent: 'AI founders' });
        expect(res.status).toBe(200);
      }

      const res = await postSearch({ intent: 'AI founders' });
      expect(res.status).toBe(429);
      const body = await res.json();
      expect(body.limit).toBe(5);
    });
  });

  describe('GET /api/events', () => {
    beforeEach(async () => {
      await store.upsert([
        { title: 'AI Mixer', url: 'https://lu.ma/ai-mixer', date: '2026-11-05', location: 'San Francisco', speakers: [], sponsors: [], relevanceScore: 70 },
        { title: 'Demo Night', url: 'https://lu.ma/demo-night', date: '2026-11-12', location: 'Oakland', speakers: [], sponsors: [] }
      ]);
    });

    it('lists stored events with filters and pagination', async () => {
      const res = await app.request('/api/events?location=oakland&limit=10');
      expect(res.status).toBe(200);

      const body = await res.json();
      expect(body.data.map((event: { title: string }) => event.title)).toEqual(['Demo Night']);
      expect(body.pagination).toEqual({ page: 1, limit: 10, total: 1, totalPages: 1 });
    });

    it('rejects an invalid page number', async () => {
      const res = await app.request('/api/events?page=0');
      expect(res.status).toBe(400);
    });

    it('looks up one event by URL', async () => {
      const res = await app.request(`/api/events/lookup?url=${encodeURIComponent('https://www.lu.ma/ai-mixer?ref=share')}`);
      expect(res.status).toBe(200);

      const body = await res.json();
      expect(body.data.title).toBe('AI Mixer');
      expect(body.data.relevance_score).toBe(70);
    });

    it('returns 404 for an unknown event and 400 for a bad URL', async () => {
      const missing = await app.request(`/api/events/lookup?url=${encodeURIComponent('https://lu.ma/unknown')}`);
      expect(missing.status).toBe(404);

      const invalid = await app.request('/api/events/lookup?url=not-a-url');
      expect(invalid.status).toBe(400);
      const body = await invalid.json();
      expect(body.error).toBe("InvalidRequest: parameter 'url' contains an invalid URL");
    });
  });

  it('answers unknown paths with 404', async () => {
    const res = await app.request('/api/unknown');
    expect(res.status).toBe(404);
  });
});
