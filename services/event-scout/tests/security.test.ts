import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Hono } from 'hono';
import {
  securityHeaders,
  inputSanitization,
  contentTypeValidation,
  requestSizeLimit,
  secureCors,
  urlValidation,
  sanitizeString,
  isValidUrl
} from '../src/middleware/security.js';

describe('Security Middleware', () => {
  let app: Hono;

  beforeEach(() => {
    app = new Hono();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('securityHeaders', () => {
    it('should add security headers to responses', async () => {
      app.use('*', securityHeaders());
      app.get('/test', (c) => c.json({ success: true }));

      const res = await app.request('/test');

      expect(res.headers.get('Content-Security-Policy')).toBe("default-src 'none'; frame-ancestors 'none';");
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
      expect(res.headers.get('X-Frame-Options')).toBe('DENY');
      expect(res.headers.get('X-XSS-Protection')).toBe('1; mode=block');
      expect(res.headers.get('Referrer-Policy')).toBe('strict-origin-when-cross-origin');
      expect(res.headers.get('X-Powered-By')).toBe('event-scout');
    });

    it('should set HSTS header with correct format', async () => {
      app.use('*', securityHeaders({
        hsts: { maxAge: 600, includeSubDomains: true }
      }));
      app.get('/test', (c) => c.json({ success: true }));

      const res = await app.request('/test');

      expect(res.headers.get('Strict-Transport-Security')).toBe('max-age=600; includeSubDomains');
    });
  });

  describe('inputSanitization', () => {
    beforeEach(() => {
      app.use('*', inputSanitization);
      app.post('/echo', async (c) => c.json(await c.req.json()));
    });

    it('should strip markup from every string in the body', async () => {
      const res = await app.request('/echo', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          intent: '<img src=x onerror=alert(1)>AI founders',
          tags: ['<b>networking</b>', 'javascript:alert(1)'],
          nested: { location: ' San Francisco ' },
          max_results: 3
        })
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        intent: 'AI founders',
        tags: ['networking', 'alert(1)'],
        nested: { location: 'San Francisco' },
        max_results: 3
      });
    });

    it('should reject malformed JSON', async () => {
      const res = await app.request('/echo', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"intent": '
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toBe('InvalidRequest: request body must be valid JSON');
    });
  });

  describe('sanitizeString', () => {
    it('should keep ampersands and plain text intact', () => {
      expect(sanitizeString('Founders & Funders: data science night')).toBe('Founders & Funders: data science night');
    });

    it('should drop dangerous schemes at the start', () => {
      expect(sanitizeString('data:text/html,hello')).toBe('text/html,hello');
      expect(sanitizeString(' VBScript:msgbox')).toBe('msgbox');
    });
  });

  describe('contentTypeValidation', () => {
    beforeEach(() => {
      app.use('*', contentTypeValidation);
      app.post('/test', (c) => c.json({ success: true }));
      app.get('/test', (c) => c.json({ success: true }));
    });

    it('should require Content-Type for POST requests', async () => {
      const res = await app.request('/test', {
        method: 'POST',
        body: new Blob([JSON.stringify({ test: 'data' })])
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toBe('InvalidRequest: Content-Type header is required for this request');
    });

    it('should accept valid Content-Type', async () => {
      const res = await app.request('/test', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ test: 'data' })
      });

      expect(res.status).toBe(200);
    });

    it('should reject invalid Content-Type', async () => {
      const res = await app.request('/test', {
        method: 'POST',
        headers: { 'Content-Type': 'text/plain' },
        body: 'test data'
      });

      expect(res.status).toBe(415);
      const body = await res.json();
      expect(body.error).toBe('InvalidRequest: Content-Type must be application/json');
    });

    it('should not check GET requests', async () => {
      const res = await app.request('/test');
      expect(res.status).toBe(200);
    });
  });

  describe('requestSizeLimit', () => {
    it('should reject requests exceeding size limit', async () => {
      app.use('*', requestSizeLimit(1024));
      app.post('/test', (c) => c.json({ success: true }));

      const res = await app.request('/test', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Content-Length': '2048'
        },
        body: JSON.stringify({ data: 'x'.repeat(2000) })
      });

      expect(res.status).toBe(413);
      const body = await res.json();
      expect(body.error).toBe('InvalidRequest: request size exceeds maximum allowed size of 1KB');
    });
  });

  describe('secureCors', () => {
    beforeEach(() => {
      app.use('*', secureCors(['https://dashboard.example.com']));
      app.get('/test', (c) => c.json({ success: true }));
    });

    it('should echo allowed origins only', async () => {
      const allowed = await app.request('/test', { headers: { origin: 'https://dashboard.example.com' } });
      const denied = await app.request('/test', { headers: { origin: 'https://elsewhere.example.com' } });

      expect(allowed.headers.get('Access-Control-Allow-Origin')).toBe('https://dashboard.example.com');
      expect(denied.headers.get('Access-Control-Allow-Origin')).toBeNull();
    });

    it('should answer preflight requests without a body', async () => {
      const res = await app.request('/test', { method: 'OPTIONS', headers: { origin: 'https://dashboard.example.com' } });

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
    });

    it('should allow local origins only in development', async () => {
      const before = await app.request('/test', { headers: { origin: 'http://localhost:5173' } });
      vi.stubEnv('NODE_ENV', 'development');
      const after = await app.request('/test', { headers: { origin: 'http://localhost:5173' } });

      expect(before.headers.get('Access-Control-Allow-Origin')).toBeNull();
      expect(after.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:5173');
    });
  });

  describe('URL validation', () => {
    it('should reject invalid URL query parameters', async () => {
      app.get('/lookup', urlValidation, (c) => c.json({ success: true }));

      const ok = await app.request(`/lookup?url=${encodeURIComponent('https://lu.ma/ai-mixer')}`);
      const bad = await app.request('/lookup?redirect=javascript:alert(1)');

      expect(ok.status).toBe(200);
      expect(bad.status).toBe(400);
      const body = await bad.json();
      expect(body.error).toBe("InvalidRequest: parameter 'redirect' contains an invalid URL");
    });

    describe('isValidUrl', () => {
      it('should validate correct URLs', () => {
        expect(isValidUrl('https://example.com')).toBe(true);
        expect(isValidUrl('http://example.com')).toBe(true);
        expect(isValidUrl('https://lu.ma/event-123')).toBe(true);
      });

      it('should reject invalid protocols', () => {
        expect(isValidUrl('javascript:alert(1)')).toBe(false);
        expect(isValidUrl('data:text/html,<script>alert(1)</script>')).toBe(false);
        expect(isValidUrl('file:///etc/passwd')).toBe(false);
      });

      it('should reject private IP ranges in production', () => {
        vi.stubEnv('NODE_ENV', 'production');

        expect(isValidUrl('http://localhost:3000')).toBe(false);
        expect(isValidUrl('http://127.0.0.1:8080')).toBe(false);
        expect(isValidUrl('http://192.168.1.1')).toBe(false);
        expect(isValidUrl('http://10.0.0.1')).toBe(false);
      });

      it('should allow private IPs in development', () => {
        vi.stubEnv('NODE_ENV', 'development');

        expect(isValidUrl('http://localhost:3000')).toBe(true);
        expect(isValidUrl('http://127.0.0.1:8080')).toBe(true);
      });
    });
  });
});
