import { describe, it, expect } from 'vitest';
import { canonicalizeEventUrl, isEventUrl, searchSurfaceUrl } from '../../src/lib/scraping/url.js';

describe('canonicalizeEventUrl', () => {
  it('drops query, fragment, www and trailing slash', () => {
    expect(canonicalizeEventUrl('https://www.Lu.ma/ai-mixer/?utm_source=feed#rsvp')).toBe('https://lu.ma/ai-mixer');
  });

  it('upgrades http and resolves relative links against the base', () => {
    expect(canonicalizeEventUrl('http://lu.ma/founders')).toBe('https://lu.ma/founders');
    expect(canonicalizeEventUrl('/e/founders-breakfast', 'https://lu.ma/discover')).toBe('https://lu.ma/e/founders-breakfast');
  });

  it('keeps the root path and explicit ports', () => {
    expect(canonicalizeEventUrl('https://lu.ma/')).toBe('https://lu.ma/');
    expect(canonicalizeEventUrl('http://localhost:8080/demo-day/')).toBe('https://localhost:8080/demo-day');
  });

  it('rejects non-http links', () => {
    expect(canonicalizeEventUrl('mailto:hello@example.com')).toBeNull();
    expect(canonicalizeEventUrl('javascript:void(0)')).toBeNull();
  });

  it('is idempotent', () => {
    const once = canonicalizeEventUrl('https://www.lu.ma/ai-mixer/?ref=home');
    expect(once).toBe('https://lu.ma/ai-mixer');
    expect(canonicalizeEventUrl(once ?? '')).toBe(once);
  });
});

describe('isEventUrl', () => {
  it('accepts single-slug and /e/ event pages on the site host', () => {
    expect(isEventUrl('https://lu.ma/ai-mixer')).toBe(true);
    expect(isEventUrl('https://lu.ma/e/ai-mixer')).toBe(true);
  });

  it('rejects listing, account and off-site pages', () => {
    expect(isEventUrl('https://lu.ma/discover')).toBe(false);
    expect(isEventUrl('https://lu.ma/signin')).toBe(false);
    expect(isEventUrl('https://lu.ma/user/jane')).toBe(false);
    expect(isEventUrl('https://lu.ma/')).toBe(false);
    expect(isEventUrl('https://example.com/ai-mixer')).toBe(false);
    expect(isEventUrl('https://lu.ma/sf/ai-mixer/photos')).toBe(false);
  });
});

describe('searchSurfaceUrl', () => {
  it('uses the discover page without a calendar', () => {
    expect(searchSurfaceUrl('https://lu.ma/')).toBe('https://lu.ma/discover');
  });

  it('slugs the calendar name', () => {
    expect(searchSurfaceUrl('https://lu.ma', 'SF AI Founders')).toBe('https://lu.ma/sf-ai-founders');
    expect(searchSurfaceUrl('https://lu.ma', 'https://lu.ma/genai-sf/')).toBe('https://lu.ma/genai-sf');
  });
});
