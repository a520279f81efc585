import { describe, it, expect } from 'vitest';
import { JSDOM } from 'jsdom';
import { ContentValidator, HTMLSanitizer } from '../../src/lib/scraping/sanitizer.js';

describe('HTMLSanitizer', () => {
  it('extracts visible text with element boundaries as spaces', () => {
    const text = HTMLSanitizer.extractText('<div><h1>Demo&nbsp;Day</h1><p>Founders &amp; investors</p><script>track()</script></div>');

    expect(text).toBe('Demo Day Founders & investors');
  });

  it('strips tags but keeps their text', () => {
    expect(HTMLSanitizer.stripTags('<b>AI</b> <img src=x onerror=alert(1)>founders')).toBe('AI founders');
  });

  it('reads meta tags, the title and the canonical link', () => {
    const { document } = new JSDOM(`<html><head>
      <title> Seed   Pitch Day </title>
      <meta property="og:title" content="Seed Pitch Day">
      <meta name="description" content=" Ten startups pitch. ">
      <link rel="canonical" href="https://lu.ma/seed-pitch-day">
    </head><body></body></html>`).window;

    expect(HTMLSanitizer.extractMetadata(document)).toEqual({
      'og:title': 'Seed Pitch Day',
      description: 'Ten startups pitch.',
      title: 'Seed Pitch Day',
      canonical: 'https://lu.ma/seed-pitch-day'
    });
  });
});

describe('ContentValidator', () => {
  it('requires a title and an http(s) URL', () => {
    const result = ContentValidator.validateEventDraft({ url: 'ftp://lu.ma/x', speakers: [], sponsors: [] });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['Event title is required', 'Invalid event URL format']);
  });

  it('only warns about missing or free-form dates', () => {
    const missing = ContentValidator.validateEventDraft({ title: 'Mixer', url: 'https://lu.ma/mixer', speakers: [], sponsors: [] });
    const freeForm = ContentValidator.validateEventDraft({ title: 'Mixer', url: 'https://lu.ma/mixer', date: 'TBA', speakers: [], sponsors: [] });

    expect(missing).toEqual({ isValid: true, errors: [], warnings: ['Event date is missing'] });
    expect(freeForm.warnings).toEqual(['Event date is not machine readable']);
  });
});
