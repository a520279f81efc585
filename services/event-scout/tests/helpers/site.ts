import { FakeSite } from './fake-browser.js';
import { eventPage, searchPage } from './pages.js';

export const DISCOVER = 'https://lu.ma/discover';

export const RELEVANCE: Record<string, unknown> = {
  'AI Mixer': { score: 70, highlight: 'AI, founders' },
  'Seed Pitch Day': { score: 95, highlight: ['founders', 'investors'] },
  'Knitting Circle': { score: 5 }
};

/** A discover feed of four listings, one of which is an unreadable page. */
export function networkingSite(): FakeSite {
  return new FakeSite()
    .route(DISCOVER, searchPage({
      batches: [[
        { href: '/ai-mixer', title: 'AI Mixer' },
        { href: '/broken', title: 'Broken' },
        { href: '/seed-pitch-day', title: 'Seed Pitch Day' },
        { href: '/knitting-circle', title: 'Knitting Circle' }
      ]]
    }))
    .route('https://lu.ma/ai-mixer', eventPage({
      title: 'AI Mixer',
      date: '2026-11-05T18:00:00.000Z',
      location: 'San Francisco',
      speakers: [{ name: 'Dana Reyes', company: 'Northwind Ventures' }]
    }))
    .route('https://lu.ma/broken', '<html><body><p>Oops</p></body></html>')
    .route('https://lu.ma/seed-pitch-day', eventPage({
      title: 'Seed Pitch Day',
      date: '2026-12-01T17:00:00.000Z',
      location: 'Hatch Hall'
    }))
    .route('https://lu.ma/knitting-circle', eventPage({
      title: 'Knitting Circle',
      date: '2026-11-09T10:00:00.000Z'
    }));
}
