import { describe, it, expect } from 'vitest';
import { NavigationError } from '../../src/lib/errors.js';
import { BrowserSession, WaitFor, withBrowserSession } from '../../src/lib/scraping/session.js';
import { FakePageFactory, FakeSite } from '../helpers/fake-browser.js';

const fastNavigation = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2 };

describe('BrowserSession', () => {
  it('retries a failing load and then serves the page', async () => {
    const site = new FakeSite().route('https://lu.ma/ai-mixer', '<html><body><h1>AI Mixer</h1></body></html>', { failures: 2 });
    const factory = new FakePageFactory(site);

    await withBrowserSession(factory, async session => {
      await session.navigate('https://lu.ma/ai-mixer', WaitFor.selector('h1'));
      expect(session.currentUrl()).toBe('https://lu.ma/ai-mixer');
      expect(await session.html()).toContain('<h1>AI Mixer</h1>');
    }, { navigation: fastNavigation });

    expect(site.visits).toEqual(['https://lu.ma/ai-mixer', 'https://lu.ma/ai-mixer', 'https://lu.ma/ai-mixer']);
  });

  it('raises NavigationError once every attempt has failed', async () => {
    const site = new FakeSite().route('https://lu.ma/ai-mixer', '<html></html>', { failures: 5 });
    const session = await BrowserSession.open(new FakePageFactory(site), { navigation: fastNavigation });

    const error = await session.navigate('https://lu.ma/ai-mixer').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NavigationError);
    if (error instanceof NavigationError) {
      expect(error.attempts).toBe(3);
      expect(error.toString()).toBe(
        'NavigationError: Failed to load https://lu.ma/ai-mixer after 3 attempt(s) (net::ERR_CONNECTION_RESET at https://lu.ma/ai-mixer)'
      );
    }
    await session.close();
  });

  it('does not load anything once the signal has aborted', async () => {
    const site = new FakeSite().route('https://lu.ma/ai-mixer', '<html><body><h1>AI Mixer</h1></body></html>');
    const controller = new AbortController();
    const session = await BrowserSession.open(new FakePageFactory(site), { navigation: fastNavigation, signal: controller.signal });
    controller.abort();

    await expect(session.navigate('https://lu.ma/ai-mixer')).rejects.toBeInstanceOf(NavigationError);
    expect(site.visits).toEqual([]);
    await session.close();
  });

  it('treats a missing readiness selector as a failed load', async () => {
    const site = new FakeSite().route('https://lu.ma/blank', '<html><body></body></html>');
    const session = await BrowserSession.open(new FakePageFactory(site), { navigation: { ...fastNavigation, maxAttempts: 2 } });

    await expect(session.navigate('https://lu.ma/blank', WaitFor.selector('h1'))).rejects.toBeInstanceOf(NavigationError);
    expect(site.visits).toHaveLength(2);
    await session.close();
  });

  it('reports selector absence as false instead of throwing', async () => {
    const site = new FakeSite().route('https://lu.ma/discover', '<html><body><input type="search"></body></html>');

    await withBrowserSession(new FakePageFactory(site), async session => {
      await session.navigate('https://lu.ma/discover');
      expect(await session.waitForSelector('input[type="search"]')).toBe(true);
      expect(await session.waitForSelector('[data-testid="missing"]', 10)).toBe(false);
    }, { navigation: fastNavigation });
  });

  it('releases the session when the callback throws', async () => {
    const factory = new FakePageFactory(new FakeSite());

    await expect(withBrowserSession(factory, async () => {
      throw new Error('stage failed');
    })).rejects.toThrow('stage failed');

    expect(factory.opened).toHaveLength(1);
    expect(factory.closed).toEqual(factory.opened);
    expect(factory.pages[0].closed).toBe(true);
  });

  it('closes once and refuses further use', async () => {
    const factory = new FakePageFactory(new FakeSite());
    const session = await BrowserSession.open(factory);

    await session.close();
    await session.close();

    expect(session.isClosed).toBe(true);
    expect(factory.closed).toEqual([session.id]);
    await expect(session.html()).rejects.toThrow(`Browser session ${session.id} is closed`);
  });

  it('releases the context when the page cannot be created', async () => {
    const factory = new FakePageFactory(new FakeSite());
    factory.failCreate = true;

    await expect(BrowserSession.open(factory)).rejects.toThrow('browser failed to launch');
    expect(factory.openSessions).toBe(0);
  });

  it('applies the navigation timeout as the page default', async () => {
    const factory = new FakePageFactory(new FakeSite());
    const session = await BrowserSession.open(factory, { navigation: { timeoutMs: 4321 } });

    expect(factory.pages[0].defaultTimeout).toBe(4321);
    await session.close();
  });
});
