import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { SCRAPING_CONFIG } from './config.js';

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/**
 * The slice of a browser page the pipeline drives. Playwright's `Page`
 * satisfies it structurally; tests substitute a DOM-backed fake.
 */
export interface BrowserPage {
  goto(url: string, options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
  waitForSelector(
    selector: string,
    options?: { state?: 'attached' | 'visible'; timeout?: number }
  ): Promise<unknown>;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
  fill(selector: string, value: string, options?: { timeout?: number }): Promise<void>;
  click(selector: string, options?: { timeout?: number }): Promise<void>;
  press(selector: string, key: string, options?: { timeout?: number }): Promise<void>;
  mouse: { wheel(deltaX: number, deltaY: number): Promise<void> };
  setDefaultTimeout(timeout: number): void;
  close(): Promise<void>;
}

export interface PageFactory {
  createPage(sessionId: string): Promise<BrowserPage>;
  closeContext(sessionId: string): Promise<void>;
}

export interface BrowserManagerOptions {
  headless: boolean;
  executablePath?: string;
  viewport: { width: number; height: number };
}

export class BrowserManager implements PageFactory {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private contexts: Map<string, BrowserContext> = new Map();

  constructor(private options: BrowserManagerOptions) {}

  async getBrowser(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }
    if (!this.launching) {
      this.launching = chromium.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath,
        args: [
          '--no-sandbox',
          '--disable-setuid-sandbox',
          '--disable-dev-shm-usage',
          '--disable-accelerated-2d-canvas',
          '--no-first-run',
          '--disable-gpu'
        ]
      });
    }
    try {
      this.browser = await this.launching;
      return this.browser;
    } finally {
      this.launching = null;
    }
  }

  async createContext(sessionId: string): Promise<BrowserContext> {
    const browser = await this.getBrowser();

    const context = await browser.newContext({
      userAgent: SCRAPING_CONFIG.USER_AGENT,
      viewport: { ...this.options.viewport },
      extraHTTPHeaders: { ...SCRAPING_CONFIG.DEFAULT_HEADERS },
      ignoreHTTPSErrors: true,
      javaScriptEnabled: true
    });

    await context.addInitScript(() => {
      Object.defineProperty(navigator, 'webdriver', {
        get: () => undefined,
      });

      Object.defineProperty(navigator, 'languages', {
        get: () => ['en-US', 'en'],
      });
    });

    this.contexts.set(sessionId, context);
    return context;
  }

  async createPage(sessionId: string): Promise<Page> {
    const context = this.contexts.get(sessionId) || await this.createContext(sessionId);
    return await context.newPage();
  }

  async closeContext(sessionId: string): Promise<void> {
    const context = this.contexts.get(sessionId);
    if (!context) {
      return;
    }
    this.contexts.delete(sessionId);
    try {
      await context.close();
    } catch (error) {
      console.warn('[BrowserManager] Error closing context:', error);
    }
  }

  async closeAll(): Promise<void> {
    for (const sessionId of [...this.contexts.keys()]) {
      await this.closeContext(sessionId);
    }

    if (this.browser) {
      try {
        await this.browser.close();
      } catch (error) {
        console.warn('[BrowserManager] Error closing browser:', error);
      } finally {
        this.browser = null;
      }
    }
  }

  get openContexts(): number {
    return this.contexts.size;
  }
}
