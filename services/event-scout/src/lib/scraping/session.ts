import { v4 as uuidv4 } from 'uuid';
import type { BrowserPage, PageFactory } from './browser.js';
import { RetryExhaustedError, RetryManager } from './retry.js';
import { DEFAULT_SETTINGS, type SearchSettings } from '../config.js';
import { NavigationError, errorMessage } from '../errors.js';

export type NavigationSettings = SearchSettings['navigation'];

/** Readiness condition checked after the document has loaded. */
export type WaitCondition =
  | { kind: 'networkidle' }
  | { kind: 'selector'; selector: string }
  | { kind: 'timeout'; ms: number };

export const WaitFor = {
  networkIdle: (): WaitCondition => ({ kind: 'networkidle' }),
  selector: (selector: string): WaitCondition => ({ kind: 'selector', selector }),
  timeout: (ms: number): WaitCondition => ({ kind: 'timeout', ms })
};

export interface SessionOptions {
  navigation?: Partial<NavigationSettings>;
  signal?: AbortSignal;
}

/**
 * One page in one isolated browser context. The handle is passed to every
 * stage of a search and must be closed by whoever opened it.
 */
export class BrowserSession {
  private closed = false;

  private constructor(
    readonly id: string,
    private readonly page: BrowserPage,
    private readonly factory: PageFactory,
    private readonly navigation: NavigationSettings,
    private readonly signal?: AbortSignal
  ) {}

  static async open(factory: PageFactory, options: SessionOptions = {}): Promise<BrowserSession> {
    const navigation = { ...DEFAULT_SETTINGS.navigation, ...options.navigation };
    const id = uuidv4();

    let page: BrowserPage;
    try {
      page = await factory.createPage(id);
    } catch (error) {
      await factory.closeContext(id);
      throw error;
    }
    page.setDefaultTimeout(navigation.timeoutMs);

    console.log(`[BrowserSession] Opened session ${id}`);
    return new BrowserSession(id, page, factory, navigation, options.signal);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Load `url` and wait for `wait`. Both steps are retried together with
   * exponential backoff; exhausting the attempts raises NavigationError.
   */
  async navigate(url: string, wait: WaitCondition = WaitFor.networkIdle()): Promise<void> {
    this.assertOpen();
    let attempts = 0;

    try {
      await RetryManager.withRetry(async attempt => {
        attempts = attempt;
        if (this.signal?.aborted) {
          throw new Error(`Navigation to ${url} cancelled`);
        }
        await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigation.timeoutMs });
        await this.waitFor(wait);
      }, {
        maxAttempts: this.navigation.maxAttempts,
        initialDelay: this.navigation.initialDelayMs,
        maxDelay: this.navigation.maxDelayMs,
        signal: this.signal,
        onRetry: (error, attempt, delay) => {
          console.warn(`[BrowserSession] Navigation to ${url} failed (attempt ${attempt}), retrying in ${delay}ms: ${errorMessage(error)}`);
        }
      });
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      throw new NavigationError(url, attempts, { cause });
    }
  }

  async html(): Promise<string> {
    this.assertOpen();
    return await this.page.content();
  }

  currentUrl(): string {
    return this.page.url();
  }

  /** Resolves false instead of throwing when the selector never appears. */
  async waitForSelector(selector: string, timeoutMs: number = this.navigation.selectorTimeoutMs): Promise<boolean> {
    this.assertOpen();
    try {
      await this.page.waitForSelector(selector, { state: 'visible', timeout: timeoutMs });
      return true;
    } catch {
      return false;
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    this.assertOpen();
    await this.page.fill(selector, value, { timeout: this.navigation.selectorTimeoutMs });
  }

  async click(selector: string): Promise<void> {
    this.assertOpen();
    await this.page.click(selector, { timeout: this.navigation.selectorTimeoutMs });
  }

  async press(selector: string, key: string): Promise<void> {
    this.assertOpen();
    await this.page.press(selector, key, { timeout: this.navigation.selectorTimeoutMs });
  }

  async scroll(deltaY: number): Promise<void> {
    this.assertOpen();
    await this.page.mouse.wheel(0, deltaY);
  }

  async settle(ms: number = this.navigation.settleDelayMs): Promise<void> {
    this.assertOpen();
    await this.page.waitForTimeout(ms);
  }

  /** Release the page and its context. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      await this.page.close();
    } catch (error) {
      console.warn(`[BrowserSession] Error closing page for session ${this.id}:`, errorMessage(error));
    }
    await this.factory.closeContext(this.id);
    console.log(`[BrowserSession] Closed session ${this.id}`);
  }

  private async waitFor(wait: WaitCondition): Promise<void> {
    switch (wait.kind) {
      case 'networkidle':
        await this.page.waitForLoadState('networkidle', { timeout: this.navigation.timeoutMs });
        return;
      case 'selector':
        await this.page.waitForSelector(wait.selector, { state: 'visible', timeout: this.navigation.selectorTimeoutMs });
        return;
      case 'timeout':
        await this.page.waitForTimeout(wait.ms);
        return;
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Browser session ${this.id} is closed`);
    }
  }
}

/**
 * Run `fn` with a fresh session and always release it, whether `fn`
 * resolves or throws.
 */
export async function withBrowserSession<T>(
  factory: PageFactory,
  fn: (session: BrowserSession) => Promise<T>,
  options: SessionOptions = {}
): Promise<T> {
  const session = await BrowserSession.open(factory, options);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
