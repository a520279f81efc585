import type { Candidate, SearchIntent } from '../../types/events.js';
import type { SearchSettings } from '../config.js';
import { EventScoutError, SearchUIError, errorMessage } from '../errors.js';
import type { SearchSelectors } from './config.js';
import { extractDate, extractText, firstMatchingSelector, parseHtml, queryAll, textOf } from './dom.js';
import { WaitFor, type BrowserSession } from './session.js';
import { canonicalizeEventUrl, isEventUrl, searchSurfaceUrl } from './url.js';

export interface SearchOrchestratorOptions {
  baseUrl: string;
  search: SearchSettings['search'];
  selectors: SearchSelectors;
}

export type StopReason = 'target' | 'budget' | 'stagnation' | 'aborted' | 'interrupted';

export class SearchOrchestrator {
  constructor(private readonly options: SearchOrchestratorOptions) {}

  /**
   * Drive the site's search surface with the intent and collect candidate
   * event links in discovery order. An empty feed yields an empty list.
   */
  async search(intent: SearchIntent, session: BrowserSession, signal?: AbortSignal): Promise<Candidate[]> {
    const { selectors, search } = this.options;
    const surface = searchSurfaceUrl(this.options.baseUrl, intent.calendar);

    console.log(`[SearchOrchestrator] Searching "${intent.intent}" on ${surface}`);
    await session.navigate(surface, WaitFor.networkIdle());

    if (!(await session.waitForSelector(selectors.searchInput))) {
      throw new SearchUIError(`Search control not found on ${surface}`);
    }

    try {
      await this.submitQuery(intent, session);
    } catch (error) {
      if (error instanceof EventScoutError) throw error;
      throw new SearchUIError(`Could not submit the query on ${surface}: ${errorMessage(error)}`, { cause: error });
    }

    const target = Math.ceil(intent.maxResults * search.overFetchFactor);
    const candidates: Candidate[] = [];
    const seen = new Set<string>();
    let stagnantRounds = 0;
    let rounds = 0;
    let reason: StopReason;

    for (;;) {
      if (signal?.aborted) {
        reason = 'aborted';
        break;
      }

      const added = this.collect(await session.html(), candidates, seen);
      if (candidates.length >= target) {
        reason = 'target';
        break;
      }

      stagnantRounds = added === 0 ? stagnantRounds + 1 : 0;
      if (stagnantRounds >= search.stagnationLimit) {
        reason = 'stagnation';
        break;
      }
      if (rounds >= search.maxScrollRounds) {
        reason = 'budget';
        break;
      }

      try {
        await this.advance(session);
      } catch (error) {
        if (signal?.aborted) {
          reason = 'aborted';
          break;
        }
        console.warn(`[SearchOrchestrator] Could not load more results: ${errorMessage(error)}`);
        reason = 'interrupted';
        break;
      }
      rounds++;
    }

    console.log(`[SearchOrchestrator] Collected ${candidates.length} candidate(s) after ${rounds} round(s), stopped on ${reason}`);
    return candidates.slice(0, target);
  }

  private async submitQuery(intent: SearchIntent, session: BrowserSession): Promise<void> {
    const { selectors } = this.options;
    const document = parseHtml(await session.html(), session.currentUrl());
    const queryParts = [intent.intent];

    const filters: Array<[string | undefined, string]> = [
      [intent.location, selectors.locationInput],
      [intent.category, selectors.categoryInput]
    ];
    for (const [value, controlSelectors] of filters) {
      if (!value) continue;
      const control = firstMatchingSelector(document, controlSelectors);
      if (control) {
        await session.fill(control, value);
      } else {
        queryParts.push(value);
      }
    }

    const input = firstMatchingSelector(document, selectors.searchInput) ?? selectors.searchInput;
    await session.fill(input, queryParts.join(' '));

    const submit = firstMatchingSelector(document, selectors.searchSubmit);
    if (submit) {
      await session.click(submit);
    } else {
      await session.press(input, 'Enter');
    }

    await session.settle();
  }

  /** Parse the results feed and append unseen event links. Returns how many were added. */
  private collect(html: string, candidates: Candidate[], seen: Set<string>): number {
    const { selectors, baseUrl } = this.options;
    const document = parseHtml(html, baseUrl);

    let added = 0;
    for (const link of queryAll(document, selectors.resultLink)) {
      const href = link.getAttribute('href');
      if (!href) continue;

      const url = canonicalizeEventUrl(href, baseUrl);
      if (!url || !isEventUrl(url, baseUrl) || seen.has(url)) continue;

      seen.add(url);
      candidates.push({
        url,
        title: extractText(link, selectors.resultTitle) ?? link.getAttribute('aria-label') ?? textOf(link) ?? url,
        date: extractDate(link, selectors.resultDate) ?? undefined,
        location: extractText(link, selectors.resultLocation) ?? undefined,
        position: candidates.length
      });
      added++;
    }
    return added;
  }

  private async advance(session: BrowserSession): Promise<void> {
    const { selectors, search } = this.options;
    const document = parseHtml(await session.html(), session.currentUrl());
    const loadMore = firstMatchingSelector(document, selectors.loadMore);

    if (loadMore) {
      await session.click(loadMore);
    } else {
      await session.scroll(search.scrollStepPx);
    }
    await session.settle(search.scrollDelayMs);
  }
}
