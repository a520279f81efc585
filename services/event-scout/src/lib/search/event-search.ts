import type { Event, EventJson, SearchIntent, SearchRequest, ResultSet } from '../../types/events.js';
import { searchRequestSchema, toSearchIntent } from '../../types/events.js';
import { createCompleter, type StructuredCompleter } from '../ai/completer.js';
import type { SearchSettings } from '../config.js';
import {
  EventScoutError,
  ExtractionSkipped,
  InvalidRequest,
  SearchUIError,
  errorMessage,
  toErrorPayload,
  type ErrorPayload
} from '../errors.js';
import { AiFallbackStrategy } from '../extraction/ai-strategy.js';
import { StructuredDomStrategy } from '../extraction/dom-strategy.js';
import { EventExtractor } from '../extraction/event-extractor.js';
import { assemble, toEventJson } from '../results/assembler.js';
import { RelevanceScorer } from '../scoring/relevance-scorer.js';
import { BrowserManager, type PageFactory } from '../scraping/browser.js';
import { LUMA_CONFIG, type DetailSelectors, type SearchSelectors } from '../scraping/config.js';
import { SearchOrchestrator } from '../scraping/search-orchestrator.js';
import { withBrowserSession } from '../scraping/session.js';
import { TargetEventsStore, type UpsertResult } from '../store/target-events-store.js';

export interface ClosablePageFactory extends PageFactory {
  closeAll?(): Promise<void>;
}

export interface EventSearchDeps {
  pages: ClosablePageFactory;
  orchestrator: SearchOrchestrator;
  extractor: EventExtractor;
  scorer: RelevanceScorer;
  store?: TargetEventsStore;
  settings: Pick<SearchSettings, 'navigation' | 'search'>;
}

export interface SearchOptions {
  persist?: boolean;
}

export interface SearchResult extends ResultSet {
  persisted?: UpsertResult;
}

export interface SearchSuccess {
  success: true;
  partial: boolean;
  scored: boolean;
  events: EventJson[];
  warnings: string[];
  persisted?: UpsertResult;
}

export type SearchResponse = SearchSuccess | ErrorPayload;

/** State shared between a running pipeline and the timeout that may abandon it. */
interface RunContext {
  collected: Event[];
  closing: Promise<void> | null;
}

const TIMED_OUT = Symbol('timed-out');

/**
 * The whole pipeline for one request: open a session, search, extract each
 * candidate in turn, score, assemble, and optionally persist.
 */
export class EventSearchService {
  constructor(private readonly deps: EventSearchDeps) {}

  /**
   * Validate a raw request and run it. Session-level failures come back as
   * `{ success: false, error: "<Kind>: <message>" }`.
   */
  async searchEvents(request: unknown): Promise<SearchResponse> {
    const parsed = searchRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`);
      return toErrorPayload(new InvalidRequest(issues.join('; ')));
    }

    try {
      const result = await this.search(toSearchIntent(parsed.data), { persist: parsed.data.persist });
      return {
        success: true,
        partial: result.partial,
        scored: result.scored,
        events: result.events.map(toEventJson),
        warnings: result.warnings,
        ...(result.persisted ? { persisted: result.persisted } : {})
      };
    } catch (error) {
      const payload = toErrorPayload(error);
      console.error(`[EventSearch] ${payload.error}`);
      return payload;
    }
  }

  /**
   * Run one search bounded by `intent.timeoutSeconds`. On timeout the step in
   * flight is abandoned, the session is released, and whatever was fully
   * extracted is returned unscored with `partial: true`.
   */
  async search(intent: SearchIntent, options: SearchOptions = {}): Promise<SearchResult> {
    const controller = new AbortController();
    const context: RunContext = { collected: [], closing: null };
    const timeoutMs = intent.timeoutSeconds * 1000;

    console.log(`[EventSearch] Searching for "${intent.intent}" (max ${intent.maxResults}, timeout ${intent.timeoutSeconds}s)`);

    const pipeline = this.runWithRetries(intent, controller.signal, context);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof TIMED_OUT>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(TIMED_OUT);
      }, timeoutMs);
    });

    let result: SearchResult;
    try {
      const outcome = await Promise.race([pipeline, deadline]);
      if (outcome === TIMED_OUT) {
        pipeline.catch((error: unknown) => {
          console.warn(`[EventSearch] Abandoned step ended after the timeout: ${errorMessage(error)}`);
        });
        if (context.closing) {
          await context.closing;
        }
        console.warn(`[EventSearch] Timed out after ${intent.timeoutSeconds}s with ${context.collected.length} event(s) extracted`);
        result = assemble([...context.collected], {
          maxResults: intent.maxResults,
          scored: false,
          partial: true
        });
      } else {
        result = outcome;
      }
    } finally {
      clearTimeout(timer);
    }

    if (options.persist) {
      await this.persist(result);
    }
    return result;
  }

  async shutdown(): Promise<void> {
    await this.deps.pages.closeAll?.();
  }

  private async runWithRetries(intent: SearchIntent, signal: AbortSignal, context: RunContext): Promise<SearchResult> {
    const retries = this.deps.settings.search.searchUiRetries;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.runOnce(intent, signal, context);
      } catch (error) {
        if (!(error instanceof SearchUIError) || attempt >= retries || signal.aborted) {
          throw error;
        }
        console.warn(`[EventSearch] ${error.toString()}; retrying the search (${attempt + 1}/${retries})`);
      }
    }
  }

  private async runOnce(intent: SearchIntent, signal: AbortSignal, context: RunContext): Promise<SearchResult> {
    const { orchestrator, extractor, scorer } = this.deps;

    return await withBrowserSession(this.deps.pages, async session => {
      const onAbort = () => {
        context.closing = session.close().catch((error: unknown) => {
          console.warn(`[EventSearch] Error releasing session ${session.id}: ${errorMessage(error)}`);
        });
      };
      signal.addEventListener('abort', onAbort, { once: true });
      if (signal.aborted) {
        onAbort();
      }

      try {
        const candidates = await orchestrator.search(intent, session, signal);
        if (candidates.length === 0) {
          console.log(`[EventSearch] No candidates found for "${intent.intent}"`);
        }

        for (const candidate of candidates) {
          if (signal.aborted) break;
          try {
            context.collected.push(await extractor.extract(candidate, session, signal));
          } catch (error) {
            if (signal.aborted) throw error;
            const reason = error instanceof ExtractionSkipped ? error.toString() : `Unexpected extraction failure on ${candidate.url}: ${errorMessage(error)}`;
            console.warn(`[EventSearch] ${reason}`);
          }
        }

        const ranking = await scorer.rank(context.collected, intent, signal);
        return assemble(ranking.events, {
          maxResults: intent.maxResults,
          scored: ranking.scored,
          partial: false,
          warnings: ranking.warnings
        });
      } finally {
        signal.removeEventListener('abort', onAbort);
      }
    }, { navigation: this.deps.settings.navigation, signal });
  }

  private async persist(result: SearchResult): Promise<void> {
    const { store } = this.deps;
    if (!store) {
      result.warnings.push('StoreWriteConflict: no target events store is configured');
      return;
    }

    try {
      result.persisted = await store.upsert(result.events);
    } catch (error) {
      const message = error instanceof EventScoutError ? error.toString() : `StoreWriteConflict: ${errorMessage(error)}`;
      console.error(`[EventSearch] Persisting results failed: ${message}`);
      result.warnings.push(message);
    }
  }
}

export interface ServiceOverrides {
  pages?: ClosablePageFactory;
  completer?: StructuredCompleter;
  store?: TargetEventsStore;
}

function searchSelectors(settings: SearchSettings): SearchSelectors {
  return { ...LUMA_CONFIG.SEARCH_SELECTORS, ...settings.selectors.search };
}

function detailSelectors(settings: SearchSettings): DetailSelectors {
  return { ...LUMA_CONFIG.SELECTORS, ...settings.selectors.detail };
}

/** Wire the pipeline from settings; tests swap in their own pages, model and store. */
export function createEventSearchService(settings: SearchSettings, overrides: ServiceOverrides = {}): EventSearchService {
  const completer = overrides.completer ?? createCompleter(settings.model);
  const pages = overrides.pages ?? new BrowserManager(settings.browser);
  const details = detailSelectors(settings);

  return new EventSearchService({
    pages,
    orchestrator: new SearchOrchestrator({
      baseUrl: settings.baseUrl,
      search: settings.search,
      selectors: searchSelectors(settings)
    }),
    extractor: new EventExtractor(
      [
        new StructuredDomStrategy(details),
        new AiFallbackStrategy(completer, {
          minTextLength: settings.extraction.minTextLength,
          maxPromptChars: settings.extraction.maxPromptChars
        })
      ],
      completer,
      {
        readySelectors: [details.eventTitle],
        readyTimeoutMs: settings.navigation.selectorTimeoutMs,
        settleDelayMs: settings.navigation.settleDelayMs,
        maxPromptChars: settings.extraction.maxPromptChars,
        aiProfiles: settings.extraction.aiProfiles
      }
    ),
    scorer: new RelevanceScorer(completer, settings.scoring),
    store: overrides.store ?? new TargetEventsStore(settings.store),
    settings
  });
}

export type { SearchRequest };
