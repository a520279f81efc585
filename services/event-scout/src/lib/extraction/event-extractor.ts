import type { Candidate, Event, Profile } from '../../types/events.js';
import type { StructuredCompleter } from '../ai/completer.js';
import { profilesPrompt } from '../ai/prompts.js';
import { profileListsSchema } from '../ai/schemas.js';
import { ExtractionSkipped, NavigationError, errorMessage } from '../errors.js';
import { ContentValidator, type EventDraft } from '../scraping/sanitizer.js';
import { WaitFor, type BrowserSession } from '../scraping/session.js';
import { mergeProfiles, sanitizeProfiles } from './profiles.js';
import { createSnapshot, type ExtractionStrategy, type PageSnapshot } from './strategy.js';

export interface EventExtractorOptions {
  /** Selectors whose appearance marks the detail page as rendered. */
  readySelectors: readonly string[];
  readyTimeoutMs: number;
  settleDelayMs: number;
  maxPromptChars: number;
  aiProfiles: boolean;
}

/**
 * Turns a candidate into an Event by loading its page and running the
 * strategies in priority order. The first strategy whose draft validates
 * wins; when none does the candidate is skipped.
 */
export class EventExtractor {
  constructor(
    private readonly strategies: readonly ExtractionStrategy[],
    private readonly completer: StructuredCompleter,
    private readonly options: EventExtractorOptions
  ) {}

  async extract(candidate: Candidate, session: BrowserSession, signal?: AbortSignal): Promise<Event> {
    const snapshot = await this.load(candidate, session);
    const reasons: string[] = [];

    for (const strategy of this.strategies) {
      if (!strategy.canHandle(snapshot)) {
        continue;
      }

      let draft: EventDraft | null;
      try {
        draft = await strategy.extract(snapshot, signal);
      } catch (error) {
        console.warn(`[EventExtractor] ${strategy.name} failed on ${candidate.url}: ${errorMessage(error)}`);
        reasons.push(`${strategy.name}: ${errorMessage(error)}`);
        continue;
      }

      if (!draft) {
        reasons.push(`${strategy.name}: no event fields found`);
        continue;
      }

      const validation = ContentValidator.validateEventDraft(draft);
      if (!validation.isValid || !draft.title || !draft.url) {
        reasons.push(`${strategy.name}: ${validation.errors.join(', ')}`);
        continue;
      }
      if (validation.warnings.length > 0) {
        console.warn(`[EventExtractor] ${candidate.url}: ${validation.warnings.join(', ')}`);
      }

      const profiles = await this.extractProfiles(snapshot, draft, signal);
      console.log(`[EventExtractor] Extracted "${draft.title}" with ${strategy.name}`);

      return {
        title: draft.title,
        url: draft.url,
        date: draft.date ?? candidate.date ?? '',
        location: draft.location ?? candidate.location,
        description: draft.description,
        speakers: profiles.speakers,
        sponsors: profiles.sponsors
      };
    }

    throw new ExtractionSkipped(
      candidate.url,
      reasons.length > 0 ? reasons.join('; ') : 'no extraction strategy could handle the page'
    );
  }

  private async load(candidate: Candidate, session: BrowserSession): Promise<PageSnapshot> {
    try {
      await session.navigate(candidate.url, WaitFor.timeout(this.options.settleDelayMs));
    } catch (error) {
      if (error instanceof NavigationError) {
        throw new ExtractionSkipped(candidate.url, error.message, { cause: error });
      }
      throw error;
    }

    const ready = await session.waitForSelector(this.options.readySelectors.join(', '), this.options.readyTimeoutMs);
    if (!ready) {
      console.warn(`[EventExtractor] Content selectors not found on ${candidate.url}, proceeding anyway`);
    }

    return createSnapshot(candidate.url, session.currentUrl(), await session.html());
  }

  private async extractProfiles(
    snapshot: PageSnapshot,
    draft: EventDraft,
    signal?: AbortSignal
  ): Promise<{ speakers: Profile[]; sponsors: Profile[] }> {
    const fromDom = { speakers: draft.speakers, sponsors: draft.sponsors };
    if (!this.options.aiProfiles || snapshot.text.length === 0) {
      return fromDom;
    }

    try {
      const lists = await this.completer.complete(
        profilesPrompt(snapshot.url, snapshot.text, this.options.maxPromptChars),
        profileListsSchema,
        signal
      );
      return {
        speakers: mergeProfiles(draft.speakers, sanitizeProfiles(lists.speakers)),
        sponsors: mergeProfiles(draft.sponsors, sanitizeProfiles(lists.sponsors))
      };
    } catch (error) {
      console.warn(`[EventExtractor] Profile extraction failed on ${snapshot.url}, keeping page profiles: ${errorMessage(error)}`);
      return fromDom;
    }
  }
}
