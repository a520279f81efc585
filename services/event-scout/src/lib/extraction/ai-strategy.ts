import type { StructuredCompleter } from '../ai/completer.js';
import { eventFieldsPrompt } from '../ai/prompts.js';
import { eventFieldsSchema } from '../ai/schemas.js';
import type { EventDraft } from '../scraping/sanitizer.js';
import type { ExtractionStrategy, PageSnapshot } from './strategy.js';

export interface AiFallbackOptions {
  minTextLength: number;
  maxPromptChars: number;
}

/**
 * Asks the model for the event fields when the DOM offers nothing
 * structured. The page URL is trusted over anything the model says.
 */
export class AiFallbackStrategy implements ExtractionStrategy {
  readonly name = 'ai-fallback';

  constructor(
    private readonly completer: StructuredCompleter,
    private readonly options: AiFallbackOptions
  ) {}

  canHandle(snapshot: PageSnapshot): boolean {
    return snapshot.text.length >= this.options.minTextLength;
  }

  async extract(snapshot: PageSnapshot, signal?: AbortSignal): Promise<EventDraft | null> {
    const fields = await this.completer.complete(
      eventFieldsPrompt(snapshot.url, snapshot.text, this.options.maxPromptChars),
      eventFieldsSchema,
      signal
    );

    if (!fields.title) {
      return null;
    }

    return {
      title: fields.title,
      url: snapshot.url,
      date: fields.date,
      location: fields.location,
      description: fields.description,
      speakers: [],
      sponsors: []
    };
  }
}
