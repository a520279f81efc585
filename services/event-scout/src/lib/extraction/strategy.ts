import { HTMLSanitizer, type EventDraft } from '../scraping/sanitizer.js';
import { parseHtml } from '../scraping/dom.js';

/** A rendered detail page, parsed once and shared by every strategy. */
export interface PageSnapshot {
  /** Canonical URL of the candidate that led here. */
  url: string;
  /** Address the browser ended up on, after redirects. */
  finalUrl: string;
  html: string;
  document: Document;
  text: string;
  metadata: Record<string, string>;
}

export interface ExtractionStrategy {
  readonly name: string;
  canHandle(snapshot: PageSnapshot): boolean;
  /** Resolves null when the page yields nothing this strategy can use. */
  extract(snapshot: PageSnapshot, signal?: AbortSignal): Promise<EventDraft | null>;
}

export function createSnapshot(url: string, finalUrl: string, html: string): PageSnapshot {
  const document = parseHtml(html, finalUrl || url);
  const body = document.body ? document.body.innerHTML : html;

  return {
    url,
    finalUrl: finalUrl || url,
    html,
    document,
    text: HTMLSanitizer.extractText(body),
    metadata: HTMLSanitizer.extractMetadata(document)
  };
}
