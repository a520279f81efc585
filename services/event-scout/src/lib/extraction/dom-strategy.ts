import type { Profile } from '../../types/events.js';
import type { DetailSelectors } from '../scraping/config.js';
import { extractAttribute, extractDate, extractText, queryAll, queryFirst, textOf } from '../scraping/dom.js';
import type { EventDraft } from '../scraping/sanitizer.js';
import { canonicalizeEventUrl } from '../scraping/url.js';
import { mergeProfiles, sanitizeProfiles } from './profiles.js';
import type { ExtractionStrategy, PageSnapshot } from './strategy.js';

type JsonRecord = Record<string, unknown>;

/**
 * Reads events straight from the rendered DOM: the title element, time
 * tags, location and description blocks, host/speaker/sponsor cards, and
 * schema.org Event data embedded as JSON-LD.
 */
export class StructuredDomStrategy implements ExtractionStrategy {
  readonly name = 'structured-dom';

  constructor(private readonly selectors: DetailSelectors) {}

  canHandle(snapshot: PageSnapshot): boolean {
    return textOf(queryFirst(snapshot.document, this.selectors.eventTitle)) !== null
      || findJsonLdEvent(snapshot.document) !== null;
  }

  async extract(snapshot: PageSnapshot): Promise<EventDraft | null> {
    const { document, metadata } = snapshot;
    const jsonLd = findJsonLdEvent(document);

    const title = extractText(document, this.selectors.eventTitle)
      ?? stringField(jsonLd, 'name')
      ?? metadata['og:title'];
    if (!title) {
      return null;
    }

    const speakers = mergeProfiles(
      this.cardProfiles(document, `${this.selectors.speakerCard}, ${this.selectors.hostCard}`, snapshot.finalUrl),
      sanitizeProfiles([...jsonLdPeople(jsonLd, 'performer'), ...jsonLdPeople(jsonLd, 'organizer')])
    );
    const sponsors = mergeProfiles(
      this.cardProfiles(document, this.selectors.sponsorCard, snapshot.finalUrl),
      sanitizeProfiles(jsonLdPeople(jsonLd, 'sponsor'))
    );

    return {
      title,
      url: this.resolveUrl(snapshot, jsonLd),
      date: extractDate(document, this.selectors.eventDate) ?? stringField(jsonLd, 'startDate') ?? undefined,
      location: extractText(document, this.selectors.eventLocation) ?? jsonLdLocation(jsonLd) ?? undefined,
      description: extractText(document, this.selectors.eventDescription)
        ?? stringField(jsonLd, 'description')
        ?? metadata['og:description']
        ?? metadata.description,
      speakers,
      sponsors
    };
  }

  private resolveUrl(snapshot: PageSnapshot, jsonLd: JsonRecord | null): string {
    const declared = [
      snapshot.metadata.canonical,
      snapshot.metadata['og:url'],
      stringField(jsonLd, 'url')
    ];
    for (const href of declared) {
      if (!href) continue;
      const url = canonicalizeEventUrl(href, snapshot.finalUrl);
      if (url) return url;
    }
    return canonicalizeEventUrl(snapshot.finalUrl) ?? snapshot.url;
  }

  private cardProfiles(document: Document, cardSelectors: string, pageUrl: string): Profile[] {
    const items = queryAll(document, cardSelectors).map(card => {
      const image = extractAttribute(card, this.selectors.profileImage, 'src');
      const website = extractAttribute(card, this.selectors.profileWebsite, 'href');
      return {
        name: extractText(card, this.selectors.profileName)
          ?? extractAttribute(card, this.selectors.profileImage, 'alt')
          ?? textOf(card),
        title: extractText(card, this.selectors.profileTitle),
        company: extractText(card, this.selectors.profileCompany),
        bio: extractText(card, this.selectors.profileBio),
        image: image ? absoluteUrl(image, pageUrl) : null,
        website: website ? absoluteUrl(website, pageUrl) : null
      };
    });
    return sanitizeProfiles(items);
  }
}

function absoluteUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: JsonRecord | null, key: string): string | undefined {
  const value = record?.[key];
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  return undefined;
}

function isEventType(value: unknown): boolean {
  const types: unknown[] = Array.isArray(value) ? value : [value];
  return types.some(type => typeof type === 'string' && /Event$/.test(type));
}

export function findJsonLdEvent(document: Document): JsonRecord | null {
  for (const script of queryAll(document, 'script[type="application/ld+json"]')) {
    let data: unknown;
    try {
      data = JSON.parse(script.textContent || '');
    } catch {
      continue;
    }

    const queue: unknown[] = [data];
    while (queue.length > 0) {
      const node = queue.shift();
      if (Array.isArray(node)) {
        queue.push(...node);
      } else if (isRecord(node)) {
        if (isEventType(node['@type'])) {
          return node;
        }
        const graph = node['@graph'];
        if (Array.isArray(graph)) {
          queue.push(...graph);
        }
      }
    }
  }
  return null;
}

function jsonLdPeople(event: JsonRecord | null, key: string): JsonRecord[] {
  const value = event?.[key];
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.filter(isRecord).map(item => ({
    name: item.name,
    title: item.jobTitle,
    company: isRecord(item.worksFor) ? item.worksFor.name : undefined,
    bio: item.description,
    image: typeof item.image === 'string' ? item.image : undefined,
    website: item.url
  }));
}

function jsonLdLocation(event: JsonRecord | null): string | undefined {
  const location = event?.location;
  if (typeof location === 'string') {
    return location.trim() || undefined;
  }
  if (!isRecord(location)) {
    return undefined;
  }

  const name = stringField(location, 'name');
  const address = location.address;
  const street = typeof address === 'string'
    ? address.trim()
    : isRecord(address)
      ? [stringField(address, 'streetAddress'), stringField(address, 'addressLocality'), stringField(address, 'addressRegion')]
          .filter(Boolean)
          .join(', ')
      : '';

  return [name, street].filter(Boolean).join(', ') || undefined;
}
