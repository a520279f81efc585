import type { Event, EventJson, Profile, ProfileJson, ResultSet } from '../../types/events.js';
import { canonicalizeEventUrl } from '../scraping/url.js';

export interface AssembleOptions {
  maxResults: number;
  scored: boolean;
  partial?: boolean;
  warnings?: string[];
}

/**
 * Deduplicate by canonical URL (first occurrence kept whole), order by
 * score when scoring succeeded, and cap at `maxResults`.
 */
export function assemble(events: readonly Event[], options: AssembleOptions): ResultSet {
  const seen = new Set<string>();
  const unique: Event[] = [];

  for (const event of events) {
    const key = canonicalizeEventUrl(event.url) ?? event.url;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(event);
  }

  // Array.prototype.sort is stable, so ties keep discovery order
  const ordered = options.scored
    ? [...unique].sort((a, b) => (b.relevanceScore ?? -1) - (a.relevanceScore ?? -1))
    : unique;

  return {
    events: ordered.slice(0, Math.max(0, options.maxResults)),
    partial: options.partial ?? false,
    scored: options.scored,
    warnings: [...(options.warnings ?? [])]
  };
}

export function toProfileJson(profile: Profile): ProfileJson {
  return {
    name: profile.name,
    title: profile.title ?? null,
    company: profile.company ?? null,
    bio: profile.bio ?? null,
    image: profile.image ?? null,
    website: profile.website ?? null
  };
}

export function toEventJson(event: Event): EventJson {
  return {
    title: event.title,
    url: event.url,
    date: event.date,
    location: event.location ?? null,
    sponsors: event.sponsors.map(toProfileJson),
    speakers: event.speakers.map(toProfileJson),
    relevance_score: event.relevanceScore ?? null,
    description: event.description ?? null,
    highlight: event.highlight ?? null
  };
}
