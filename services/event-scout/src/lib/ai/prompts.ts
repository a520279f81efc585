import type { Event, SearchIntent } from '../../types/events.js';
import type { CompletionRequest } from './completer.js';

function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)} …` : text;
}

export function eventFieldsPrompt(pageUrl: string, pageText: string, maxChars: number): CompletionRequest {
  return {
    system: [
      'You extract facts about a single event from the visible text of its web page.',
      'Return STRICT JSON with exactly these keys: title, date, location, description.',
      'Use null for anything the text does not state. Never invent values.',
      'date keeps the wording of the page, or ISO 8601 when the page gives a machine-readable time.',
      'description is at most three sentences taken from the page.'
    ].join(' '),
    user: JSON.stringify({
      page_url: pageUrl,
      page_text: truncate(pageText, maxChars)
    })
  };
}

export function profilesPrompt(pageUrl: string, pageText: string, maxChars: number): CompletionRequest {
  return {
    system: [
      'You list the people and organisations named on an event page.',
      'Return STRICT JSON: {"speakers": [...], "sponsors": [...]}.',
      'Each item has keys name, title, company, bio, image, website; use null for unknown fields.',
      'speakers are hosts, speakers and panelists; sponsors are companies sponsoring or partnering.',
      'Only include entries whose name appears in the text. image and website must be absolute http(s) URLs or null.'
    ].join(' '),
    user: JSON.stringify({
      page_url: pageUrl,
      page_text: truncate(pageText, maxChars)
    })
  };
}

export function relevancePrompt(event: Event, intent: SearchIntent): CompletionRequest {
  return {
    system: [
      'You rate how well an event fits what a business-networking user is looking for.',
      'Return STRICT JSON: {"score": <integer 0-100>, "highlight": "<comma-separated keywords from the event that match the request, or null>"}.',
      '100 means an ideal match on topic, location and audience; 0 means unrelated.',
      'Keep highlight to at most six short keywords taken from the event text.'
    ].join(' '),
    user: JSON.stringify({
      request: {
        intent: intent.intent,
        location: intent.location ?? null,
        category: intent.category ?? null
      },
      event: {
        title: event.title,
        date: event.date,
        location: event.location ?? null,
        description: event.description ? truncate(event.description, 2000) : null,
        speakers: event.speakers.map(profile => [profile.name, profile.title, profile.company].filter(Boolean).join(', ')),
        sponsors: event.sponsors.map(profile => profile.name)
      }
    })
  };
}
