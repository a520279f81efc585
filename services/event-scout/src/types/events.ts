import { z } from 'zod';

export const MAX_RESULTS_LIMIT = 50;

export const searchRequestSchema = z.object({
  intent: z.string().trim().min(1, 'intent is required'),
  location: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
  calendar: z.string().trim().min(1).optional(),
  max_results: z.number().int().min(1).max(MAX_RESULTS_LIMIT).optional().default(5),
  timeout_seconds: z.number().int().min(5).max(600).optional().default(60),
  persist: z.boolean().optional().default(false)
});

export type SearchRequest = z.input<typeof searchRequestSchema>;
export type ParsedSearchRequest = z.output<typeof searchRequestSchema>;

export interface SearchIntent {
  readonly intent: string;
  readonly location?: string;
  readonly category?: string;
  readonly calendar?: string;
  readonly maxResults: number;
  readonly timeoutSeconds: number;
}

export interface Candidate {
  url: string;
  title: string;
  date?: string;
  location?: string;
  position: number;
}

export interface Profile {
  name: string;
  title?: string;
  company?: string;
  bio?: string;
  image?: string;
  website?: string;
}

export interface Event {
  title: string;
  url: string;
  date: string;
  location?: string;
  description?: string;
  sponsors: Profile[];
  speakers: Profile[];
  relevanceScore?: number;
  highlight?: string;
}

export interface ResultSet {
  events: Event[];
  partial: boolean;
  scored: boolean;
  warnings: string[];
}

export interface ProfileJson {
  name: string;
  title: string | null;
  company: string | null;
  bio: string | null;
  image: string | null;
  website: string | null;
}

export interface EventJson {
  title: string;
  url: string;
  date: string;
  location: string | null;
  sponsors: ProfileJson[];
  speakers: ProfileJson[];
  relevance_score: number | null;
  description: string | null;
  highlight: string | null;
}

export interface StoredEvent extends EventJson {
  updated_at: string | null;
  insights: Record<string, string>;
}

export interface StoredEventFilters {
  location?: string;
  q?: string;
}

export interface PaginationParams {
  page?: number;
  limit?: number;
}

export function toSearchIntent(request: ParsedSearchRequest): SearchIntent {
  return Object.freeze({
    intent: request.intent,
    location: request.location,
    category: request.category,
    calendar: request.calendar,
    maxResults: request.max_results,
    timeoutSeconds: request.timeout_seconds
  });
}
