import type { Event, SearchIntent } from '../../types/events.js';
import type { StructuredCompleter } from '../ai/completer.js';
import { relevancePrompt } from '../ai/prompts.js';
import { relevanceSchema } from '../ai/schemas.js';
import type { SearchSettings } from '../config.js';
import { ScoringDegraded, errorMessage } from '../errors.js';

export interface RelevanceScore {
  score: number;
  highlight?: string;
}

export interface RankOutcome {
  events: Event[];
  scored: boolean;
  warnings: string[];
}

export class RelevanceScorer {
  constructor(
    private readonly completer: StructuredCompleter,
    private readonly options: SearchSettings['scoring']
  ) {}

  async score(event: Event, intent: SearchIntent, signal?: AbortSignal): Promise<RelevanceScore> {
    const judgement = await this.completer.complete(relevancePrompt(event, intent), relevanceSchema, signal);
    return {
      score: clampScore(judgement.score),
      highlight: judgement.highlight
    };
  }

  /**
   * Score every event in discovery order, one model call at a time. The
   * first failure stops scoring altogether: scores are dropped, discovery
   * order is kept and the outcome carries a ScoringDegraded warning.
   */
  async rank(events: readonly Event[], intent: SearchIntent, signal?: AbortSignal): Promise<RankOutcome> {
    if (!this.options.enabled || events.length === 0) {
      return { events: events.map(unscored), scored: false, warnings: [] };
    }

    const annotated: Event[] = [];
    for (const event of events) {
      try {
        const { score, highlight } = await this.score(event, intent, signal);
        annotated.push({ ...event, relevanceScore: score, highlight });
      } catch (error) {
        const degraded = new ScoringDegraded(`Relevance scoring failed for ${event.url}: ${errorMessage(error)}`, { cause: error });
        console.warn(`[RelevanceScorer] ${degraded.message}; keeping discovery order`);
        return { events: events.map(unscored), scored: false, warnings: [degraded.toString()] };
      }
    }

    const { minScore } = this.options;
    const kept = minScore === undefined
      ? annotated
      : annotated.filter(event => (event.relevanceScore ?? 0) >= minScore);

    console.log(`[RelevanceScorer] Scored ${annotated.length} event(s), kept ${kept.length}`);
    return { events: kept, scored: true, warnings: [] };
  }
}

export function clampScore(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

function unscored(event: Event): Event {
  const { relevanceScore: _score, highlight: _highlight, ...rest } = event;
  return rest;
}
