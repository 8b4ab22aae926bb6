/**
 * Free-text search over player actions and game events.
 */

import { tokenize, type QueryContext } from './context.ts';

export type SearchType = 'players' | 'events' | 'all';

export interface SearchHit {
  /** Offset in seconds. */
  readonly timestamp: number;
  readonly type: 'player_action' | 'game_event';
  readonly content: string;
  readonly relevanceScore: number;
  readonly context: string;
}

export interface SearchOutcome {
  readonly results: SearchHit[];
  /** Matches before truncation. */
  readonly total: number;
}

/** Hits must score strictly above this. */
export const RELEVANCE_THRESHOLD = 0.3;

export const MAX_SEARCH_RESULTS = 20;

const PHRASE_BONUS = 0.3;

/**
 * Share of query words present in the text, plus a bonus when the whole
 * query appears verbatim, capped at 1.0. No shared words scores 0.
 *
 * @example
 * calculateRelevance("Smith scores a goal", "smith goal") // => 1.0
 * calculateRelevance("Smith passes", "smith goal")        // => 0.5
 */
export function calculateRelevance(text: string, query: string): number {
  const queryWords = new Set(tokenize(query));
  if (queryWords.size === 0) return 0;

  const textWords = new Set(tokenize(text));
  let shared = 0;
  for (const word of queryWords) {
    if (textWords.has(word)) shared += 1;
  }

  if (shared === 0) return 0;

  let relevance = shared / queryWords.size;
  if (text.toLowerCase().includes(query.trim().toLowerCase())) {
    relevance += PHRASE_BONUS;
  }

  return Math.min(relevance, 1.0);
}

export function searchContent(ctx: QueryContext, query: string, searchType: SearchType = 'all'): SearchOutcome {
  const hits: SearchHit[] = [];

  if (searchType === 'players' || searchType === 'all') {
    for (const action of ctx.playerActions) {
      const content = `${action.player} ${action.action}`.trim();
      const score = calculateRelevance(`${content} ${action.description}`, query);
      if (score > RELEVANCE_THRESHOLD) {
        hits.push({
          timestamp: action.timestamp,
          type: 'player_action',
          content,
          relevanceScore: score,
          context: action.description,
        });
      }
    }
  }

  if (searchType === 'events' || searchType === 'all') {
    for (const event of ctx.gameEvents) {
      const score = calculateRelevance(`${event.event} ${event.description}`, query);
      if (score > RELEVANCE_THRESHOLD) {
        hits.push({
          timestamp: event.timestamp,
          type: 'game_event',
          content: event.event,
          relevanceScore: score,
          context: event.description,
        });
      }
    }
  }

  hits.sort((a, b) => b.relevanceScore - a.relevanceScore);

  return { results: hits.slice(0, MAX_SEARCH_RESULTS), total: hits.length };
}
