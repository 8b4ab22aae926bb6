/**
 * Whole-video summary built from a QueryContext.
 */

import type { GameContext } from '../types/analysis.ts';
import { formatClock, type QueryContext } from './context.ts';

export type SummaryType = 'comprehensive' | 'brief';

export interface KeyMoment {
  readonly timestamp: number;
  readonly event: string;
  readonly description: string;
  readonly importance: number;
}

export interface VideoSummary {
  readonly title: string;
  readonly summary: string;
  readonly keyMoments: KeyMoment[];
  /** Action count per player; unnamed actions count under "Unknown". */
  readonly playerStats: Record<string, number>;
  readonly gameContext: GameContext;
  readonly duration: string;
}

const MAX_KEY_MOMENTS = 5;

/**
 * Builds a summary. A brief summary carries the title, text, context and
 * duration without key moments or per-player counts.
 */
export function generateSummary(ctx: QueryContext, summaryType: SummaryType = 'comprehensive'): VideoSummary {
  const title = ctx.gameContext.location
    ? `Gameplay Analysis: ${ctx.gameContext.location}`
    : 'Gameplay Analysis Summary';

  const parts: string[] = [];
  if (ctx.playerActions.length > 0) {
    parts.push(`Analysis identified ${ctx.playerActions.length} key player actions`);
  }
  if (ctx.chapters.length > 0) {
    parts.push(`Video contains ${ctx.chapters.length} distinct chapters`);
  }
  const summary = parts.length > 0 ? `${parts.join('. ')}.` : 'Video analysis completed successfully.';

  const duration = ctx.totalDuration > 0 ? formatClock(ctx.totalDuration) : 'Unknown';

  if (summaryType === 'brief') {
    return { title, summary, keyMoments: [], playerStats: {}, gameContext: ctx.gameContext, duration };
  }

  const keyMoments = ctx.playerActions.slice(0, MAX_KEY_MOMENTS).map((action) => ({
    timestamp: action.timestamp,
    event: action.action,
    description: `${action.player} ${action.action}`.trim(),
    importance: action.confidence,
  }));

  const playerStats: Record<string, number> = {};
  for (const action of ctx.playerActions) {
    const player = action.player || 'Unknown';
    playerStats[player] = (playerStats[player] ?? 0) + 1;
  }

  return { title, summary, keyMoments, playerStats, gameContext: ctx.gameContext, duration };
}
