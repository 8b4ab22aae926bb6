/**
 * Flat lists the question-answering code works on, derived from a stored
 * AnalysisResult.
 */

import type { AnalysisResult, GameContext } from '../types/analysis.ts';

export interface PlayerAction {
  readonly player: string;
  readonly action: string;
  /** Offset in seconds. */
  readonly timestamp: number;
  readonly timecode: string;
  readonly description: string;
  readonly confidence: number;
}

export interface GameEvent {
  readonly event: string;
  readonly timestamp: number;
  readonly timecode: string;
  readonly description: string;
}

export interface ChapterMarker {
  readonly title: string;
  readonly timestamp: number;
  readonly timecode: string;
}

export interface QueryContext {
  readonly playerActions: PlayerAction[];
  readonly gameEvents: GameEvent[];
  readonly chapters: ChapterMarker[];
  readonly gameContext: GameContext;
  /** Seconds. */
  readonly totalDuration: number;
  readonly analysisConfidence: number;
}

const PLAYER_PREFIX = 'player_';
const GAME_PREFIX = 'game_';

export function buildQueryContext(result: AnalysisResult): QueryContext {
  const playerActions: PlayerAction[] = [];
  const gameEvents: GameEvent[] = [];

  for (const highlight of result.highlights) {
    if (highlight.type.startsWith(PLAYER_PREFIX)) {
      playerActions.push({
        player: highlight.playerName ?? '',
        action: highlight.type.slice(PLAYER_PREFIX.length),
        timestamp: highlight.timestamp,
        timecode: highlight.timecode,
        description: highlight.description,
        confidence: highlight.confidence,
      });
    } else if (highlight.type.startsWith(GAME_PREFIX)) {
      gameEvents.push({
        event: highlight.type.slice(GAME_PREFIX.length),
        timestamp: highlight.timestamp,
        timecode: highlight.timecode,
        description: highlight.description,
      });
    }
  }

  return {
    playerActions,
    gameEvents,
    chapters: result.chapters.map((chapter) => ({
      title: chapter.summary,
      timestamp: chapter.startTime,
      timecode: chapter.timecode,
    })),
    gameContext: result.gameContext,
    totalDuration: result.gameStats.totalDuration,
    analysisConfidence: result.analysisConfidence,
  };
}

/** Lowercase words with surrounding punctuation removed. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
    .filter(Boolean);
}

/**
 * Formats a second offset as m:ss, or h:mm:ss past an hour.
 *
 * @example
 * formatClock(65)   // => "1:05"
 * formatClock(3725) // => "1:02:05"
 */
export function formatClock(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = String(total % 60).padStart(2, '0');

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${secs}`;
  }
  return `${minutes}:${secs}`;
}
