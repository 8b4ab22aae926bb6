/**
 * Normalized analysis document returned to clients and stored at
 * analysis/<videoId>/results.json.
 */

/** A single timeline event. Offsets are in seconds from the start of the video. */
export interface Highlight {
  readonly type: string;
  readonly timestamp: number;
  readonly endTimestamp: number;
  readonly description: string;
  /** SMPTE display timecode of the chapter the event came from. */
  readonly timecode: string;
  readonly playerName?: string;
  readonly confidence: number;
}

/** Off-play scene (locker room, team bus, off-field). */
export interface Scene {
  readonly type: string;
  readonly startTime: number;
  readonly endTime: number;
  readonly description: string;
}

/** Spectator reaction. */
export interface CrowdReaction {
  readonly type: string;
  readonly timestamp: number;
  readonly endTimestamp: number;
  readonly description: string;
  readonly timecode: string;
}

export interface ChapterSummary {
  readonly index: number;
  readonly startTime: number;
  readonly endTime: number;
  readonly duration: number;
  readonly timecode: string;
  readonly summary: string;
}

export interface GameStats {
  readonly totalGoals: number;
  readonly totalPenalties: number;
  readonly keyPlayers: string[];
  /** Total video duration in seconds. */
  readonly totalDuration: number;
  readonly highlightsCount: number;
}

export interface GameContext {
  readonly location: string;
  readonly atmosphere: string;
  readonly advertisements: string[];
}

/**
 * Normalized analysis result.
 *
 * Invariants: highlights and crowdReactions are sorted ascending by timestamp,
 * chapters ascending by index. A present `error` means the raw output could not
 * be transformed and every list is empty.
 */
export interface AnalysisResult {
  readonly highlights: Highlight[];
  readonly scenes: Scene[];
  readonly crowdReactions: CrowdReaction[];
  readonly chapters: ChapterSummary[];
  readonly gameStats: GameStats;
  readonly gameContext: GameContext;
  readonly analysisConfidence: number;
  readonly analysisTimestamp: string;
  readonly error?: string;
}
