/**
 * Builders for raw analysis-service documents and normalized results.
 */

import type { AnalysisResult } from '../src/types/analysis.ts';

export interface RawChapterInput {
  index: number;
  startMs: number;
  endMs: number;
  timecode?: string;
  inference?: Record<string, unknown>;
}

export function rawChapter(input: RawChapterInput): Record<string, unknown> {
  return {
    chapter_index: input.index,
    start_timestamp_millis: input.startMs,
    end_timestamp_millis: input.endMs,
    duration_millis: input.endMs - input.startMs,
    ...(input.timecode ? { start_timecode_smpte: input.timecode } : {}),
    inference_result: input.inference ?? {},
  };
}

/** Custom output for a short three-chapter match. */
export function sampleCustomOutput(): Record<string, unknown> {
  return {
    inference_result: {
      game_location: 'Riverside Arena',
      game_atmosphere: 'Loud home crowd',
      advertisements: 'Acme Skates, , Polar Drinks ,',
    },
    matched_blueprint: { confidence: 0.93 },
    chapters: [
      rawChapter({
        index: 1,
        startMs: 65000,
        endMs: 80000,
        timecode: '00:01:05;00',
        inference: {
          player_actions: { action_type: 'goal', player_name: 'Avery Stone', description: 'Wrist shot top corner' },
          spectator_reactions: { reaction_type: 'cheer', description: 'Crowd on its feet' },
        },
      }),
      rawChapter({
        index: 0,
        startMs: 0,
        endMs: 30000,
        timecode: '00:00:00;00',
        inference: {
          player_actions: { action_type: 'save', player_name: 'Jordan Vale', description: 'Glove save' },
          locker_room_scenes: { scene_type: 'pep_talk', description: 'Coach speech before puck drop' },
        },
      }),
      rawChapter({
        index: 2,
        startMs: 125000,
        endMs: 140000,
        timecode: '00:02:05;00',
        inference: {
          game_events: { event_type: 'goal', description: 'Power play goal' },
          violations: { violation_type: 'penalty', player_involved: 'Smith', description: 'Tripping' },
          spectator_reactions: { reaction_type: 'boo', description: 'Fans boo the call' },
          off_field_scenes: { scene_type: 'bench', description: 'Bench celebrates' },
        },
      }),
    ],
  };
}

export function sampleStandardOutput(): Record<string, unknown> {
  return { metadata: { duration_millis: 150000 } };
}

/** A small normalized result for query tests. */
export function sampleResult(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    highlights: [
      { type: 'player_save', timestamp: 0, endTimestamp: 30, description: 'Glove save', timecode: '00:00:00;00', playerName: 'Jordan Vale', confidence: 0.9 },
      { type: 'player_goal', timestamp: 65, endTimestamp: 80, description: 'Wrist shot top corner', timecode: '00:01:05;00', playerName: 'Avery Stone', confidence: 0.9 },
      { type: 'crowd_cheer', timestamp: 65, endTimestamp: 80, description: 'Crowd on its feet', timecode: '00:01:05;00', confidence: 0.8 },
      { type: 'game_faceoff', timestamp: 100, endTimestamp: 110, description: 'Center ice faceoff win', timecode: '00:01:40;00', confidence: 0.9 },
      { type: 'player_assist', timestamp: 125, endTimestamp: 140, description: 'Cross ice pass', timecode: '00:02:05;00', playerName: 'Avery Stone', confidence: 0.9 },
    ],
    scenes: [],
    crowdReactions: [
      { type: 'cheer', timestamp: 65, endTimestamp: 80, description: 'Crowd on its feet', timecode: '00:01:05;00' },
    ],
    chapters: [
      { index: 0, startTime: 0, endTime: 30, duration: 30, timecode: '00:00:00;00', summary: 'Chapter 1' },
      { index: 1, startTime: 65, endTime: 80, duration: 15, timecode: '00:01:05;00', summary: 'Chapter 2' },
    ],
    gameStats: {
      totalGoals: 1,
      totalPenalties: 0,
      keyPlayers: ['Jordan Vale', 'Avery Stone'],
      totalDuration: 150,
      highlightsCount: 5,
    },
    gameContext: { location: 'Riverside Arena', atmosphere: 'Loud home crowd', advertisements: ['Acme Skates'] },
    analysisConfidence: 0.93,
    analysisTimestamp: '2026-03-01T12:00:00.000Z',
    ...overrides,
  };
}
