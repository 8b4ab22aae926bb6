import { describe, it, expect } from 'vitest';
import { normalizeAnalysis } from '../src/analysis/normalizer.ts';
import { rawChapter, sampleCustomOutput, sampleStandardOutput } from './fixtures.ts';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('normalizeAnalysis', () => {
  it('flattens every event slot of the sample match', () => {
    const result = normalizeAnalysis(
      { standardOutput: sampleStandardOutput(), customOutput: sampleCustomOutput() },
      NOW,
    );

    expect(result.highlights.map((h) => h.type)).toEqual([
      'player_save',
      'scene_locker_pep_talk',
      'player_goal',
      'crowd_cheer',
      'game_goal',
      'violation_penalty',
      'crowd_boo',
    ]);
    expect(result.scenes).toEqual([
      { type: 'locker_pep_talk', startTime: 0, endTime: 30, description: 'Coach speech before puck drop' },
      { type: 'bench', startTime: 125, endTime: 140, description: 'Bench celebrates' },
    ]);
    expect(result.crowdReactions).toEqual([
      { type: 'cheer', timestamp: 65, endTimestamp: 80, description: 'Crowd on its feet', timecode: '00:01:05;00' },
      { type: 'boo', timestamp: 125, endTimestamp: 140, description: 'Fans boo the call', timecode: '00:02:05;00' },
    ]);
    expect(result.gameStats).toEqual({
      totalGoals: 2,
      totalPenalties: 1,
      keyPlayers: ['Avery Stone', 'Jordan Vale', 'Smith'],
      totalDuration: 150,
      highlightsCount: 7,
    });
    expect(result.gameContext).toEqual({
      location: 'Riverside Arena',
      atmosphere: 'Loud home crowd',
      advertisements: ['Acme Skates', 'Polar Drinks'],
    });
    expect(result.analysisConfidence).toBe(0.93);
    expect(result.analysisTimestamp).toBe('2026-03-01T12:00:00.000Z');
    expect(result.error).toBeUndefined();
  });

  it('sorts chapter summaries by index and labels them from one', () => {
    const result = normalizeAnalysis({ customOutput: sampleCustomOutput() }, NOW);

    expect(result.chapters).toEqual([
      { index: 0, startTime: 0, endTime: 30, duration: 30, timecode: '00:00:00;00', summary: 'Chapter 1' },
      { index: 1, startTime: 65, endTime: 80, duration: 15, timecode: '00:01:05;00', summary: 'Chapter 2' },
      { index: 2, startTime: 125, endTime: 140, duration: 15, timecode: '00:02:05;00', summary: 'Chapter 3' },
    ]);
  });

  it('keeps highlights and crowd reactions non-decreasing by timestamp', () => {
    const result = normalizeAnalysis({ customOutput: sampleCustomOutput() }, NOW);

    for (let i = 1; i < result.highlights.length; i++) {
      expect(result.highlights[i].timestamp).toBeGreaterThanOrEqual(result.highlights[i - 1].timestamp);
    }
    for (let i = 1; i < result.crowdReactions.length; i++) {
      expect(result.crowdReactions[i].timestamp).toBeGreaterThanOrEqual(result.crowdReactions[i - 1].timestamp);
    }
  });

  it('produces one violation_penalty highlight for Smith', () => {
    const result = normalizeAnalysis({
      customOutput: {
        chapters: [rawChapter({
          index: 0,
          startMs: 10000,
          endMs: 20000,
          inference: {
            violations: { violation_type: 'penalty', player_involved: 'Smith', description: 'Tripping' },
          },
        })],
      },
    }, NOW);

    expect(result.highlights).toEqual([{
      type: 'violation_penalty',
      timestamp: 10,
      endTimestamp: 20,
      description: 'Tripping',
      timecode: '00:00:00;00',
      playerName: 'Smith',
      confidence: 0.85,
    }]);
    expect(result.gameStats.totalPenalties).toBe(1);
    expect(result.gameStats.keyPlayers).toEqual(['Smith']);
  });

  it('emits no player highlight when the description is "Not applicable"', () => {
    const result = normalizeAnalysis({
      customOutput: {
        chapters: [rawChapter({
          index: 0,
          startMs: 0,
          endMs: 5000,
          inference: {
            player_actions: { action_type: 'goal', player_name: 'Avery Stone', description: 'Not applicable' },
          },
        })],
      },
    }, NOW);

    expect(result.highlights).toEqual([]);
    expect(result.gameStats.totalGoals).toBe(0);
    expect(result.gameStats.keyPlayers).toEqual([]);
    expect(result.chapters).toHaveLength(1);
  });

  it('records a crowd reaction only when it has a description', () => {
    const result = normalizeAnalysis({
      customOutput: {
        chapters: [
          rawChapter({ index: 0, startMs: 0, endMs: 4000, inference: {
            spectator_reactions: { reaction_type: 'cheer', description: null },
          } }),
          rawChapter({ index: 1, startMs: 4000, endMs: 9000, inference: {
            spectator_reactions: { reaction_type: 'gasp', description: 'Near miss off the post' },
          } }),
        ],
      },
    }, NOW);

    expect(result.crowdReactions).toEqual([
      { type: 'gasp', timestamp: 4, endTimestamp: 9, description: 'Near miss off the post', timecode: '00:00:00;00' },
    ]);
    expect(result.highlights.map((h) => h.type)).toEqual(['crowd_gasp']);
  });

  it('counts goals from player actions and game events additively, case-insensitively', () => {
    const result = normalizeAnalysis({
      customOutput: {
        chapters: [
          rawChapter({ index: 0, startMs: 0, endMs: 1000, inference: {
            player_actions: { action_type: 'GOAL', player_name: 'Avery Stone', description: 'Snap shot' },
          } }),
          rawChapter({ index: 1, startMs: 1000, endMs: 2000, inference: {
            game_events: { event_type: 'Goal', description: 'Empty net' },
          } }),
          rawChapter({ index: 2, startMs: 2000, endMs: 3000, inference: {
            player_actions: { action_type: 'goal', player_name: 'Jordan Vale', description: 'Rebound' },
            game_events: { event_type: 'goal', description: 'Scramble in front' },
          } }),
        ],
      },
    }, NOW);

    expect(result.gameStats.totalGoals).toBe(4);
  });

  it('omits playerName when the action has no player', () => {
    const result = normalizeAnalysis({
      customOutput: {
        chapters: [rawChapter({ index: 0, startMs: 0, endMs: 1000, inference: {
          player_actions: { action_type: 'hit', player_name: '', description: 'Open ice hit' },
        } })],
      },
    }, NOW);

    expect(result.highlights[0]).not.toHaveProperty('playerName');
    expect(result.gameStats.keyPlayers).toEqual([]);
  });

  it('converts milliseconds to seconds by exact division', () => {
    const result = normalizeAnalysis({
      standardOutput: { metadata: { duration_millis: 125000 } },
      customOutput: { chapters: [rawChapter({ index: 0, startMs: 1500, endMs: 2750 })] },
    }, NOW);

    expect(result.gameStats.totalDuration).toBe(125);
    expect(result.chapters[0].startTime).toBe(1.5);
    expect(result.chapters[0].endTime).toBe(2.75);
  });

  it('defaults confidence to 1.0 and context to empty when the custom output has none', () => {
    const result = normalizeAnalysis({ customOutput: { chapters: [] } }, NOW);

    expect(result.analysisConfidence).toBe(1.0);
    expect(result.gameContext).toEqual({ location: '', atmosphere: '', advertisements: [] });
    expect(result.gameStats.totalDuration).toBe(0);
  });

  it('degrades to the empty result with an error on a malformed document', () => {
    const result = normalizeAnalysis({ customOutput: { chapters: 'not-a-list' } }, NOW);

    expect(result).toEqual({
      highlights: [],
      scenes: [],
      crowdReactions: [],
      chapters: [],
      gameStats: { totalGoals: 0, totalPenalties: 0, keyPlayers: [], totalDuration: 0, highlightsCount: 0 },
      gameContext: { location: '', atmosphere: '', advertisements: [] },
      analysisConfidence: 0,
      analysisTimestamp: '2026-03-01T12:00:00.000Z',
      error: 'Invalid analysis output: chapters: Expected array, received string',
    });
  });
});
