/**
 * Reshapes raw analysis-service output into the AnalysisResult timeline model.
 *
 * Pure: no I/O. Any failure, including a raw document of the wrong shape,
 * yields the empty result with `error` set instead of throwing.
 */

import { ZodError } from 'zod';
import type {
  AnalysisResult,
  ChapterSummary,
  CrowdReaction,
  Highlight,
  Scene,
} from '../types/analysis.ts';
import {
  CustomOutputSchema,
  StandardOutputSchema,
  type RawAnalysisOutput,
  type RawChapter,
} from './schemas.ts';
import { errorMessage } from '../utils/errors.ts';
import { logError, logInfo } from '../utils/log.ts';

/** Description the service writes into slots it found nothing for. */
export const NOT_APPLICABLE = 'Not applicable';

const DEFAULT_TIMECODE = '00:00:00;00';

const PLAYER_ACTION_CONFIDENCE = 0.9;
const GAME_EVENT_CONFIDENCE = 0.9;
const VIOLATION_CONFIDENCE = 0.85;
const CROWD_CONFIDENCE = 0.8;
const SCENE_CONFIDENCE = 0.85;

/** Mutable accumulator filled chapter by chapter. */
interface Accumulator {
  readonly highlights: Highlight[];
  readonly scenes: Scene[];
  readonly crowdReactions: CrowdReaction[];
  readonly chapters: ChapterSummary[];
  readonly keyPlayers: Set<string>;
  goals: number;
  penalties: number;
}

/** Time span of one chapter, converted to seconds. */
interface ChapterSpan {
  readonly start: number;
  readonly end: number;
  readonly timecode: string;
}

/**
 * Normalizes the combined raw output of one analysis job.
 *
 * @param now - Generation time stamped on the result
 */
export function normalizeAnalysis(raw: RawAnalysisOutput, now: Date = new Date()): AnalysisResult {
  try {
    return buildResult(raw, now);
  } catch (error) {
    const message = describeFailure(error);
    logError('analysis_normalization_failed', { error: message });
    return emptyResult(now, message);
  }
}

/** The well-formed result with every list empty. */
export function emptyResult(now: Date, error?: string): AnalysisResult {
  return {
    highlights: [],
    scenes: [],
    crowdReactions: [],
    chapters: [],
    gameStats: {
      totalGoals: 0,
      totalPenalties: 0,
      keyPlayers: [],
      totalDuration: 0,
      highlightsCount: 0,
    },
    gameContext: { location: '', atmosphere: '', advertisements: [] },
    analysisConfidence: 0,
    analysisTimestamp: now.toISOString(),
    ...(error !== undefined ? { error } : {}),
  };
}

function buildResult(raw: RawAnalysisOutput, now: Date): AnalysisResult {
  const standard = StandardOutputSchema.parse(raw.standardOutput ?? {});
  const custom = CustomOutputSchema.parse(raw.customOutput ?? {});

  const totalDuration = (standard.metadata?.duration_millis ?? 0) / 1000;
  const context = custom.inference_result;

  const acc: Accumulator = {
    highlights: [],
    scenes: [],
    crowdReactions: [],
    chapters: [],
    keyPlayers: new Set(),
    goals: 0,
    penalties: 0,
  };

  for (const chapter of custom.chapters ?? []) {
    addChapter(acc, chapter);
  }

  acc.highlights.sort((a, b) => a.timestamp - b.timestamp);
  acc.crowdReactions.sort((a, b) => a.timestamp - b.timestamp);
  acc.chapters.sort((a, b) => a.index - b.index);

  logInfo('analysis_normalized', {
    highlights: acc.highlights.length,
    goals: acc.goals,
    penalties: acc.penalties,
    key_players: acc.keyPlayers.size,
    scenes: acc.scenes.length,
    crowd_reactions: acc.crowdReactions.length,
    chapters: acc.chapters.length,
  });

  return {
    highlights: acc.highlights,
    scenes: acc.scenes,
    crowdReactions: acc.crowdReactions,
    chapters: acc.chapters,
    gameStats: {
      totalGoals: acc.goals,
      totalPenalties: acc.penalties,
      keyPlayers: [...acc.keyPlayers],
      totalDuration,
      highlightsCount: acc.highlights.length,
    },
    gameContext: {
      location: context?.game_location ?? '',
      atmosphere: context?.game_atmosphere ?? '',
      advertisements: splitList(context?.advertisements),
    },
    analysisConfidence: custom.matched_blueprint?.confidence ?? 1.0,
    analysisTimestamp: now.toISOString(),
  };
}

function addChapter(acc: Accumulator, chapter: RawChapter): void {
  const index = chapter.chapter_index ?? 0;
  const span: ChapterSpan = {
    start: (chapter.start_timestamp_millis ?? 0) / 1000,
    end: (chapter.end_timestamp_millis ?? 0) / 1000,
    timecode: chapter.start_timecode_smpte ?? DEFAULT_TIMECODE,
  };

  acc.chapters.push({
    index,
    startTime: span.start,
    endTime: span.end,
    duration: (chapter.duration_millis ?? 0) / 1000,
    timecode: span.timecode,
    summary: `Chapter ${index + 1}`,
  });

  const inference = chapter.inference_result;
  if (!inference) return;

  const action = inference.player_actions;
  if (action && isPresent(action.action_type, action.description)) {
    acc.highlights.push(highlight(span, `player_${action.action_type}`, action.description, PLAYER_ACTION_CONFIDENCE, action.player_name));
    if (action.action_type.toLowerCase() === 'goal') acc.goals += 1;
    if (action.player_name) acc.keyPlayers.add(action.player_name);
  }

  const event = inference.game_events;
  if (event && isPresent(event.event_type, event.description)) {
    acc.highlights.push(highlight(span, `game_${event.event_type}`, event.description, GAME_EVENT_CONFIDENCE));
    if (event.event_type.toLowerCase() === 'goal') acc.goals += 1;
  }

  const violation = inference.violations;
  if (violation && isPresent(violation.violation_type, violation.description)) {
    acc.highlights.push(highlight(span, `violation_${violation.violation_type}`, violation.description, VIOLATION_CONFIDENCE, violation.player_involved));
    acc.penalties += 1;
    if (violation.player_involved) acc.keyPlayers.add(violation.player_involved);
  }

  const reaction = inference.spectator_reactions;
  if (reaction && isPresent(reaction.reaction_type, reaction.description)) {
    acc.crowdReactions.push({
      type: reaction.reaction_type,
      timestamp: span.start,
      endTimestamp: span.end,
      description: reaction.description ?? '',
      timecode: span.timecode,
    });
    acc.highlights.push(highlight(span, `crowd_${reaction.reaction_type}`, reaction.description, CROWD_CONFIDENCE));
  }

  const locker = inference.locker_room_scenes;
  if (locker && isPresent(locker.scene_type, locker.description)) {
    acc.scenes.push(scene(span, `locker_${locker.scene_type}`, locker.description));
    acc.highlights.push(highlight(span, `scene_locker_${locker.scene_type}`, locker.description, SCENE_CONFIDENCE));
  }

  const bus = inference.team_bus_scenes;
  if (bus && isPresent(bus.scene_type, bus.description)) {
    acc.scenes.push(scene(span, `bus_${bus.scene_type}`, bus.description));
    acc.highlights.push(highlight(span, `scene_bus_${bus.scene_type}`, bus.description, SCENE_CONFIDENCE));
  }

  const offField = inference.off_field_scenes;
  if (offField && isPresent(offField.scene_type, offField.description)) {
    acc.scenes.push(scene(span, offField.scene_type, offField.description));
  }
}

/**
 * An event slot counts only when it has a type and a real description.
 * Narrows the type to string.
 */
function isPresent(
  type: string | null | undefined,
  description: string | null | undefined,
): type is string {
  return Boolean(type) && Boolean(description) && description !== NOT_APPLICABLE;
}

function highlight(
  span: ChapterSpan,
  type: string,
  description: string | null | undefined,
  confidence: number,
  playerName?: string | null,
): Highlight {
  return {
    type,
    timestamp: span.start,
    endTimestamp: span.end,
    description: description ?? '',
    timecode: span.timecode,
    ...(playerName ? { playerName } : {}),
    confidence,
  };
}

function scene(span: ChapterSpan, type: string, description: string | null | undefined): Scene {
  return { type, startTime: span.start, endTime: span.end, description: description ?? '' };
}

/** Splits a comma-separated list, dropping blank entries. */
function splitList(value: string | null | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((item) => item.trim()).filter(Boolean);
}

function describeFailure(error: unknown): string {
  if (error instanceof ZodError) {
    const details = error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return `Invalid analysis output: ${details}`;
  }
  return errorMessage(error);
}
