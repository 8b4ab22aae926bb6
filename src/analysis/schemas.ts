/**
 * Zod schemas for the documents the analysis service writes.
 *
 * Fields are nullish throughout: the service omits slots it found nothing for,
 * and the normalizer supplies the defaults. A wrong type (a string where a
 * number belongs) still fails the parse.
 */

import { z } from 'zod';

const text = z.string().nullish();
const millis = z.number().nullish();

/** Job-metadata document at the job's output location. */
export const JobMetadataSchema = z.object({
  output_metadata: z.array(z.object({
    segment_metadata: z.array(z.object({
      standard_output_path: text,
      custom_output_path: text,
    })).nullish(),
  })).nullish(),
});

export type JobMetadata = z.infer<typeof JobMetadataSchema>;

const PlayerActionSchema = z.object({
  action_type: text,
  player_name: text,
  description: text,
});

const GameEventSchema = z.object({
  event_type: text,
  description: text,
});

const ViolationSchema = z.object({
  violation_type: text,
  player_involved: text,
  description: text,
});

const SpectatorReactionSchema = z.object({
  reaction_type: text,
  description: text,
});

const SceneSlotSchema = z.object({
  scene_type: text,
  description: text,
});

/** One chapter of the custom (blueprint) output. */
export const RawChapterSchema = z.object({
  chapter_index: z.number().int().nullish(),
  start_timestamp_millis: millis,
  end_timestamp_millis: millis,
  duration_millis: millis,
  start_timecode_smpte: text,
  inference_result: z.object({
    player_actions: PlayerActionSchema.nullish(),
    game_events: GameEventSchema.nullish(),
    violations: ViolationSchema.nullish(),
    spectator_reactions: SpectatorReactionSchema.nullish(),
    locker_room_scenes: SceneSlotSchema.nullish(),
    team_bus_scenes: SceneSlotSchema.nullish(),
    off_field_scenes: SceneSlotSchema.nullish(),
  }).nullish(),
});

export type RawChapter = z.infer<typeof RawChapterSchema>;

/** Blueprint output: whole-video context plus per-chapter inferences. */
export const CustomOutputSchema = z.object({
  inference_result: z.object({
    game_location: text,
    game_atmosphere: text,
    advertisements: text,
  }).nullish(),
  matched_blueprint: z.object({
    confidence: z.number().nullish(),
  }).nullish(),
  chapters: z.array(RawChapterSchema).nullish(),
});

export type CustomOutput = z.infer<typeof CustomOutputSchema>;

/** Standard output: only the video metadata is read. */
export const StandardOutputSchema = z.object({
  metadata: z.object({
    duration_millis: millis,
  }).nullish(),
});

export type StandardOutput = z.infer<typeof StandardOutputSchema>;

/** Combined raw output handed from the job runner to the normalizer. */
export interface RawAnalysisOutput {
  readonly standardOutput?: unknown;
  readonly customOutput?: unknown;
}

const HighlightSchema = z.object({
  type: z.string(),
  timestamp: z.number(),
  endTimestamp: z.number().default(0),
  description: z.string().default(''),
  timecode: z.string().default('00:00:00;00'),
  playerName: z.string().optional(),
  confidence: z.number().default(0),
});

const SceneSchema = z.object({
  type: z.string(),
  startTime: z.number(),
  endTime: z.number().default(0),
  description: z.string().default(''),
});

const CrowdReactionSchema = z.object({
  type: z.string(),
  timestamp: z.number(),
  endTimestamp: z.number().default(0),
  description: z.string().default(''),
  timecode: z.string().default('00:00:00;00'),
});

const ChapterSummarySchema = z.object({
  index: z.number(),
  startTime: z.number(),
  endTime: z.number(),
  duration: z.number().default(0),
  timecode: z.string().default('00:00:00;00'),
  summary: z.string().default(''),
});

/**
 * A result document read back from storage. Documents written by older
 * layouts may lack the newer blocks, which default to empty.
 */
export const StoredAnalysisResultSchema = z.object({
  highlights: z.array(HighlightSchema).default([]),
  scenes: z.array(SceneSchema).default([]),
  crowdReactions: z.array(CrowdReactionSchema).default([]),
  chapters: z.array(ChapterSummarySchema).default([]),
  gameStats: z.object({
    totalGoals: z.number().default(0),
    totalPenalties: z.number().default(0),
    keyPlayers: z.array(z.string()).default([]),
    totalDuration: z.number().default(0),
    highlightsCount: z.number().default(0),
  }).default({}),
  gameContext: z.object({
    location: z.string().default(''),
    atmosphere: z.string().default(''),
    advertisements: z.array(z.string()).default([]),
  }).default({}),
  analysisConfidence: z.number().default(0),
  analysisTimestamp: z.string().default(''),
  error: z.string().optional(),
});
