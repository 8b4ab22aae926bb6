/**
 * Analysis lifecycle for one video: mark processing, run the job, normalize,
 * store the result, and record the outcome on the VideoRecord.
 *
 * Sync and background modes share these steps; background mode runs
 * completeAnalysis inside an AnalysisTask.
 */

import type { AppDeps } from '../deps.ts';
import type { AnalysisResult } from '../types/analysis.ts';
import type { VideoRecord, VideoRecordUpdate } from '../types/video.ts';
import {
  analysisKeyCandidates,
  buildAnalysisKey,
  buildAnalysisMetadataKey,
  buildVideoMetadataKey,
} from '../storage/paths.ts';
import { normalizeAnalysis } from './normalizer.ts';
import { resolveProjectArn, runAnalysisJob } from './runner.ts';
import { StoredAnalysisResultSchema } from './schemas.ts';
import {
  JobFailedError,
  JobTimeoutError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors.ts';
import { logError, logInfo, logWarn } from '../utils/log.ts';

/** A finished analysis and the record it left behind. */
export interface CompletedAnalysis {
  readonly record: VideoRecord;
  readonly results: AnalysisResult;
}

/** Job bookkeeping written to metadata/analysis/<videoId>.json. */
interface AnalysisJobRecord {
  readonly videoId: string;
  readonly invocationArn: string | null;
  readonly projectArn: string;
  readonly outputS3Uri: string | null;
  readonly status: 'InProgress' | 'Success' | 'Failed';
  readonly startedAt: string;
  readonly completedAt: string | null;
  readonly errorMessage: string | null;
}

/**
 * Looks up the video and moves it to "processing".
 *
 * @throws NotFoundError for an unknown video
 * @throws ValidationError when an analysis is already running
 */
export async function startAnalysis(deps: AppDeps, videoId: string): Promise<VideoRecord> {
  const existing = deps.videos.find(videoId);

  if (!existing) {
    throw new NotFoundError('Video not found');
  }
  if (existing.status === 'processing') {
    throw new ValidationError('Video analysis already in progress');
  }

  const record = deps.videos.update(videoId, {
    status: 'processing',
    analysisStartedAt: new Date().toISOString(),
    analysisCompletedAt: null,
    processingDuration: null,
    errorMessage: null,
  });
  if (!record) {
    throw new NotFoundError('Video not found');
  }

  try {
    await persistVideoRecord(deps, record);
  } catch (error) {
    // No job runs for this record, so it must not stay in processing.
    deps.videos.update(videoId, {
      status: existing.status,
      analysisStartedAt: existing.analysisStartedAt,
      analysisCompletedAt: existing.analysisCompletedAt,
      processingDuration: existing.processingDuration,
      errorMessage: existing.errorMessage,
    });
    logError('analysis_start_failed', { video_id: videoId, error });
    throw error;
  }

  logInfo('analysis_started', { video_id: videoId, s3_uri: record.s3Uri });
  return record;
}

/**
 * Runs the job for a video already marked processing and records the outcome.
 * On failure the video is marked failed with the error's message and the
 * error is rethrown.
 */
export async function completeAnalysis(
  deps: AppDeps,
  record: VideoRecord,
  requestedProjectArn?: string | null,
): Promise<CompletedAnalysis> {
  const { config } = deps;
  const startedMs = Date.now();
  const startedAt = record.analysisStartedAt ?? new Date(startedMs).toISOString();
  const projectArn = resolveProjectArn(requestedProjectArn, config.projectArn, config.region);

  let invocationArn: string | null = null;
  let outputS3Uri: string | null = null;

  try {
    const outcome = await runAnalysisJob(
      { automation: deps.automation, store: deps.store },
      {
        s3Uri: record.s3Uri,
        projectArn,
        profileArn: config.profileArn,
        poll: {
          intervalMs: config.pollIntervalMs,
          timeoutMs: config.analysisTimeoutMs,
          sleep: deps.sleep,
        },
        onSubmitted: async (arn, outputUri) => {
          invocationArn = arn;
          outputS3Uri = outputUri;
          await updateVideo(deps, record.videoId, { invocationArn: arn, projectArn });
          await persistJobRecord(deps, {
            videoId: record.videoId,
            invocationArn: arn,
            projectArn,
            outputS3Uri: outputUri,
            status: 'InProgress',
            startedAt,
            completedAt: null,
            errorMessage: null,
          });
        },
      },
    );

    const results = normalizeAnalysis(outcome.output);
    await deps.store.writeJson(buildAnalysisKey(record.videoId), results);

    const completedAt = new Date().toISOString();
    const updated = await updateVideo(deps, record.videoId, {
      status: 'completed',
      analysisCompletedAt: completedAt,
      processingDuration: elapsedSeconds(startedMs),
      errorMessage: null,
    });
    await persistJobRecord(deps, {
      videoId: record.videoId,
      invocationArn: outcome.invocationArn,
      projectArn,
      outputS3Uri: outcome.outputS3Uri,
      status: 'Success',
      startedAt,
      completedAt,
      errorMessage: null,
    });

    logInfo('analysis_completed', {
      video_id: record.videoId,
      invocation_arn: outcome.invocationArn,
      highlights: results.highlights.length,
      processing_duration: updated.processingDuration,
    });

    return { record: updated, results };
  } catch (error) {
    const message = errorMessage(error);
    logError('analysis_failed', {
      video_id: record.videoId,
      invocation_arn: failedInvocationArn(error) ?? invocationArn ?? undefined,
      error: message,
    });
    await recordFailure(deps, record.videoId, message, {
      videoId: record.videoId,
      invocationArn,
      projectArn,
      outputS3Uri,
      status: 'Failed',
      startedAt,
      completedAt: new Date().toISOString(),
      errorMessage: message,
    });
    throw error;
  }
}

/**
 * Reads a stored result, trying the current key first and then the older
 * layouts in order. Unreadable or malformed candidates are logged and skipped.
 *
 * @returns The first result found, or null when none exists or the id cannot form a key
 */
export async function loadAnalysisResult(deps: AppDeps, videoId: string): Promise<AnalysisResult | null> {
  let keys: string[];
  try {
    keys = analysisKeyCandidates(videoId);
  } catch (error) {
    logWarn('analysis_result_key_invalid', { video_id: videoId, error });
    return null;
  }

  for (const key of keys) {
    let document: unknown;
    try {
      document = await deps.store.readJson({ bucket: deps.store.bucket, key });
    } catch (error) {
      logWarn('analysis_result_read_failed', { video_id: videoId, key, error });
      continue;
    }

    if (document === null) continue;

    const parsed = StoredAnalysisResultSchema.safeParse(document);
    if (!parsed.success) {
      logWarn('analysis_result_malformed', { video_id: videoId, key });
      continue;
    }

    return parsed.data;
  }

  return null;
}

/** Writes the video record to metadata/videos/<videoId>.json when enabled. */
export async function persistVideoRecord(deps: AppDeps, record: VideoRecord): Promise<void> {
  if (!deps.config.persistMetadata) return;
  await deps.store.writeJson(buildVideoMetadataKey(record.videoId), record);
}

async function persistJobRecord(deps: AppDeps, job: AnalysisJobRecord): Promise<void> {
  if (!deps.config.persistMetadata) return;
  await deps.store.writeJson(buildAnalysisMetadataKey(job.videoId), job);
}

/** Updates the registry, then mirrors the record to storage when enabled. */
async function updateVideo(deps: AppDeps, videoId: string, fields: VideoRecordUpdate): Promise<VideoRecord> {
  const updated = deps.videos.update(videoId, fields);
  if (!updated) {
    throw new NotFoundError('Video not found');
  }
  await persistVideoRecord(deps, updated);
  return updated;
}

/**
 * Marks the video failed. Metadata write failures here are logged rather
 * than thrown so the analysis error reaches the caller.
 */
async function recordFailure(
  deps: AppDeps,
  videoId: string,
  message: string,
  job: AnalysisJobRecord,
): Promise<void> {
  const updated = deps.videos.update(videoId, { status: 'failed', errorMessage: message });
  if (!updated) return;

  try {
    await persistVideoRecord(deps, updated);
    await persistJobRecord(deps, job);
  } catch (error) {
    logWarn('analysis_failure_metadata_write_failed', { video_id: videoId, error });
  }
}

function failedInvocationArn(error: unknown): string | null {
  if (error instanceof JobFailedError || error instanceof JobTimeoutError) {
    return error.invocationArn;
  }
  return null;
}

/** Seconds since `startedMs`, to two decimals. */
function elapsedSeconds(startedMs: number): number {
  return Math.round((Date.now() - startedMs) / 10) / 100;
}
