/**
 * In-memory registry of video records.
 *
 * Process-lifetime only: records are never deleted and are lost on restart.
 * One instance is constructed at startup and handed to the app.
 */

import type { VideoRecord, VideoRecordUpdate, VideoStatus } from '../types/video.ts';

/** Input for registering a freshly issued upload. */
export interface CreateVideoInput {
  readonly videoId: string;
  readonly fileName: string;
  readonly contentType: string;
  readonly s3Uri: string;
  readonly s3Key: string;
}

/** Filter and pagination for listVideos. */
export interface ListVideosFilter {
  readonly status?: VideoStatus;
  readonly limit: number;
  readonly offset: number;
}

/** A page of records plus the total before pagination. */
export interface VideoPage {
  readonly videos: VideoRecord[];
  readonly total: number;
}

export class VideoStore {
  private readonly records = new Map<string, VideoRecord>();

  /** Registers a new record in status "uploaded". */
  create(input: CreateVideoInput, now: Date = new Date()): VideoRecord {
    const record: VideoRecord = {
      videoId: input.videoId,
      fileName: input.fileName,
      contentType: input.contentType,
      s3Uri: input.s3Uri,
      s3Key: input.s3Key,
      status: 'uploaded',
      uploadedAt: now.toISOString(),
      analysisStartedAt: null,
      analysisCompletedAt: null,
      processingDuration: null,
      errorMessage: null,
      invocationArn: null,
      projectArn: null,
    };
    this.records.set(record.videoId, record);
    return record;
  }

  find(videoId: string): VideoRecord | null {
    return this.records.get(videoId) ?? null;
  }

  /**
   * Replaces the stored record with one carrying the given fields.
   *
   * @returns The updated record, or null when the id is unknown
   */
  update(videoId: string, fields: VideoRecordUpdate): VideoRecord | null {
    const existing = this.records.get(videoId);
    if (!existing) return null;

    const updated: VideoRecord = { ...existing, ...fields };
    this.records.set(videoId, updated);
    return updated;
  }

  /** Lists records newest upload first, optionally filtered by status. */
  list(filter: ListVideosFilter): VideoPage {
    const matching = [...this.records.values()]
      .filter((record) => !filter.status || record.status === filter.status)
      .sort((a, b) => b.uploadedAt.localeCompare(a.uploadedAt));

    return {
      videos: matching.slice(filter.offset, filter.offset + filter.limit),
      total: matching.length,
    };
  }

  get size(): number {
    return this.records.size;
  }
}
