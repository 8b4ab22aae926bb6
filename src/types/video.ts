/**
 * Video domain types for the in-process video registry.
 */

/** Lifecycle of an uploaded video: uploaded -> processing -> completed | failed. */
export type VideoStatus = 'uploaded' | 'processing' | 'completed' | 'failed';

/** All video statuses, in lifecycle order. */
export const VIDEO_STATUSES = ['uploaded', 'processing', 'completed', 'failed'] as const satisfies readonly VideoStatus[];

/** Full video record held by the VideoStore. */
export interface VideoRecord {
  readonly videoId: string;
  readonly fileName: string;
  readonly contentType: string;
  readonly s3Uri: string;
  readonly s3Key: string;
  readonly status: VideoStatus;
  readonly uploadedAt: string;
  readonly analysisStartedAt: string | null;
  readonly analysisCompletedAt: string | null;
  /** Wall time of the last analysis run, in seconds. */
  readonly processingDuration: number | null;
  readonly errorMessage: string | null;
  /** Handle of the last analysis job, for correlating with the analysis service's logs. */
  readonly invocationArn: string | null;
  readonly projectArn: string | null;
}

/** Fields that can change after the record is created. */
export type VideoRecordUpdate = Partial<
  Pick<
    VideoRecord,
    | 'status'
    | 'analysisStartedAt'
    | 'analysisCompletedAt'
    | 'processingDuration'
    | 'errorMessage'
    | 'invocationArn'
    | 'projectArn'
  >
>;
