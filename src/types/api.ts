/**
 * API request/response types for the REST endpoints.
 */

import type { VideoRecord, VideoStatus } from './video.ts';
import type { AnalysisResult } from './analysis.ts';
import type { SessionMessage } from './session.ts';

/** POST /api/video/upload-url response body. */
export interface UploadUrlResponse {
  readonly uploadUrl: string;
  readonly s3Uri: string;
  readonly videoId: string;
}

/** POST /api/video/analyze/:videoId response body in sync mode. */
export interface AnalysisCompletedResponse {
  readonly videoId: string;
  readonly status: 'completed';
  readonly results: AnalysisResult;
  readonly metadata: {
    readonly analysisTime: string;
    readonly processingDuration: number;
    readonly videoFileName: string;
  };
  readonly message: string;
}

/** POST /api/video/analyze/:videoId response body in background mode. */
export interface AnalysisAcceptedResponse {
  readonly videoId: string;
  readonly status: 'processing';
  readonly taskId: string;
  readonly message: string;
}

/** GET /api/video/status/:videoId response body. */
export interface VideoStatusResponse {
  readonly videoId: string;
  readonly fileName: string;
  readonly status: VideoStatus;
  readonly s3Uri: string;
  readonly uploadedAt: string;
  readonly analysisStartedAt: string | null;
  readonly analysisCompletedAt: string | null;
  readonly processingDuration: number | null;
  readonly errorMessage: string | null;
  readonly results?: AnalysisResult;
}

/** Pagination metadata for list endpoints. */
export interface Pagination {
  readonly limit: number;
  readonly offset: number;
  readonly total: number;
}

/** GET /api/videos response body. */
export interface VideoListResponse {
  readonly videos: VideoRecord[];
  readonly pagination: Pagination;
}

/** POST /api/agent/conversation/message response body. */
export interface AgentMessageResponse {
  readonly sessionId: string;
  readonly output: { readonly text: string };
}

/** GET /api/agent/conversation/:sessionId response body. */
export interface ConversationResponse {
  readonly sessionId: string;
  readonly videoId: string | null;
  readonly createdAt: string;
  readonly messages: readonly SessionMessage[];
}

/** A moment in the video that supports an answer. */
export interface RelevantTimestamp {
  /** Offset in seconds from the start of the video. */
  readonly timestamp: number;
  readonly description: string;
  readonly relevance: number;
}

/** POST /api/query/ask response body. */
export interface AskResponse {
  readonly videoId: string;
  readonly question: string;
  readonly answer: string;
  readonly confidence: number;
  readonly relevantTimestamps: RelevantTimestamp[];
  readonly relatedPlayers: string[];
}

/** Standard error response body. */
export interface ErrorResponse {
  readonly error: string;
  readonly details?: string;
}
