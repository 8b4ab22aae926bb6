/**
 * Video status and result handlers.
 *
 * GET /api/video/status/:videoId  lifecycle fields, plus results once completed
 * GET /api/video/results/:videoId the stored AnalysisResult
 */

import type { Context } from 'hono';
import type { AppEnv } from '../deps.ts';
import type { VideoStatusResponse } from '../types/api.ts';
import type { VideoRecord } from '../types/video.ts';
import type { AnalysisResult } from '../types/analysis.ts';
import { loadAnalysisResult } from '../analysis/pipeline.ts';
import { NotFoundError } from '../utils/errors.ts';
import { routeParam } from './request.ts';

export async function handleGetStatus(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const videoId = routeParam(c, 'videoId');

  const record = deps.videos.find(videoId);
  if (!record) {
    throw new NotFoundError('Video not found');
  }

  const results = record.status === 'completed'
    ? await loadAnalysisResult(deps, videoId)
    : null;

  return c.json(buildStatusResponse(record, results), 200);
}

export async function handleGetResults(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const videoId = routeParam(c, 'videoId');

  const results = await loadAnalysisResult(deps, videoId);
  if (!results) {
    throw new NotFoundError('Analysis results not found');
  }

  return c.json(results, 200);
}

function buildStatusResponse(record: VideoRecord, results: AnalysisResult | null): VideoStatusResponse {
  return {
    videoId: record.videoId,
    fileName: record.fileName,
    status: record.status,
    s3Uri: record.s3Uri,
    uploadedAt: record.uploadedAt,
    analysisStartedAt: record.analysisStartedAt,
    analysisCompletedAt: record.analysisCompletedAt,
    processingDuration: record.processingDuration,
    errorMessage: record.errorMessage,
    ...(results ? { results } : {}),
  };
}
