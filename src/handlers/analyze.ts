/**
 * POST /api/video/analyze/:videoId handler.
 *
 * In sync mode the request is held open until the job finishes and the
 * normalized result is returned (200). In background mode the job is handed
 * to the AnalysisTaskManager and the request returns 202 with a task id.
 * Exactly one mode is active per deployment.
 */

import type { Context } from 'hono';
import type { AppEnv } from '../deps.ts';
import type { AnalysisAcceptedResponse, AnalysisCompletedResponse } from '../types/api.ts';
import { AnalyzeRequestSchema, parseRequest } from '../utils/validation.ts';
import { completeAnalysis, startAnalysis } from '../analysis/pipeline.ts';
import { readJsonBody, routeParam } from './request.ts';

export async function handleAnalyzeVideo(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const videoId = routeParam(c, 'videoId');
  const body = parseRequest(AnalyzeRequestSchema, await readJsonBody(c), 'Invalid request body');

  const record = await startAnalysis(deps, videoId);

  if (deps.config.analysisMode === 'background') {
    const task = deps.tasks.dispatch(videoId, () => completeAnalysis(deps, record, body.projectArn));

    const accepted: AnalysisAcceptedResponse = {
      videoId,
      status: 'processing',
      taskId: task.taskId,
      message: 'Video analysis started. Poll /api/video/status/{videoId} for progress.',
    };
    return c.json(accepted, 202);
  }

  const { record: completed, results } = await completeAnalysis(deps, record, body.projectArn);

  const response: AnalysisCompletedResponse = {
    videoId,
    status: 'completed',
    results,
    metadata: {
      analysisTime: completed.analysisCompletedAt ?? new Date().toISOString(),
      processingDuration: completed.processingDuration ?? 0,
      videoFileName: completed.fileName,
    },
    message: 'Video analysis completed successfully',
  };
  return c.json(response, 200);
}
