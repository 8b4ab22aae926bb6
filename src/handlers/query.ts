/**
 * Question answering over a completed analysis.
 *
 * POST /api/query/ask              keyword responder or agent, per QUERY_MODE
 * POST /api/query/search           free-text search over actions and events
 * GET  /api/query/summary/:videoId whole-video summary
 */

import type { Context } from 'hono';
import type { AppDeps, AppEnv } from '../deps.ts';
import type { AskResponse } from '../types/api.ts';
import type { AskRequest } from '../utils/validation.ts';
import {
  AskRequestSchema,
  SearchRequestSchema,
  SummaryQuerySchema,
  parseRequest,
} from '../utils/validation.ts';
import { loadAnalysisResult } from '../analysis/pipeline.ts';
import { buildQueryContext, type QueryContext } from '../query/context.ts';
import { answerQuestion } from '../query/keyword-responder.ts';
import { searchContent } from '../query/search.ts';
import { generateSummary } from '../query/summary.ts';
import { collectReply } from '../agent/agent.ts';
import { buildAgentPrompt, extractRelatedPlayers, extractRelevantTimestamps } from '../agent/context.ts';
import { AgentNotConfiguredError, NotFoundError, ValidationError } from '../utils/errors.ts';
import { generateSessionId } from '../utils/ids.ts';
import { logError, logInfo } from '../utils/log.ts';
import { queryParams, readJsonBody, routeParam } from './request.ts';

/** Confidence reported for agent-written answers. */
const AGENT_ANSWER_CONFIDENCE = 0.9;

export async function handleAsk(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const body = parseRequest(AskRequestSchema, await readJsonBody(c), 'Invalid request body');

  const ctx = await loadQueryContext(deps, body.videoId);

  const response = deps.config.queryMode === 'agent'
    ? await askAgent(deps, body, ctx)
    : askKeywords(body, ctx);

  logInfo('question_answered', {
    video_id: body.videoId,
    mode: deps.config.queryMode,
    confidence: response.confidence,
  });
  return c.json(response, 200);
}

export async function handleSearch(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const body = parseRequest(SearchRequestSchema, await readJsonBody(c), 'Invalid request body');

  const ctx = await loadQueryContext(deps, body.videoId);
  const outcome = searchContent(ctx, body.searchQuery, body.searchType);

  return c.json({
    videoId: body.videoId,
    searchQuery: body.searchQuery,
    results: outcome.results,
    totalResults: outcome.total,
  }, 200);
}

export async function handleSummary(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const videoId = routeParam(c, 'videoId');
  const query = parseRequest(SummaryQuerySchema, queryParams(c), 'Invalid query parameters');

  const ctx = await loadQueryContext(deps, videoId);

  return c.json({
    videoId,
    summaryType: query.summaryType,
    ...generateSummary(ctx, query.summaryType),
  }, 200);
}

/**
 * Loads the analysis behind a question.
 *
 * @throws NotFoundError for an unknown video or a missing result document
 * @throws ValidationError when the video's analysis has not completed
 */
async function loadQueryContext(deps: AppDeps, videoId: string): Promise<QueryContext> {
  const video = deps.videos.find(videoId);
  if (!video) {
    throw new NotFoundError('Video not found');
  }
  if (video.status !== 'completed') {
    throw new ValidationError(`Video analysis not completed (status: ${video.status})`);
  }

  const result = await loadAnalysisResult(deps, videoId);
  if (!result) {
    throw new NotFoundError('Analysis results not found');
  }

  return buildQueryContext(result);
}

function askKeywords(body: AskRequest, ctx: QueryContext): AskResponse {
  const answer = answerQuestion(body.question, ctx, body.responseFormat);

  return {
    videoId: body.videoId,
    question: body.question,
    answer: answer.answer,
    confidence: answer.confidence,
    relevantTimestamps: answer.timestamps,
    relatedPlayers: answer.players,
  };
}

async function askAgent(deps: AppDeps, body: AskRequest, ctx: QueryContext): Promise<AskResponse> {
  if (!deps.agent) {
    throw new AgentNotConfiguredError();
  }

  const sessionId = body.sessionId ?? generateSessionId();

  let answer: string;
  try {
    answer = await collectReply(deps.agent.invoke({
      sessionId,
      inputText: buildAgentPrompt(body.question, ctx),
    }));
  } catch (error) {
    logError('agent_question_failed', { video_id: body.videoId, session_id: sessionId, error });
    throw error;
  }

  return {
    videoId: body.videoId,
    question: body.question,
    answer,
    confidence: AGENT_ANSWER_CONFIDENCE,
    relevantTimestamps: extractRelevantTimestamps(ctx, body.question),
    relatedPlayers: extractRelatedPlayers(ctx, body.question),
  };
}
