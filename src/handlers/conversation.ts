/**
 * Conversation handlers: a thin façade over the external agent.
 *
 * POST /api/agent/conversation/start      open a session, optionally bound to a video
 * POST /api/agent/conversation/message    relay a message and return the agent's reply
 * POST /api/agent/conversation/end        discard a session (idempotent)
 * GET  /api/agent/conversation/:sessionId session and transcript
 */

import type { Context } from 'hono';
import type { AppEnv } from '../deps.ts';
import type { AgentMessageResponse, ConversationResponse } from '../types/api.ts';
import { collectReply } from '../agent/agent.ts';
import {
  EndConversationSchema,
  SendMessageSchema,
  StartConversationSchema,
  parseRequest,
} from '../utils/validation.ts';
import { AgentNotConfiguredError, SessionNotFoundError } from '../utils/errors.ts';
import { generateSessionId } from '../utils/ids.ts';
import { logError, logInfo, logWarn } from '../utils/log.ts';
import { readJsonBody, routeParam } from './request.ts';

export async function handleStartConversation(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const body = parseRequest(StartConversationSchema, await readJsonBody(c), 'Invalid request body');

  let s3Uri: string | null = null;
  if (body.videoId) {
    const video = deps.videos.find(body.videoId);
    if (video) {
      s3Uri = video.s3Uri;
    } else {
      // The session keeps the id but carries no video context to the agent.
      logWarn('conversation_video_unknown', { video_id: body.videoId });
    }
  }

  const session = deps.sessions.create({
    sessionId: generateSessionId(),
    videoId: body.videoId ?? null,
    s3Uri,
  });

  logInfo('conversation_started', { session_id: session.sessionId, video_id: session.videoId ?? undefined });
  return c.json({ sessionId: session.sessionId }, 200);
}

export async function handleSendMessage(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const body = parseRequest(SendMessageSchema, await readJsonBody(c), 'Invalid request body');

  const session = deps.sessions.find(body.sessionId);
  if (!session) {
    throw new SessionNotFoundError(body.sessionId);
  }
  if (!deps.agent) {
    throw new AgentNotConfiguredError();
  }

  const sentAt = new Date().toISOString();
  const sessionAttributes = session.videoId && session.s3Uri
    ? { videoS3Uri: session.s3Uri, videoId: session.videoId }
    : undefined;

  let reply: string;
  try {
    reply = await collectReply(deps.agent.invoke({
      sessionId: session.sessionId,
      inputText: body.message,
      sessionAttributes,
    }));
  } catch (error) {
    logError('agent_invocation_failed', { session_id: session.sessionId, video_id: session.videoId ?? undefined, error });
    throw error;
  }

  deps.sessions.appendMessages(session.sessionId, [
    { role: 'user', content: body.message, timestamp: sentAt },
    { role: 'assistant', content: reply, timestamp: new Date().toISOString() },
  ]);

  const response: AgentMessageResponse = { sessionId: session.sessionId, output: { text: reply } };
  return c.json(response, 200);
}

export async function handleEndConversation(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const body = parseRequest(EndConversationSchema, await readJsonBody(c), 'Invalid request body');

  if (deps.sessions.delete(body.sessionId)) {
    logInfo('conversation_ended', { session_id: body.sessionId });
  }

  return c.json({ message: 'Conversation ended' }, 200);
}

export async function handleGetConversation(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const sessionId = routeParam(c, 'sessionId');

  const session = deps.sessions.find(sessionId);
  if (!session) {
    throw new SessionNotFoundError(sessionId);
  }

  const response: ConversationResponse = {
    sessionId: session.sessionId,
    videoId: session.videoId,
    createdAt: session.createdAt,
    messages: session.messages,
  };
  return c.json(response, 200);
}
