/**
 * In-memory registry of conversation sessions. Sessions live until ended.
 */

import type { ConversationSession, SessionMessage } from '../types/session.ts';

export interface CreateSessionInput {
  readonly sessionId: string;
  readonly videoId: string | null;
  readonly s3Uri: string | null;
}

export class SessionStore {
  private readonly sessions = new Map<string, ConversationSession>();

  create(input: CreateSessionInput, now: Date = new Date()): ConversationSession {
    const session: ConversationSession = {
      sessionId: input.sessionId,
      videoId: input.videoId,
      s3Uri: input.s3Uri,
      createdAt: now.toISOString(),
      messages: [],
    };
    this.sessions.set(session.sessionId, session);
    return session;
  }

  find(sessionId: string): ConversationSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  /**
   * Appends transcript entries in order.
   *
   * @returns The updated session, or null when the id is unknown
   */
  appendMessages(sessionId: string, messages: readonly SessionMessage[]): ConversationSession | null {
    const existing = this.sessions.get(sessionId);
    if (!existing) return null;

    const updated: ConversationSession = {
      ...existing,
      messages: [...existing.messages, ...messages],
    };
    this.sessions.set(sessionId, updated);
    return updated;
  }

  /** Removes a session. Returns false when it was already gone. */
  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
