/**
 * Conversation session types.
 */

/** Speaker of a transcript entry. */
export type MessageRole = 'user' | 'assistant';

/** One entry in a session transcript. */
export interface SessionMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: string;
}

/** Stateful conversation, optionally scoped to one video. */
export interface ConversationSession {
  readonly sessionId: string;
  readonly videoId: string | null;
  readonly s3Uri: string | null;
  readonly createdAt: string;
  readonly messages: readonly SessionMessage[];
}
