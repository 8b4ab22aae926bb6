/**
 * Narrow interface to the external conversational agent.
 *
 * BedrockConversationalAgent is the production implementation; tests inject
 * fakes that yield scripted chunks.
 */

export interface InvokeAgentInput {
  /** Agent-side session id; reusing it keeps the agent's own memory of the conversation. */
  readonly sessionId: string;
  readonly inputText: string;
  /** Conversation-scoped state sent alongside the message. */
  readonly sessionAttributes?: Record<string, string>;
}

export interface ConversationalAgent {
  /** Streams the reply as text chunks, in arrival order. */
  invoke(input: InvokeAgentInput): AsyncIterable<string>;
}

/** Concatenates every chunk of a streamed reply. */
export async function collectReply(chunks: AsyncIterable<string>): Promise<string> {
  let reply = '';
  for await (const chunk of chunks) {
    reply += chunk;
  }
  return reply;
}
