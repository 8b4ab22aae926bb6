import {
  BedrockAgentRuntimeClient,
  InvokeAgentCommand,
} from '@aws-sdk/client-bedrock-agent-runtime';
import type { ConversationalAgent, InvokeAgentInput } from './agent.ts';
import { AgentInvocationError, errorMessage } from '../utils/errors.ts';

/** ConversationalAgent backed by a Bedrock agent alias. */
export class BedrockConversationalAgent implements ConversationalAgent {
  private readonly client: BedrockAgentRuntimeClient;
  private readonly agentId: string;
  private readonly agentAliasId: string;

  constructor(client: BedrockAgentRuntimeClient, agentId: string, agentAliasId: string) {
    this.client = client;
    this.agentId = agentId;
    this.agentAliasId = agentAliasId;
  }

  async *invoke(input: InvokeAgentInput): AsyncIterable<string> {
    const decoder = new TextDecoder('utf-8');

    try {
      const response = await this.client.send(new InvokeAgentCommand({
        agentId: this.agentId,
        agentAliasId: this.agentAliasId,
        sessionId: input.sessionId,
        inputText: input.inputText,
        ...(input.sessionAttributes
          ? { sessionState: { sessionAttributes: input.sessionAttributes } }
          : {}),
      }));

      if (!response.completion) {
        throw new AgentInvocationError('Agent returned no completion stream');
      }

      for await (const event of response.completion) {
        const bytes = event.chunk?.bytes;
        if (bytes) {
          yield decoder.decode(bytes, { stream: true });
        }
      }

      const tail = decoder.decode();
      if (tail) yield tail;
    } catch (error) {
      if (error instanceof AgentInvocationError) throw error;
      throw new AgentInvocationError(`Agent invocation failed: ${errorMessage(error)}`);
    }
  }
}
