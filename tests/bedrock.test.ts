import { describe, it, expect, vi } from 'vitest';
import {
  BedrockDataAutomationRuntimeClient,
  GetDataAutomationStatusCommand,
  InvokeDataAutomationAsyncCommand,
} from '@aws-sdk/client-bedrock-data-automation-runtime';
import { BedrockAgentRuntimeClient, InvokeAgentCommand } from '@aws-sdk/client-bedrock-agent-runtime';
import { BedrockDataAutomationClient } from '../src/automation/bedrock.ts';
import { BedrockConversationalAgent } from '../src/agent/bedrock.ts';
import { collectReply } from '../src/agent/agent.ts';
import { AgentInvocationError, JobSubmissionError } from '../src/utils/errors.ts';

const CLIENT_CONFIG = {
  region: 'us-east-1',
  credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
};

function automationClient(send: (command: unknown) => Promise<unknown>) {
  const mock = vi.fn(send);
  return { client: Object.assign(new BedrockDataAutomationRuntimeClient(CLIENT_CONFIG), { send: mock }), send: mock };
}

function agentClient(send: (command: unknown) => Promise<unknown>) {
  const mock = vi.fn(send);
  return { client: Object.assign(new BedrockAgentRuntimeClient(CLIENT_CONFIG), { send: mock }), send: mock };
}

async function* completion(parts: Uint8Array[]) {
  for (const bytes of parts) {
    yield { chunk: { bytes } };
  }
}

describe('BedrockDataAutomationClient', () => {
  it('submits input, output, project and profile', async () => {
    const { client, send } = automationClient(async () => ({ invocationArn: 'arn:job-1' }));

    const arn = await new BedrockDataAutomationClient(client).startJob({
      inputS3Uri: 's3://test-bucket/videos/ns-1/clip.mp4',
      outputS3Uri: 's3://test-bucket/data-automation-results/run-1/',
      projectArn: 'arn:project',
      profileArn: 'arn:profile',
    });

    expect(arn).toBe('arn:job-1');
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(InvokeDataAutomationAsyncCommand);
    if (command instanceof InvokeDataAutomationAsyncCommand) {
      expect(command.input).toEqual({
        inputConfiguration: { s3Uri: 's3://test-bucket/videos/ns-1/clip.mp4' },
        outputConfiguration: { s3Uri: 's3://test-bucket/data-automation-results/run-1/' },
        dataAutomationConfiguration: { dataAutomationProjectArn: 'arn:project' },
        dataAutomationProfileArn: 'arn:profile',
      });
    }
  });

  it('wraps a rejected submission', async () => {
    const { client } = automationClient(async () => {
      throw new Error('ValidationException: bad profile');
    });

    const error = await new BedrockDataAutomationClient(client).startJob({
      inputS3Uri: 's3://a/b', outputS3Uri: 's3://a/c/', projectArn: 'p', profileArn: 'q',
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JobSubmissionError);
    expect(error).toMatchObject({ message: 'Failed to start analysis job: ValidationException: bad profile' });
  });

  it('fails a submission that returns no handle', async () => {
    const { client } = automationClient(async () => ({}));

    await expect(new BedrockDataAutomationClient(client).startJob({
      inputS3Uri: 's3://a/b', outputS3Uri: 's3://a/c/', projectArn: 'p', profileArn: 'q',
    })).rejects.toThrow('Analysis service returned no invocation ARN');
  });

  it('maps the job status', async () => {
    const { client, send } = automationClient(async () => ({
      status: 'Success',
      outputConfiguration: { s3Uri: 's3://test-bucket/out/job_metadata.json' },
    }));

    const status = await new BedrockDataAutomationClient(client).getJobStatus('arn:job-1');

    expect(status).toEqual({
      status: 'Success',
      outputS3Uri: 's3://test-bucket/out/job_metadata.json',
      errorMessage: undefined,
    });
    expect(send.mock.calls[0][0]).toBeInstanceOf(GetDataAutomationStatusCommand);
  });

  it('reports a missing status as Unknown', async () => {
    const { client } = automationClient(async () => ({}));

    await expect(new BedrockDataAutomationClient(client).getJobStatus('arn:job-1'))
      .resolves.toMatchObject({ status: 'Unknown' });
  });
});

describe('BedrockConversationalAgent', () => {
  const encoder = new TextEncoder();

  it('streams decoded chunks, joining characters split across chunks', async () => {
    const bytes = encoder.encode('Nice café save');
    const { client, send } = agentClient(async () => ({
      completion: completion([bytes.slice(0, 9), bytes.slice(9)]),
    }));
    const agent = new BedrockConversationalAgent(client, 'AGENT1', 'TSTALIASID');

    const reply = await collectReply(agent.invoke({
      sessionId: 's-1',
      inputText: 'How was the save?',
      sessionAttributes: { videoId: 'vid-1' },
    }));

    expect(reply).toBe('Nice café save');
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(InvokeAgentCommand);
    if (command instanceof InvokeAgentCommand) {
      expect(command.input).toEqual({
        agentId: 'AGENT1',
        agentAliasId: 'TSTALIASID',
        sessionId: 's-1',
        inputText: 'How was the save?',
        sessionState: { sessionAttributes: { videoId: 'vid-1' } },
      });
    }
  });

  it('omits session state when there are no attributes', async () => {
    const { client, send } = agentClient(async () => ({ completion: completion([encoder.encode('ok')]) }));

    await collectReply(new BedrockConversationalAgent(client, 'AGENT1', 'TSTALIASID').invoke({
      sessionId: 's-1',
      inputText: 'Hi',
    }));

    const command = send.mock.calls[0][0];
    if (command instanceof InvokeAgentCommand) {
      expect(command.input.sessionState).toBeUndefined();
    }
  });

  it('fails when the agent returns no stream', async () => {
    const { client } = agentClient(async () => ({}));

    await expect(collectReply(new BedrockConversationalAgent(client, 'AGENT1', 'TSTALIASID').invoke({
      sessionId: 's-1',
      inputText: 'Hi',
    }))).rejects.toThrow('Agent returned no completion stream');
  });

  it('wraps runtime errors', async () => {
    const { client } = agentClient(async () => {
      throw new Error('ThrottlingException');
    });

    const error = await collectReply(new BedrockConversationalAgent(client, 'AGENT1', 'TSTALIASID').invoke({
      sessionId: 's-1',
      inputText: 'Hi',
    })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentInvocationError);
    expect(error).toMatchObject({ message: 'Agent invocation failed: ThrottlingException' });
  });
});
