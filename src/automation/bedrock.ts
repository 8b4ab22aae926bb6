import {
  BedrockDataAutomationRuntimeClient,
  GetDataAutomationStatusCommand,
  InvokeDataAutomationAsyncCommand,
} from '@aws-sdk/client-bedrock-data-automation-runtime';
import type { DataAutomationClient, JobStatus, StartJobInput } from './client.ts';
import { JobSubmissionError, errorMessage } from '../utils/errors.ts';

/** DataAutomationClient backed by the Bedrock Data Automation runtime API. */
export class BedrockDataAutomationClient implements DataAutomationClient {
  private readonly client: BedrockDataAutomationRuntimeClient;

  constructor(client: BedrockDataAutomationRuntimeClient) {
    this.client = client;
  }

  async startJob(input: StartJobInput): Promise<string> {
    let invocationArn: string | undefined;

    try {
      const response = await this.client.send(new InvokeDataAutomationAsyncCommand({
        inputConfiguration: { s3Uri: input.inputS3Uri },
        outputConfiguration: { s3Uri: input.outputS3Uri },
        dataAutomationConfiguration: { dataAutomationProjectArn: input.projectArn },
        dataAutomationProfileArn: input.profileArn,
      }));
      invocationArn = response.invocationArn;
    } catch (error) {
      throw new JobSubmissionError(`Failed to start analysis job: ${errorMessage(error)}`);
    }

    if (!invocationArn) {
      throw new JobSubmissionError('Analysis service returned no invocation ARN');
    }

    return invocationArn;
  }

  async getJobStatus(invocationArn: string): Promise<JobStatus> {
    const response = await this.client.send(new GetDataAutomationStatusCommand({ invocationArn }));

    return {
      status: response.status ?? 'Unknown',
      outputS3Uri: response.outputConfiguration?.s3Uri,
      errorMessage: response.errorMessage,
    };
  }
}
