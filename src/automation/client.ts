/**
 * Narrow interface to the managed video-analysis (data automation) service.
 *
 * BedrockDataAutomationClient is the production implementation; tests inject
 * scripted fakes.
 */

/** Parameters for one analysis job submission. */
export interface StartJobInput {
  /** s3:// URI of the uploaded video. */
  readonly inputS3Uri: string;
  /** s3:// prefix the service writes its output under. */
  readonly outputS3Uri: string;
  readonly projectArn: string;
  readonly profileArn: string;
}

/**
 * Status of a submitted job as reported by the service.
 *
 * Known values are Created, InProgress, Success, ServiceError and ClientError;
 * anything else is passed through untouched.
 */
export interface JobStatus {
  readonly status: string;
  /** s3:// URI of the job-metadata document, set once the job has output. */
  readonly outputS3Uri?: string;
  readonly errorMessage?: string;
}

export interface DataAutomationClient {
  /**
   * Submits a job.
   *
   * @returns The invocation ARN identifying the job
   */
  startJob(input: StartJobInput): Promise<string>;

  getJobStatus(invocationArn: string): Promise<JobStatus>;
}
