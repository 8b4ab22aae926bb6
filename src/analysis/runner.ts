/**
 * Two-stage analysis job: submit, poll to completion, then fetch the output
 * documents the job-metadata file points at.
 */

import type { DataAutomationClient } from '../automation/client.ts';
import type { ObjectStore } from '../storage/object-store.ts';
import { buildJobOutputPrefix, formatS3Uri, parseS3Uri } from '../storage/paths.ts';
import { JobMetadataSchema, type RawAnalysisOutput } from './schemas.ts';
import { waitForJob, type PollOptions } from './poller.ts';
import { ResultRetrievalError, errorMessage } from '../utils/errors.ts';
import { generateJobName } from '../utils/ids.ts';
import { logInfo } from '../utils/log.ts';

/** Placeholder shipped in example env files; treated as unset. */
const PROJECT_ARN_PLACEHOLDER = 'your-project-arn-here';

export interface RunAnalysisJobDeps {
  readonly automation: DataAutomationClient;
  readonly store: ObjectStore;
}

export interface RunAnalysisJobInput {
  readonly s3Uri: string;
  readonly projectArn: string;
  readonly profileArn: string;
  readonly poll?: PollOptions;
  /** Called once the job is accepted, before the first poll. */
  readonly onSubmitted?: (invocationArn: string, outputS3Uri: string) => void | Promise<void>;
}

export interface AnalysisJobOutcome {
  readonly invocationArn: string;
  readonly outputS3Uri: string;
  readonly output: RawAnalysisOutput;
  readonly elapsedMs: number;
}

/**
 * Picks the analysis project: the caller's, else the configured default,
 * else the region's public default project.
 */
export function resolveProjectArn(
  requested: string | null | undefined,
  configured: string | null,
  region: string,
): string {
  if (requested) return requested;
  if (configured && configured !== PROJECT_ARN_PLACEHOLDER) return configured;
  return `arn:aws:bedrock:${region}:aws:data-automation-project/public-default`;
}

/**
 * Runs one analysis job to completion.
 *
 * @throws JobSubmissionError, JobFailedError, JobTimeoutError from submission and polling
 * @throws ResultRetrievalError when the finished job's output cannot be read
 */
export async function runAnalysisJob(
  deps: RunAnalysisJobDeps,
  input: RunAnalysisJobInput,
): Promise<AnalysisJobOutcome> {
  const outputS3Uri = formatS3Uri(deps.store.bucket, buildJobOutputPrefix(generateJobName()));

  const invocationArn = await deps.automation.startJob({
    inputS3Uri: input.s3Uri,
    outputS3Uri,
    projectArn: input.projectArn,
    profileArn: input.profileArn,
  });

  logInfo('analysis_job_started', {
    invocation_arn: invocationArn,
    project_arn: input.projectArn,
    input_s3_uri: input.s3Uri,
    output_s3_uri: outputS3Uri,
  });

  if (input.onSubmitted) {
    await input.onSubmitted(invocationArn, outputS3Uri);
  }

  const completed = await waitForJob(deps.automation, invocationArn, input.poll);

  if (!completed.outputS3Uri) {
    throw new ResultRetrievalError(`Analysis job ${invocationArn} reported no output location`);
  }

  const output = await fetchJobOutput(deps.store, completed.outputS3Uri);

  return { invocationArn, outputS3Uri, output, elapsedMs: completed.elapsedMs };
}

/**
 * Reads the job-metadata document and downloads the standard and custom
 * outputs it lists for the first segment.
 */
export async function fetchJobOutput(store: ObjectStore, metadataUri: string): Promise<RawAnalysisOutput> {
  const metadata = await readRequired(store, metadataUri, 'job metadata');
  const parsed = JobMetadataSchema.safeParse(metadata);

  if (!parsed.success) {
    throw new ResultRetrievalError(`Job metadata at ${metadataUri} has an unexpected shape`);
  }

  const segment = parsed.data.output_metadata?.[0]?.segment_metadata?.[0];
  const standardPath = segment?.standard_output_path;
  const customPath = segment?.custom_output_path;

  if (!standardPath && !customPath) {
    throw new ResultRetrievalError(`No output paths found in job metadata at ${metadataUri}`);
  }

  const output: { standardOutput?: unknown; customOutput?: unknown } = {};
  if (standardPath) {
    output.standardOutput = await readRequired(store, standardPath, 'standard output');
  }
  if (customPath) {
    output.customOutput = await readRequired(store, customPath, 'custom output');
  }

  logInfo('analysis_output_retrieved', {
    metadata_uri: metadataUri,
    has_standard_output: Boolean(standardPath),
    has_custom_output: Boolean(customPath),
  });

  return output;
}

/** Reads a document that must exist; every failure becomes a ResultRetrievalError. */
async function readRequired(store: ObjectStore, uri: string, label: string): Promise<unknown> {
  let document: unknown;
  try {
    document = await store.readJson(parseS3Uri(uri));
  } catch (error) {
    throw new ResultRetrievalError(`Failed to read ${label} at ${uri}: ${errorMessage(error)}`);
  }
  if (document === null) {
    throw new ResultRetrievalError(`No ${label} found at ${uri}`);
  }
  return document;
}
