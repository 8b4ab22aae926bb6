/**
 * Fixed-interval poll loop over an analysis job's status.
 *
 * Polls once immediately, then after every interval, until the job succeeds,
 * fails, or the elapsed wait reaches the ceiling. Elapsed time is the sum of
 * the intervals slept, so an injected sleep gives deterministic timing.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { DataAutomationClient, JobStatus } from '../automation/client.ts';
import { JobFailedError, JobTimeoutError, errorMessage } from '../utils/errors.ts';
import { logInfo, logWarn } from '../utils/log.ts';

/** Default poll cadence: 30 seconds. */
export const DEFAULT_POLL_INTERVAL_MS = 30_000;

/** Default poll ceiling: 30 minutes. */
export const DEFAULT_POLL_TIMEOUT_MS = 30 * 60_000;

const PENDING_STATUSES = new Set(['Created', 'InProgress']);
const FAILED_STATUSES = new Set(['Failed', 'Cancelled', 'ClientError', 'ServiceError']);

export type Sleep = (ms: number) => Promise<void>;

export interface PollOptions {
  readonly intervalMs?: number;
  readonly timeoutMs?: number;
  readonly sleep?: Sleep;
}

/** A job that reached Success. */
export interface CompletedJob {
  readonly invocationArn: string;
  readonly outputS3Uri?: string;
  /** Total time slept between polls. */
  readonly elapsedMs: number;
  readonly polls: number;
}

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Waits for a job to reach a terminal state.
 *
 * @throws JobFailedError when the job fails or a status call throws
 * @throws JobTimeoutError when the job is still pending at the ceiling
 */
export async function waitForJob(
  client: DataAutomationClient,
  invocationArn: string,
  options: PollOptions = {},
): Promise<CompletedJob> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const sleep = options.sleep ?? defaultSleep;

  let elapsedMs = 0;
  let polls = 0;

  for (;;) {
    let current: JobStatus;
    try {
      current = await client.getJobStatus(invocationArn);
    } catch (error) {
      throw new JobFailedError(
        invocationArn,
        'Unknown',
        `Failed to read analysis job status: ${errorMessage(error)}`,
      );
    }
    polls += 1;

    if (current.status === 'Success') {
      logInfo('analysis_job_succeeded', { invocation_arn: invocationArn, elapsed_ms: elapsedMs, polls });
      return { invocationArn, outputS3Uri: current.outputS3Uri, elapsedMs, polls };
    }

    if (FAILED_STATUSES.has(current.status)) {
      throw new JobFailedError(
        invocationArn,
        current.status,
        current.errorMessage ?? `Analysis job ended with status ${current.status}`,
      );
    }

    if (!PENDING_STATUSES.has(current.status)) {
      logWarn('analysis_job_unexpected_status', { invocation_arn: invocationArn, status: current.status });
    }

    if (elapsedMs >= timeoutMs) {
      throw new JobTimeoutError(invocationArn, elapsedMs);
    }

    logInfo('analysis_job_polling', {
      invocation_arn: invocationArn,
      status: current.status,
      elapsed_ms: elapsedMs,
      timeout_ms: timeoutMs,
    });

    await sleep(intervalMs);
    elapsedMs += intervalMs;
  }
}
