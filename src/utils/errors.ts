/**
 * Custom error classes with HTTP status codes for structured API responses.
 *
 * All errors produce an ErrorResponse-shaped JSON via toJSON(). Status codes
 * fall into three buckets: 400 for caller errors, 404 for missing resources,
 * 500 for everything else.
 */

import type { ErrorResponse } from '../types/api.ts';

/** HTTP status codes an AppError may carry. */
export type ErrorStatusCode = 400 | 404 | 500;

/** Base application error with HTTP status code and machine-readable code. */
export class AppError extends Error {
  readonly statusCode: ErrorStatusCode;
  readonly code: string;

  constructor(message: string, statusCode: ErrorStatusCode, code: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }

  /** Produces an ErrorResponse-compatible JSON object for API responses. */
  toJSON(): ErrorResponse {
    return { error: this.message };
  }
}

/** 400 Bad Request -- missing field, invalid input, or a request the video's state does not allow. */
export class ValidationError extends AppError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.details = details;
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/** 404 Not Found -- unknown video, session, or result document. */
export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND') {
    super(message, 404, code);
    this.name = 'NotFoundError';
  }
}

/** 404 Not Found -- conversation session does not exist or has ended. */
export class SessionNotFoundError extends NotFoundError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('Session not found', 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/** 500 -- a required environment value is missing or malformed. */
export class ConfigurationError extends AppError {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message, 500, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/** 500 -- the conversational agent path was used without an agent id. */
export class AgentNotConfiguredError extends AppError {
  constructor(message = 'Conversational agent ID not configured') {
    super(message, 500, 'AGENT_NOT_CONFIGURED');
    this.name = 'AgentNotConfiguredError';
  }
}

/** 500 -- the agent runtime rejected or broke off an invocation. */
export class AgentInvocationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'AGENT_INVOCATION_ERROR');
    this.name = 'AgentInvocationError';
  }
}

/** 500 -- storage or infrastructure failure. */
export class StorageError extends AppError {
  constructor(message = 'Storage operation failed') {
    super(message, 500, 'STORAGE_ERROR');
    this.name = 'StorageError';
  }
}

/** 500 -- the analysis service refused to start a job. */
export class JobSubmissionError extends AppError {
  constructor(message: string) {
    super(message, 500, 'JOB_SUBMISSION_ERROR');
    this.name = 'JobSubmissionError';
  }
}

/** 500 -- the analysis job reached a failed or cancelled state. */
export class JobFailedError extends AppError {
  readonly invocationArn: string;
  readonly jobStatus: string;

  constructor(invocationArn: string, jobStatus: string, message: string) {
    super(message, 500, 'JOB_FAILED');
    this.name = 'JobFailedError';
    this.invocationArn = invocationArn;
    this.jobStatus = jobStatus;
  }
}

/** 500 -- the analysis job did not finish within the poll ceiling. */
export class JobTimeoutError extends AppError {
  readonly invocationArn: string;
  readonly elapsedMs: number;

  constructor(invocationArn: string, elapsedMs: number) {
    super(`Analysis job timed out after ${Math.round(elapsedMs / 1000)} seconds`, 500, 'JOB_TIMEOUT');
    this.name = 'JobTimeoutError';
    this.invocationArn = invocationArn;
    this.elapsedMs = elapsedMs;
  }
}

/** 500 -- the job succeeded but its output documents could not be read. */
export class ResultRetrievalError extends AppError {
  constructor(message: string) {
    super(message, 500, 'RESULT_RETRIEVAL_ERROR');
    this.name = 'ResultRetrievalError';
  }
}

/** Extracts a printable message from an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
