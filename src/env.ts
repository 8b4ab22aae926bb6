/**
 * Process configuration, read once at startup from environment variables.
 *
 * Required values fail fast with a ConfigurationError naming every missing
 * variable; nothing required is silently defaulted.
 */

import { z } from 'zod';
import { ConfigurationError } from './utils/errors.ts';

/** How POST /api/video/analyze runs the external job. */
export type AnalysisMode = 'sync' | 'background';

/** Which responder answers POST /api/query/ask. */
export type QueryMode = 'keyword' | 'agent';

/** Validated configuration handed to the app and its collaborators. */
export interface AppConfig {
  readonly region: string;
  readonly bucketName: string;
  /** Execution profile passed on every analysis job. */
  readonly profileArn: string;
  /** Default analysis project; null falls back to the region's public project. */
  readonly projectArn: string | null;
  readonly agentId: string | null;
  readonly agentAliasId: string;
  readonly analysisMode: AnalysisMode;
  readonly queryMode: QueryMode;
  readonly pollIntervalMs: number;
  readonly analysisTimeoutMs: number;
  /** Also write metadata/videos and metadata/analysis records to storage. */
  readonly persistMetadata: boolean;
  readonly corsOrigins: string[];
  readonly port: number;
}

/** Empty strings in .env files mean "not set". */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const requiredString = z.preprocess(blankToUndefined, z.string().trim());
const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const flag = z.preprocess(
  blankToUndefined,
  z.enum(['true', 'false', '1', '0']).default('false'),
).transform((value) => value === 'true' || value === '1');

/**
 * Zod schema for the process environment.
 *
 * Key order is the order missing variables are reported in.
 */
export const EnvSchema = z.object({
  AWS_REGION: requiredString,
  AWS_BUCKET_NAME: requiredString,
  DATA_AUTOMATION_PROFILE_ARN: requiredString,
  DATA_AUTOMATION_PROJECT_ARN: optionalString,
  BEDROCK_AGENT_ID: optionalString,
  BEDROCK_AGENT_ALIAS_ID: z.preprocess(blankToUndefined, z.string().default('TSTALIASID')),
  ANALYSIS_MODE: z.preprocess(blankToUndefined, z.enum(['sync', 'background']).default('sync')),
  QUERY_MODE: z.preprocess(blankToUndefined, z.enum(['keyword', 'agent']).default('keyword')),
  ANALYSIS_POLL_INTERVAL_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(30)),
  ANALYSIS_TIMEOUT_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(1800)),
  PERSIST_METADATA: flag,
  CORS_ORIGINS: z.preprocess(blankToUndefined, z.string().default('*')),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(8000)),
}).superRefine((env, ctx) => {
  if (env.QUERY_MODE === 'agent' && !env.BEDROCK_AGENT_ID) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['BEDROCK_AGENT_ID'],
      message: 'Required when QUERY_MODE=agent',
    });
  }
});

/**
 * Validates the environment and maps it to an AppConfig.
 *
 * @param env - Variables to read, normally process.env
 * @throws ConfigurationError listing missing or invalid variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const missing = result.error.issues
      .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
      .map((issue) => issue.path.join('.'));

    if (missing.length > 0) {
      throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`);
    }

    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('Invalid configuration', details);
  }

  const parsed = result.data;

  return {
    region: parsed.AWS_REGION,
    bucketName: parsed.AWS_BUCKET_NAME,
    profileArn: parsed.DATA_AUTOMATION_PROFILE_ARN,
    projectArn: parsed.DATA_AUTOMATION_PROJECT_ARN ?? null,
    agentId: parsed.BEDROCK_AGENT_ID ?? null,
    agentAliasId: parsed.BEDROCK_AGENT_ALIAS_ID,
    analysisMode: parsed.ANALYSIS_MODE,
    queryMode: parsed.QUERY_MODE,
    pollIntervalMs: parsed.ANALYSIS_POLL_INTERVAL_SECONDS * 1000,
    analysisTimeoutMs: parsed.ANALYSIS_TIMEOUT_SECONDS * 1000,
    persistMetadata: parsed.PERSIST_METADATA,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    port: parsed.PORT,
  };
}
