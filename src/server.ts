/**
 * Process entry point: load configuration, build the AWS-backed
 * collaborators, and serve the app on Node.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { S3Client } from '@aws-sdk/client-s3';
import { BedrockDataAutomationRuntimeClient } from '@aws-sdk/client-bedrock-data-automation-runtime';
import { BedrockAgentRuntimeClient } from '@aws-sdk/client-bedrock-agent-runtime';
import { createApp } from './index.ts';
import type { AppDeps } from './deps.ts';
import { loadConfig, type AppConfig } from './env.ts';
import { S3ObjectStore } from './storage/s3.ts';
import { VideoStore } from './storage/video-store.ts';
import { SessionStore } from './storage/session-store.ts';
import { BedrockDataAutomationClient } from './automation/bedrock.ts';
import { BedrockConversationalAgent } from './agent/bedrock.ts';
import { AnalysisTaskManager } from './analysis/tasks.ts';
import { ConfigurationError } from './utils/errors.ts';
import { logError, logInfo } from './utils/log.ts';

function buildDeps(config: AppConfig): AppDeps {
  const region = config.region;

  return {
    config,
    store: new S3ObjectStore(new S3Client({ region }), config.bucketName),
    videos: new VideoStore(),
    sessions: new SessionStore(),
    tasks: new AnalysisTaskManager(),
    automation: new BedrockDataAutomationClient(new BedrockDataAutomationRuntimeClient({ region })),
    agent: config.agentId
      ? new BedrockConversationalAgent(new BedrockAgentRuntimeClient({ region }), config.agentId, config.agentAliasId)
      : null,
  };
}

function main(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logError('configuration_invalid', { error: error.message, details: error.details });
      process.exit(1);
    }
    throw error;
  }

  const app = createApp(buildDeps(config));

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logInfo('server_started', {
      port: info.port,
      region: config.region,
      bucket: config.bucketName,
      analysis_mode: config.analysisMode,
      query_mode: config.queryMode,
      agent_configured: config.agentId !== null,
    });
  });
}

main();
