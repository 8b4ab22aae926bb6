/**
 * GET / and GET /health handlers.
 */

import type { Context } from 'hono';
import type { AppEnv } from '../deps.ts';

export const API_VERSION = '2.0.0';

export async function handleRoot(c: Context<AppEnv>): Promise<Response> {
  return c.json({ message: 'Gameplay Analysis API', status: 'healthy' }, 200);
}

export async function handleHealth(c: Context<AppEnv>): Promise<Response> {
  const deps = c.get('deps');
  const { config } = deps;

  return c.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    version: API_VERSION,
    analysisMode: config.analysisMode,
    queryMode: config.queryMode,
    services: {
      storage: { bucket: config.bucketName, region: config.region },
      dataAutomation: { profileConfigured: true, projectConfigured: config.projectArn !== null },
      agent: { configured: deps.agent !== null },
    },
    videosTracked: deps.videos.size,
    activeSessions: deps.sessions.size,
    runningTasks: deps.tasks.running().length,
  }, 200);
}
