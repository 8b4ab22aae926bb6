import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppDeps, AppEnv } from './deps.ts';
import { AppError } from './utils/errors.ts';
import { logError } from './utils/log.ts';
import { handleCreateUploadUrl } from './handlers/upload.ts';
import { handleAnalyzeVideo } from './handlers/analyze.ts';
import { handleGetResults, handleGetStatus } from './handlers/status.ts';
import { handleListVideos } from './handlers/videos.ts';
import {
  handleEndConversation,
  handleGetConversation,
  handleSendMessage,
  handleStartConversation,
} from './handlers/conversation.ts';
import { handleAsk, handleSearch, handleSummary } from './handlers/query.ts';
import { handleHealth, handleRoot } from './handlers/health.ts';

/**
 * Builds the HTTP app around an explicit set of collaborators.
 *
 * Every registry and client comes in through `deps`; nothing is module-global,
 * so each test can build an isolated app.
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  const origins = deps.config.corsOrigins;
  app.use('*', cors({
    origin: origins.includes('*') ? '*' : origins,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }));

  app.use('*', async (c, next) => {
    c.set('deps', deps);
    await next();
  });

  /** GET / and GET /health -- liveness and configuration overview */
  app.get('/', handleRoot);
  app.get('/health', handleHealth);

  /** POST /api/video/upload-url -- presigned upload URL + video registration */
  app.post('/api/video/upload-url', handleCreateUploadUrl);

  /** POST /api/video/analyze/:videoId -- run analysis (sync or background per ANALYSIS_MODE) */
  app.post('/api/video/analyze/:videoId', handleAnalyzeVideo);
  app.post('/api/analyze-video/:videoId', handleAnalyzeVideo);

  /** GET /api/video/status/:videoId and /api/video/results/:videoId */
  app.get('/api/video/status/:videoId', handleGetStatus);
  app.get('/api/video/results/:videoId', handleGetResults);

  /** GET /api/videos -- list tracked videos (paginated, filterable) */
  app.get('/api/videos', handleListVideos);

  /** Conversational agent sessions */
  app.post('/api/agent/conversation/start', handleStartConversation);
  app.post('/api/agent/conversation/message', handleSendMessage);
  app.post('/api/agent/conversation/end', handleEndConversation);
  app.get('/api/agent/conversation/:sessionId', handleGetConversation);

  /** Question answering over completed analyses */
  app.post('/api/query/ask', handleAsk);
  app.post('/api/query/search', handleSearch);
  app.get('/api/query/summary/:videoId', handleSummary);

  /**
   * AppError subclasses get their specific status code and toJSON().
   * Unknown errors become 500 with a generic message.
   */
  app.onError((error, c) => {
    if (error instanceof AppError) {
      if (error.statusCode === 500) {
        logError('request_failed', { path: c.req.path, code: error.code, error });
      }
      return c.json(error.toJSON(), error.statusCode);
    }
    logError('unhandled_error', { path: c.req.path, error });
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}
