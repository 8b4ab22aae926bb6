import { describe, it, expect } from 'vitest';
import { createApp } from '../src/index.ts';
import { FakeAgent, bodyOf, makeDeps, seedVideo } from './fakes.ts';

describe('app skeleton', () => {
  it('GET / reports the service as healthy', async () => {
    const res = await createApp(makeDeps()).request('/');

    expect(res.status).toBe(200);
    expect(await bodyOf(res)).toEqual({ message: 'Gameplay Analysis API', status: 'healthy' });
  });

  it('GET /health reports configuration and registry sizes', async () => {
    const deps = makeDeps({ agent: new FakeAgent([]), config: { projectArn: 'arn:project' } });
    seedVideo(deps, 'vid-1');
    seedVideo(deps, 'vid-2');
    deps.sessions.create({ sessionId: 's-1', videoId: null, s3Uri: null });

    const res = await createApp(deps).request('/health');
    const body = await bodyOf(res);

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: 'healthy',
      version: '2.0.0',
      analysisMode: 'sync',
      queryMode: 'keyword',
      services: {
        storage: { bucket: 'test-bucket', region: 'us-east-1' },
        dataAutomation: { profileConfigured: true, projectConfigured: true },
        agent: { configured: true },
      },
      videosTracked: 2,
      activeSessions: 1,
      runningTasks: 0,
    });
    expect(typeof body.timestamp).toBe('string');
  });

  it('returns JSON 404 for unknown routes', async () => {
    const res = await createApp(makeDeps()).request('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(await bodyOf(res)).toEqual({ error: 'Not found' });
  });

  it('allows any origin by default', async () => {
    const res = await createApp(makeDeps()).request('/', { headers: { Origin: 'http://localhost:3000' } });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
  });

  it('echoes a configured origin', async () => {
    const app = createApp(makeDeps({ config: { corsOrigins: ['http://localhost:3000'] } }));

    const res = await app.request('/', { headers: { Origin: 'http://localhost:3000' } });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:3000');
  });
});
