import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { requestIdMiddleware } from '../middleware/request-id.js';

function createApp() {
  const app = new Hono();
  app.use('*', requestIdMiddleware);
  app.get('/id', (c) => {
    c.get('log').debug('request id probe');
    return c.json({ requestId: c.get('requestId') });
  });
  return app;
}

describe('requestIdMiddleware', () => {
  it('uses valid caller-provided request id', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'req-123_ABC' },
    });
    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-ID')).toBe('req-123_ABC');
    const body = await res.json() as { requestId: string };
    expect(body.requestId).toBe('req-123_ABC');
  });

  it('falls back to a generated UUID for invalid characters', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'bad id' },
    });
    expect(res.status).toBe(200);
    const echoed = res.headers.get('X-Request-ID') ?? '';
    expect(echoed).not.toBe('bad id');
    expect(echoed).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('mints an id when the header is missing', async () => {
    const res = await createApp().request('http://test/id');
    const body = await res.json() as { requestId: string };
    expect(body.requestId).toBe(res.headers.get('X-Request-ID'));
    expect(body.requestId).toHaveLength(36);
  });

  it('caps very long request ids to 64 chars', async () => {
    const res = await createApp().request('http://test/id', {
      headers: { 'X-Request-ID': 'a'.repeat(200) },
    });
    expect(res.headers.get('X-Request-ID')).toBe('a'.repeat(64));
  });
});
