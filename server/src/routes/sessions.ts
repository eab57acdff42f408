import { Hono } from 'hono';
import type { JobService } from '../pipeline/job-service.js';
import { sessionIdGuard } from './session-id.js';

export function createSessionRoutes(service: JobService): Hono {
  const sessions = new Hono();

  sessions.get('/:sessionId/progress', sessionIdGuard, async (c) => {
    const events = await service.progress(c.req.param('sessionId'));
    c.header('Cache-Control', 'no-store');
    return c.json({ session_id: c.req.param('sessionId'), events });
  });

  sessions.delete('/:sessionId', sessionIdGuard, async (c) => {
    const sessionId = c.req.param('sessionId');
    const deleted = await service.deleteSession(sessionId);
    if (!deleted) {
      return c.json({ error: `Session ${sessionId} not found or expired`, code: 'NOT_FOUND' }, 404);
    }
    return c.json({ session_id: sessionId, deleted: true });
  });

  return sessions;
}
