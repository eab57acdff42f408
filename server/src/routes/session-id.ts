import type { Context, Next } from 'hono';
import { z } from 'zod';

const sessionIdSchema = z.string().uuid();

/** Rejects any `:sessionId` that is not a UUID before it reaches the store. */
export async function sessionIdGuard(c: Context, next: Next) {
  const parsed = sessionIdSchema.safeParse(c.req.param('sessionId'));
  if (!parsed.success) {
    return c.json({ error: 'Invalid session id', code: 'INVALID_SESSION_ID' }, 400);
  }
  await next();
}
