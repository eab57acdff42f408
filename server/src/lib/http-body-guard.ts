import type { Context } from 'hono';

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)`, code: 'BODY_TOO_LARGE' }, 413);
}

/**
 * Reads a JSON request body while enforcing a byte budget on the actual stream,
 * so a missing or wrong Content-Length cannot bypass the limit.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: tooLarge(c, maxBytes) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (!contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.', code: 'UNSUPPORTED_MEDIA_TYPE' }, 415),
    };
  }

  const body = c.req.raw.body;
  if (!body) return { ok: true, data: {} };

  const reader = body.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let raw = '';

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      received += value.byteLength;
      if (received > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      raw += decoder.decode(value, { stream: true });
    }
    raw += decoder.decode();
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body', code: 'BODY_UNREADABLE' }, 400) };
  }

  if (!raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON', code: 'INVALID_JSON' }, 400) };
  }
}
