import { Hono } from 'hono';
import { z } from 'zod';
import { providerNameSchema } from '../lib/config.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { SUPPORTED_LANGUAGES } from '../lib/languages.js';
import { documentInputSchema } from '../pipeline/job-payload.js';
import type { JobService } from '../pipeline/job-service.js';
import { sessionIdGuard } from './session-id.js';

const createJobSchema = z.object({
  language: z.string().trim().toLowerCase().default('en'),
  metadata: z.record(z.unknown()).default({}),
  questions: z.array(z.string().trim().min(1).max(20_000)).min(1).max(500).optional(),
  document: documentInputSchema.optional(),
  provider: providerNameSchema.nullable().optional(),
}).refine((body) => (body.questions === undefined) !== (body.document === undefined), {
  message: 'Provide either questions or document, not both',
});

export function createJobRoutes(service: JobService, maxBodyBytes: number): Hono {
  const jobs = new Hono();

  jobs.post('/jobs', async (c) => {
    const body = await parseJsonBodyWithLimit(c, maxBodyBytes);
    if (!body.ok) return body.response;

    const parsed = createJobSchema.safeParse(body.data);
    if (!parsed.success) {
      return c.json({
        error: 'Invalid request',
        code: 'VALIDATION_FAILED',
        details: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      }, 400);
    }

    const { language, metadata, questions, document, provider } = parsed.data;
    const created = await service.createJob({
      language,
      metadata,
      questions,
      document,
      providerPreference: provider ?? null,
    });
    c.get('log').info({ sessionId: created.sessionId }, 'Job created');
    return c.json({ session_id: created.sessionId, status: created.status }, 202);
  });

  jobs.get('/status/:sessionId', sessionIdGuard, async (c) => {
    const view = await service.status(c.req.param('sessionId'));
    c.header('Cache-Control', 'no-store');
    return c.json({
      session_id: view.sessionId,
      status: view.status,
      progress: view.progress,
      stage: view.stage,
      message: view.message,
      answers: view.answers,
      updated_at: view.updatedAt,
    });
  });

  jobs.get('/result/:sessionId', sessionIdGuard, async (c) => {
    const view = await service.result(c.req.param('sessionId'));
    return c.json({
      session_id: view.sessionId,
      artifact_ref: view.artifactRef,
      success: view.success,
      language: view.language,
      totals: view.totals,
      outcomes: view.outcomes,
      completed_at: view.completedAt,
    });
  });

  jobs.get('/languages', (c) => {
    c.header('Cache-Control', 'public, max-age=3600');
    return c.json({ languages: Object.values(SUPPORTED_LANGUAGES) });
  });

  return jobs;
}
