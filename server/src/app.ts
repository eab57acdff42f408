import { Hono } from 'hono';
import { AppError } from './lib/errors.js';
import logger from './lib/logger.js';
import { captureError } from './lib/sentry.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import type { JobService } from './pipeline/job-service.js';
import { createJobRoutes } from './routes/jobs.js';
import { createSessionRoutes } from './routes/sessions.js';

export interface HealthProbe {
  store: 'memory' | 'redis';
  queue: 'memory' | 'redis';
  configuredProviders: string[];
  workerRunning: () => boolean;
  isShuttingDown: () => boolean;
}

export interface AppDeps {
  service: JobService;
  health: HealthProbe;
  maxCreateJobBodyBytes: number;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (deps.health.isShuttingDown() && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const { health } = deps;
    const draining = health.isShuttingDown();
    const degraded = health.configuredProviders.length === 0 || !health.workerRunning();
    return c.json({
      status: draining ? 'draining' : degraded ? 'degraded' : 'ok',
      shutting_down: draining,
      store: health.store,
      queue: health.queue,
      providers: health.configuredProviders,
      worker_running: health.workerRunning(),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api', createJobRoutes(deps.service, deps.maxCreateJobBodyBytes));
  app.route('/api/sessions', createSessionRoutes(deps.service));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    if (err instanceof AppError) {
      if (err.httpStatus >= 500) {
        logger.error({ err, code: err.code, requestId }, 'Request failed');
        captureError(err, { path: c.req.path, method: c.req.method, requestId });
      }
      return c.json({ error: err.message, code: err.code, request_id: requestId }, { status: err.httpStatus });
    }
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
