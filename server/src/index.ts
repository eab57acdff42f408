import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { loadKnowledgeBase } from './knowledge/knowledge-base.js';
import { loadConfig, type AppConfig, type ProviderName } from './lib/config.js';
import { createProviderClient } from './lib/llm.js';
import logger from './lib/logger.js';
import { getRedisClient, shutdownRedis } from './lib/redis-client.js';
import { RedisSessionStore } from './lib/redis-session-store.js';
import { captureError, flushSentry, initSentry } from './lib/sentry.js';
import { MemorySessionStore, type SessionStore } from './lib/session-store.js';
import { MarkdownArtifactRenderer } from './pipeline/artifact-renderer.js';
import { TextDocumentParser } from './pipeline/document-parser.js';
import { JobService } from './pipeline/job-service.js';
import { JobOrchestrator } from './pipeline/orchestrator.js';
import { MemoryJobQueue, RedisJobQueue, type JobQueue } from './pipeline/queue.js';
import { JobWorker } from './pipeline/worker.js';

export interface Runtime {
  config: AppConfig;
  store: SessionStore;
  queue: JobQueue;
  worker: JobWorker;
  app: ReturnType<typeof createApp>;
}

let shuttingDown = false;

/**
 * Wires store, queue, orchestrator, worker pool and HTTP app from config.
 * Without REDIS_URL everything runs in this process.
 */
export function createRuntime(config: AppConfig = loadConfig()): Runtime {
  const storeRedis = getRedisClient(config.redisUrl, 'store');
  const queueRedis = getRedisClient(config.redisUrl, 'queue');
  const blockingRedis = getRedisClient(config.redisUrl, 'queue-blocking');

  const store: SessionStore = storeRedis
    ? new RedisSessionStore(storeRedis, config.sessionTtlSeconds)
    : new MemorySessionStore(config.sessionTtlSeconds);
  const queue: JobQueue = queueRedis && blockingRedis
    ? new RedisJobQueue(queueRedis, blockingRedis)
    : new MemoryJobQueue();

  const configuredProviders = Object.keys(config.providers);
  const defaultProvider: ProviderName | null = config.providers[config.defaultProvider] ? config.defaultProvider : null;

  const orchestrator = new JobOrchestrator(
    {
      store,
      retriever: loadKnowledgeBase(),
      generator: createProviderClient(config),
      renderer: new MarkdownArtifactRenderer(config.outputDir),
      parser: new TextDocumentParser(config.maxDocumentBytes),
    },
    {
      questionConcurrency: config.questionConcurrency,
      concurrencyScope: config.questionConcurrencyScope,
      maxJobDurationMs: config.maxJobDurationMs,
      renderTimeoutMs: config.renderTimeoutMs,
      contextBudgetChars: config.contextBudgetChars,
      knowledgeTopK: config.knowledgeTopK,
      defaultProvider,
    },
  );
  const worker = new JobWorker(queue, orchestrator, store, { concurrency: config.workerConcurrency });
  const service = new JobService(store, queue, config.maxDocumentBytes);

  const app = createApp({
    service,
    maxCreateJobBodyBytes: config.maxCreateJobBodyBytes,
    health: {
      store: storeRedis ? 'redis' : 'memory',
      queue: queueRedis ? 'redis' : 'memory',
      configuredProviders,
      workerRunning: () => worker.running,
      isShuttingDown: () => shuttingDown,
    },
  });

  if (configuredProviders.length === 0) {
    logger.warn('No provider API keys configured; every question will fail until one is set');
  }

  return { config, store, queue, worker, app };
}

let server: ReturnType<typeof serve> | null = null;

function shutdown(runtime: Runtime, signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  const flushTasks = Promise.allSettled([
    runtime.worker.stop(),
    runtime.queue.close(),
  ]).then(() => Promise.allSettled([shutdownRedis(), flushSentry(2000)]))
    .then(() => {
      logger.info('Completed shutdown flush tasks');
    });

  server.close(() => {
    void Promise.race([
      flushTasks,
      new Promise((resolve) => setTimeout(resolve, 5_000)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Jobs in flight can run for minutes; stop waiting for them after 30s.
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 30_000).unref();
}

export function startServer(runtime: Runtime = createRuntime()) {
  if (server) return server;

  const { port } = runtime.config;
  logger.info({ port }, 'Answer pipeline server starting');
  runtime.worker.start();
  server = serve({ fetch: runtime.app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown(runtime, 'SIGTERM'));
  process.on('SIGINT', () => shutdown(runtime, 'SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown(runtime, 'UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown(runtime, 'UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  initSentry();
  startServer();
}
