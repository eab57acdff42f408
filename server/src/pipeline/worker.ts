import {
  AlreadyRunningError,
  AlreadyTerminalError,
  NotFoundError,
  errorMessage,
} from '../lib/errors.js';
import logger from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import type { SessionStore } from '../lib/session-store.js';
import { jobPayloadSchema, payloadSessionSchema, toJobInput } from './job-payload.js';
import type { JobOrchestrator, JobSummary } from './orchestrator.js';
import type { JobQueue, QueuedJob } from './queue.js';

const DEQUEUE_ERROR_BACKOFF_MS = 1_000;

export type JobHandlingOutcome =
  | { kind: 'processed'; summary: JobSummary }
  | { kind: 'duplicate'; reason: string }
  | { kind: 'expired' }
  | { kind: 'malformed'; sessionId: string | null }
  | { kind: 'failed'; error: string };

export interface JobWorkerOptions {
  concurrency: number;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Pool of N consumer loops. Each loop owns one job at a time from dequeue to
 * ack; the orchestrator's session claim makes redeliveries harmless.
 */
export class JobWorker {
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    private readonly queue: JobQueue,
    private readonly orchestrator: JobOrchestrator,
    private readonly store: SessionStore,
    private readonly options: JobWorkerOptions,
  ) {}

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    const count = Math.max(1, this.options.concurrency);
    this.loops = Array.from({ length: count }, (_, slot) => this.loop(slot, controller.signal));
    logger.info({ concurrency: count }, 'Job worker started');
  }

  /** Stops taking new jobs and waits for the ones in hand to finish. */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    await Promise.allSettled(this.loops);
    this.loops = [];
    this.controller = null;
    logger.info('Job worker stopped');
  }

  private async loop(slot: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let job: QueuedJob | null;
      try {
        job = await this.queue.dequeue(signal);
      } catch (err) {
        logger.warn({ slot, err: errorMessage(err) }, 'Dequeue failed, backing off');
        await sleep(DEQUEUE_ERROR_BACKOFF_MS, signal);
        continue;
      }
      if (!job) continue;

      try {
        await this.handle(job);
      } catch (err) {
        logger.error({ slot, jobId: job.id, err: errorMessage(err) }, 'Job handling failed unexpectedly');
        captureError(err, { jobId: job.id });
      }
    }
  }

  /** Processes one delivery and acks it. Exposed for direct use in tests and tools. */
  async handle(job: QueuedJob): Promise<JobHandlingOutcome> {
    const outcome = await this.process(job);
    await this.queue.ack(job);
    return outcome;
  }

  private async process(job: QueuedJob): Promise<JobHandlingOutcome> {
    const parsed = jobPayloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      const readable = payloadSessionSchema.safeParse(job.payload);
      const sessionId = readable.success ? readable.data.sessionId : null;
      logger.error(
        { jobId: job.id, sessionId, issues: parsed.error.issues.slice(0, 5) },
        'Malformed job payload, dropping',
      );
      if (sessionId) await this.markSessionFailed(sessionId);
      return { kind: 'malformed', sessionId };
    }

    const { sessionId } = parsed.data;
    try {
      const summary = await this.orchestrator.run(toJobInput(parsed.data));
      return { kind: 'processed', summary };
    } catch (err) {
      if (err instanceof AlreadyRunningError || err instanceof AlreadyTerminalError) {
        logger.info({ jobId: job.id, sessionId, redelivered: job.redelivered, reason: err.code }, 'Duplicate job delivery ignored');
        return { kind: 'duplicate', reason: err.code };
      }
      if (err instanceof NotFoundError) {
        logger.warn({ jobId: job.id, sessionId }, 'Session expired before its job started');
        return { kind: 'expired' };
      }
      logger.error({ jobId: job.id, sessionId, err: errorMessage(err) }, 'Job could not be started');
      captureError(err, { sessionId, jobId: job.id });
      return { kind: 'failed', error: errorMessage(err) };
    }
  }

  private async markSessionFailed(sessionId: string): Promise<void> {
    try {
      await this.store.setStatus(sessionId, 'ERROR');
      const last = await this.store.latestProgress(sessionId);
      await this.store.appendProgress({
        sessionId,
        stage: 'error',
        progress: last.progress,
        message: 'Processing failed: job payload was unreadable',
      });
    } catch (err) {
      logger.warn({ sessionId, err: errorMessage(err) }, 'Could not mark session failed for malformed job');
    }
  }
}
