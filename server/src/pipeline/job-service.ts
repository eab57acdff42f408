import type { ProviderName } from '../lib/config.js';
import {
  FileTooLargeError,
  NotReadyError,
  StoreUnavailableError,
  UnsupportedLanguageError,
  errorMessage,
} from '../lib/errors.js';
import { isSupportedLanguage, LANGUAGE_CODES } from '../lib/languages.js';
import logger from '../lib/logger.js';
import type {
  AnswerPreview,
  ProgressEvent,
  ProgressStage,
  QuestionOutcome,
  SessionStatus,
  SessionStore,
} from '../lib/session-store.js';
import type { JobQueue } from './queue.js';
import type { DocumentInput } from './types.js';

export interface CreateJobInput {
  language: string;
  metadata?: Record<string, unknown>;
  questions?: string[];
  document?: DocumentInput;
  providerPreference?: ProviderName | null;
}

export interface StatusView {
  sessionId: string;
  status: SessionStatus;
  progress: number;
  stage: ProgressStage;
  message: string;
  answers: AnswerPreview[];
  updatedAt: string | null;
}

export interface ResultView {
  sessionId: string;
  artifactRef: string | null;
  success: boolean;
  language: string;
  totals: { questions: number; answered: number; failed: number };
  outcomes: QuestionOutcome[];
  completedAt: string;
}

export function statusMessage(status: SessionStatus, stage: ProgressStage): string {
  switch (status) {
    case 'COMPLETE':
      return 'Processing complete. Answer document is ready for download.';
    case 'ERROR':
      return 'An error occurred during processing. Please try again.';
    case 'PROCESSING':
      return `Processing in progress: ${stage}`;
    case 'PENDING':
      return 'Waiting to start processing';
  }
}

/**
 * The operations the HTTP surface exposes: create a job, observe it, fetch
 * its artifact reference, drop it.
 */
export class JobService {
  constructor(
    private readonly store: SessionStore,
    private readonly queue: JobQueue,
    private readonly maxDocumentBytes: number,
  ) {}

  async createJob(input: CreateJobInput): Promise<{ sessionId: string; status: SessionStatus }> {
    if (!isSupportedLanguage(input.language)) {
      throw new UnsupportedLanguageError(input.language, LANGUAGE_CODES);
    }
    const language = input.language;
    if (input.document) {
      const size = Buffer.byteLength(input.document.content, 'utf8');
      if (size > this.maxDocumentBytes) throw new FileTooLargeError(size, this.maxDocumentBytes);
    }

    const session = await this.store.create(language, {
      ...input.metadata,
      ...(input.document?.filename ? { filename: input.document.filename } : {}),
      source: input.document ? input.document.format : 'questions',
      ...(input.questions ? { questionCount: input.questions.length } : {}),
    });

    try {
      await this.queue.enqueue({
        sessionId: session.id,
        language,
        providerPreference: input.providerPreference ?? null,
        questions: input.questions,
        document: input.document,
      });
    } catch (err) {
      logger.error({ sessionId: session.id, err: errorMessage(err) }, 'Failed to enqueue job');
      await this.store.setStatus(session.id, 'ERROR').catch((markErr: unknown) => {
        logger.warn({ sessionId: session.id, err: errorMessage(markErr) }, 'Could not mark unqueued session failed');
      });
      throw new StoreUnavailableError('enqueue', err);
    }

    logger.info({ sessionId: session.id, language }, 'Job accepted');
    return { sessionId: session.id, status: session.status };
  }

  /**
   * COMPLETE always reads as 100; any other status reads at most 99, so 100
   * is never observed before the Result exists.
   */
  async status(sessionId: string): Promise<StatusView> {
    const latest = await this.store.latestProgress(sessionId);
    const answers = await this.store.listAnswers(sessionId);
    const complete = latest.status === 'COMPLETE';
    const stage: ProgressStage = complete ? 'complete' : latest.stage;
    return {
      sessionId,
      status: latest.status,
      progress: complete ? 100 : Math.min(99, latest.progress),
      stage,
      message: statusMessage(latest.status, stage),
      answers,
      updatedAt: latest.timestamp,
    };
  }

  async result(sessionId: string): Promise<ResultView> {
    const session = await this.store.get(sessionId);
    if (session.status !== 'COMPLETE') throw new NotReadyError(sessionId, session.status);
    const result = await this.store.getResult(sessionId);
    if (!result) throw new NotReadyError(sessionId, session.status);
    return {
      sessionId,
      artifactRef: result.artifactRef,
      success: result.success,
      language: result.language,
      totals: result.totals,
      outcomes: result.outcomes,
      completedAt: result.completedAt,
    };
  }

  async progress(sessionId: string): Promise<ProgressEvent[]> {
    return this.store.listProgress(sessionId);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const removed = await this.store.delete(sessionId);
    if (removed) logger.info({ sessionId }, 'Session deleted');
    return removed;
  }
}
