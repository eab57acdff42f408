import type { KnowledgeRetriever } from '../knowledge/knowledge-base.js';
import type { ConcurrencyScope, ProviderName } from '../lib/config.js';
import { errorMessage, JobTimeoutError, NoQuestionsFoundError, RenderTimeoutError } from '../lib/errors.js';
import { createSessionLogger, type Logger } from '../lib/logger.js';
import { captureError } from '../lib/sentry.js';
import type { QuestionOutcome, Result, SessionStore } from '../lib/session-store.js';
import { createConcurrencyLimiter, type ConcurrencyLimiter } from './concurrency.js';
import { ProgressAggregator } from './progress.js';
import { runQuestionPipeline } from './question-pipeline.js';
import type {
  AnswerGenerator,
  ArtifactRenderer,
  DocumentParser,
  JobInput,
  ProgressSink,
  QuestionStage,
  RenderInput,
} from './types.js';

const DEFAULT_RENDER_TIMEOUT_MS = 60_000;

export interface OrchestratorOptions {
  questionConcurrency: number;
  concurrencyScope: ConcurrencyScope;
  maxJobDurationMs: number;
  contextBudgetChars: number;
  knowledgeTopK: number;
  defaultProvider: ProviderName | null;
  /** Bound on the renderer call; the job deadline does not cover finalization. */
  renderTimeoutMs?: number;
}

export interface OrchestratorDeps {
  store: SessionStore;
  retriever: KnowledgeRetriever;
  generator: AnswerGenerator;
  renderer: ArtifactRenderer;
  parser: DocumentParser;
}

export interface JobSummary {
  sessionId: string;
  status: 'COMPLETE' | 'ERROR';
  questions: number;
  answered: number;
  failed: number;
  artifactRef: string | null;
  error?: string;
}

/**
 * Runs one job end to end: claim, parse, fan out questions under the
 * concurrency limit, aggregate progress, finalize.
 *
 * A duplicate run is rejected by the claim and leaves the session untouched.
 * Per-question failures are recorded in the Result; anything else that goes
 * wrong after the claim moves the session to ERROR.
 */
export class JobOrchestrator {
  private readonly sharedLimiter: ConcurrencyLimiter | null;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.sharedLimiter = options.concurrencyScope === 'global'
      ? createConcurrencyLimiter(options.questionConcurrency)
      : null;
  }

  async run(input: JobInput): Promise<JobSummary> {
    const { sessionId } = input;
    // Rejections here (AlreadyRunning, AlreadyTerminal, NotFound) propagate untouched.
    await this.deps.store.claim(sessionId);

    const log = createSessionLogger(sessionId, { language: input.language });
    const controller = new AbortController();
    const timer = setTimeout(() => {
      log.warn({ maxJobDurationMs: this.options.maxJobDurationMs }, 'Job exceeded maximum duration, aborting open questions');
      controller.abort(new JobTimeoutError(sessionId, this.options.maxJobDurationMs));
    }, this.options.maxJobDurationMs);
    timer.unref?.();

    const started = Date.now();
    try {
      const questions = await this.resolveQuestions(input, log);
      const outcomes = await this.runQuestions(input, questions, controller, log);
      const summary = await this.finalize(input, outcomes, log);
      log.info({ ...summary, durationMs: Date.now() - started }, 'Job complete');
      return summary;
    } catch (err) {
      controller.abort(err);
      return this.failJob(sessionId, err, log);
    } finally {
      clearTimeout(timer);
    }
  }

  private async resolveQuestions(input: JobInput, log: Logger): Promise<string[]> {
    if (input.questions) {
      if (input.questions.length === 0) throw new NoQuestionsFoundError();
      return input.questions;
    }
    if (!input.document) throw new NoQuestionsFoundError();

    await this.deps.store.appendProgress({
      sessionId: input.sessionId,
      stage: 'parsing',
      progress: 0,
      message: 'Parsing input document',
    });
    const questions = this.deps.parser.parse(input.document);
    log.info({ questions: questions.length, format: input.document.format }, 'Document parsed');
    return questions;
  }

  private async runQuestions(
    input: JobInput,
    questions: string[],
    controller: AbortController,
    log: Logger,
  ): Promise<QuestionOutcome[]> {
    const { store } = this.deps;
    const { sessionId } = input;
    const total = questions.length;
    const aggregator = new ProgressAggregator(total);
    const limit = this.sharedLimiter ?? createConcurrencyLimiter(this.options.questionConcurrency);

    const sink: ProgressSink = {
      report: async (index: number, stage: QuestionStage, weight: number, message: string) => {
        aggregator.update(index, weight);
        await store.appendProgress({
          sessionId,
          stage,
          progress: aggregator.inFlight(),
          message: `Question ${index + 1}/${total}: ${message}`,
        });
      },
    };

    const pipelineDeps = {
      retriever: this.deps.retriever,
      generator: this.deps.generator,
      contextBudgetChars: this.options.contextBudgetChars,
      knowledgeTopK: this.options.knowledgeTopK,
      log,
    };

    const tasks = questions.map((question, index) => limit(async () => {
      const outcome = await runQuestionPipeline(
        {
          index,
          question,
          language: input.language,
          providerPreference: input.providerPreference ?? this.options.defaultProvider,
          signal: controller.signal,
        },
        pipelineDeps,
        sink,
      );
      await store.recordAnswer(sessionId, {
        index,
        question,
        answer: outcome.answer,
        error: outcome.error,
        visualElementCount: outcome.visualElements.length,
        timestamp: new Date().toISOString(),
      });
      return outcome;
    }).catch((err: unknown) => {
      // A store failure in one question stops the siblings as well.
      controller.abort(err);
      throw err;
    }));

    const settled = await Promise.allSettled(tasks);
    const outcomes: QuestionOutcome[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') throw result.reason;
      outcomes.push(result.value);
    }
    return outcomes;
  }

  private async finalize(input: JobInput, outcomes: QuestionOutcome[], log: Logger): Promise<JobSummary> {
    const { store } = this.deps;
    const { sessionId } = input;
    const answered = outcomes.filter((o) => o.answer !== null).length;
    const failed = outcomes.length - answered;

    const before = await store.latestProgress(sessionId);
    await store.appendProgress({
      sessionId,
      stage: 'rendering',
      progress: Math.min(99, before.progress),
      message: 'Rendering answer document',
    });
    const artifactRef = await this.renderWithDeadline({ sessionId, language: input.language, outcomes });

    const result: Result = {
      sessionId,
      success: answered > 0,
      language: input.language,
      artifactRef,
      outcomes,
      totals: { questions: outcomes.length, answered, failed },
      completedAt: new Date().toISOString(),
    };

    await store.storeResult(sessionId, result);
    await store.setStatus(sessionId, 'COMPLETE');
    try {
      await store.appendProgress({
        sessionId,
        stage: 'complete',
        progress: 100,
        message: 'Processing complete',
      });
    } catch (err) {
      // The session is already COMPLETE; status readers report 100 from the status alone.
      log.warn({ err: errorMessage(err) }, 'Final progress event could not be recorded');
    }

    if (failed > 0) log.warn({ failed, answered }, 'Job completed with failed questions');
    return { sessionId, status: 'COMPLETE', questions: outcomes.length, answered, failed, artifactRef };
  }

  private async renderWithDeadline(input: RenderInput): Promise<string | null> {
    const ms = this.options.renderTimeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const err = new RenderTimeoutError(input.sessionId, ms);
        controller.abort(err);
        reject(err);
      }, ms);
    });
    try {
      return await Promise.race([this.deps.renderer.render({ ...input, signal: controller.signal }), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async failJob(sessionId: string, err: unknown, log: Logger): Promise<JobSummary> {
    const message = errorMessage(err);
    log.error({ err: message }, 'Job failed');
    captureError(err, { sessionId, stage: 'orchestrator' });

    try {
      await this.deps.store.setStatus(sessionId, 'ERROR');
      const last = await this.deps.store.latestProgress(sessionId);
      await this.deps.store.appendProgress({
        sessionId,
        stage: 'error',
        progress: last.progress,
        message: `Processing failed: ${message}`,
      });
    } catch (recordErr) {
      log.error({ err: errorMessage(recordErr) }, 'Could not record job failure');
    }

    return { sessionId, status: 'ERROR', questions: 0, answered: 0, failed: 0, artifactRef: null, error: message };
  }
}
