import type { KnowledgeEntry, KnowledgeRetriever } from '../knowledge/knowledge-base.js';
import { errorMessage, isAbortError, JobTimeoutError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { QuestionOutcome, VisualElementSpec } from '../lib/session-store.js';
import { buildContext, buildPrompt, collectCitations } from './prompt.js';
import {
  STAGE_WEIGHTS,
  type AnswerGenerator,
  type ProgressSink,
  type QuestionStage,
  type QuestionTask,
} from './types.js';
import { detectVisualElements } from './visual-detection.js';

export interface QuestionPipelineDeps {
  retriever: KnowledgeRetriever;
  generator: AnswerGenerator;
  contextBudgetChars: number;
  knowledgeTopK: number;
  log: Logger;
}

function abortNote(signal: AbortSignal): string {
  return signal.reason instanceof JobTimeoutError
    ? 'Timed out before an answer was generated'
    : 'Cancelled before an answer was generated';
}

/**
 * Drives one question through knowledge_search → context_building →
 * answer_generation → visual_detection → citation_generation → complete.
 *
 * Generation problems end the question in `failed` and come back as an
 * outcome with `answer: null`; they never throw. Only a sink rejection
 * (progress could not be published) escapes.
 */
export async function runQuestionPipeline(
  task: QuestionTask,
  deps: QuestionPipelineDeps,
  sink: ProgressSink,
): Promise<QuestionOutcome> {
  const { index, question, language, signal } = task;
  const label = `question ${index + 1}`;
  const log = deps.log.child({ questionIndex: index });

  const enter = (stage: QuestionStage, message: string) =>
    sink.report(index, stage, STAGE_WEIGHTS[stage], message);

  const fail = async (note: string): Promise<QuestionOutcome> => {
    await enter('failed', `Failed ${label}: ${note}`);
    return { index, question, answer: null, error: note, visualElements: [], citations: [] };
  };

  if (signal?.aborted) return fail(abortNote(signal));
  if (!question.trim()) return fail('Question text is empty');

  await enter('knowledge_search', `Searching knowledge base for ${label}`);
  let entries: KnowledgeEntry[] = [];
  try {
    entries = await deps.retriever.search(question, language, deps.knowledgeTopK);
  } catch (err) {
    log.warn({ err: errorMessage(err) }, 'Knowledge search failed, continuing without context');
  }
  if (signal?.aborted) return fail(abortNote(signal));

  await enter('context_building', `Building context for ${label}`);
  const context = buildContext(entries, deps.contextBudgetChars);
  if (context.used.length < entries.length) {
    log.debug({ retrieved: entries.length, used: context.used.length }, 'Context trimmed to budget');
  }

  await enter('answer_generation', `Generating answer for ${label}`);
  let answer: string;
  try {
    answer = await deps.generator.generate(
      buildPrompt(question, context, language),
      language,
      task.providerPreference,
      signal,
    );
  } catch (err) {
    if (signal?.aborted) return fail(abortNote(signal));
    if (isAbortError(err)) return fail('Cancelled before an answer was generated');
    log.warn({ err: errorMessage(err) }, 'Answer generation failed');
    return fail(`Failed to generate answer: ${errorMessage(err)}`);
  }

  await enter('visual_detection', `Detecting visual elements for ${label}`);
  const visualElements: VisualElementSpec[] = detectVisualElements(question, answer);

  await enter('citation_generation', `Generating citations for ${label}`);
  const citations = collectCitations(context.used);

  await enter('complete', `Completed answer for ${label}`);
  return { index, question, answer, error: null, visualElements, citations };
}
