import { describe, it, expect, vi } from 'vitest';
import type { KnowledgeEntry, KnowledgeRetriever } from '../knowledge/knowledge-base.js';
import { AllProvidersExhaustedError, JobTimeoutError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { runQuestionPipeline, type QuestionPipelineDeps } from '../pipeline/question-pipeline.js';
import type { AnswerGenerator, ProgressSink, QuestionStage, QuestionTask } from '../pipeline/types.js';

const ENTRY: KnowledgeEntry = {
  id: 'physics_001',
  subject: 'science',
  topic: "Newton's Laws of Motion",
  content: 'Force equals mass times acceleration.',
  language: 'en',
  references: ['Principia Mathematica', 'Physics Textbook'],
};

interface Report {
  index: number;
  stage: QuestionStage;
  weight: number;
  message: string;
}

function recordingSink() {
  const reports: Report[] = [];
  const sink: ProgressSink = {
    report: async (index, stage, weight, message) => {
      reports.push({ index, stage, weight, message });
    },
  };
  return { sink, reports };
}

function makeDeps(overrides: Partial<QuestionPipelineDeps> = {}): QuestionPipelineDeps {
  return {
    retriever: { search: async () => [ENTRY] },
    generator: { generate: async () => 'Apply the process in three steps.' },
    contextBudgetChars: 6000,
    knowledgeTopK: 5,
    log: logger,
    ...overrides,
  };
}

function task(overrides: Partial<QuestionTask> = {}): QuestionTask {
  return { index: 0, question: 'What is force?', language: 'en', providerPreference: null, ...overrides };
}

describe('runQuestionPipeline', () => {
  it('walks every stage once and builds the outcome', async () => {
    const { sink, reports } = recordingSink();

    const outcome = await runQuestionPipeline(task({ index: 2 }), makeDeps(), sink);

    expect(reports.map((r) => [r.stage, r.weight])).toEqual([
      ['knowledge_search', 10],
      ['context_building', 20],
      ['answer_generation', 40],
      ['visual_detection', 70],
      ['citation_generation', 90],
      ['complete', 100],
    ]);
    expect(reports[0]?.message).toBe('Searching knowledge base for question 3');
    expect(reports[5]?.message).toBe('Completed answer for question 3');
    expect(outcome).toEqual({
      index: 2,
      question: 'What is force?',
      answer: 'Apply the process in three steps.',
      error: null,
      visualElements: [{ kind: 'flowchart', caption: 'Flowchart for: What is force?' }],
      citations: ['Principia Mathematica', 'Physics Textbook'],
    });
  });

  it('passes the prompt, language and provider preference to the generator', async () => {
    const generate = vi.fn<AnswerGenerator['generate']>(async () => 'Antwort');
    const { sink } = recordingSink();

    await runQuestionPipeline(
      task({ question: 'Was ist Kraft?', language: 'de', providerPreference: 'anthropic' }),
      makeDeps({ generator: { generate } }),
      sink,
    );

    const [prompt, language, preference] = generate.mock.calls[0] ?? [];
    expect(prompt).toContain('Please provide your answer in German (Deutsch).');
    expect(prompt).toContain("1. Newton's Laws of Motion (science):");
    expect(prompt).toContain('\nQuestion: Was ist Kraft?\n');
    expect(language).toBe('de');
    expect(preference).toBe('anthropic');
  });

  it('still answers with empty citations when retrieval finds nothing', async () => {
    const generate = vi.fn<AnswerGenerator['generate']>(async () => 'General answer');
    const { sink } = recordingSink();

    const outcome = await runQuestionPipeline(task(), makeDeps({ retriever: { search: async () => [] }, generator: { generate } }), sink);

    expect(outcome.answer).toBe('General answer');
    expect(outcome.citations).toEqual([]);
    expect(generate.mock.calls[0]?.[0]).toContain('No specialized educational materials were found for this topic.');
  });

  it('continues without context when the retriever fails', async () => {
    const retriever: KnowledgeRetriever = {
      search: async () => {
        throw new Error('index offline');
      },
    };
    const { sink, reports } = recordingSink();

    const outcome = await runQuestionPipeline(task(), makeDeps({ retriever }), sink);

    expect(outcome.error).toBeNull();
    expect(outcome.citations).toEqual([]);
    expect(reports.at(-1)?.stage).toBe('complete');
  });

  it('ends in failed when every provider is exhausted', async () => {
    const generator: AnswerGenerator = {
      generate: async () => {
        throw new AllProvidersExhaustedError([{ provider: 'openai', error: 'boom' }]);
      },
    };
    const { sink, reports } = recordingSink();

    const outcome = await runQuestionPipeline(task(), makeDeps({ generator }), sink);

    const note = 'Failed to generate answer: All providers failed to generate an answer (openai: boom)';
    expect(outcome).toEqual({
      index: 0,
      question: 'What is force?',
      answer: null,
      error: note,
      visualElements: [],
      citations: [],
    });
    expect(reports.map((r) => r.stage)).toEqual(['knowledge_search', 'context_building', 'answer_generation', 'failed']);
    expect(reports[3]).toEqual({ index: 0, stage: 'failed', weight: 100, message: `Failed question 1: ${note}` });
  });

  it('fails empty questions without searching', async () => {
    const search = vi.fn<KnowledgeRetriever['search']>(async () => []);
    const { sink, reports } = recordingSink();

    const outcome = await runQuestionPipeline(task({ question: '   ' }), makeDeps({ retriever: { search } }), sink);

    expect(outcome.error).toBe('Question text is empty');
    expect(search).not.toHaveBeenCalled();
    expect(reports).toEqual([{ index: 0, stage: 'failed', weight: 100, message: 'Failed question 1: Question text is empty' }]);
  });

  it('marks the question timed out when the job deadline aborts generation', async () => {
    const controller = new AbortController();
    const generator: AnswerGenerator = {
      generate: (_prompt, _language, _preference, signal) => new Promise<string>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')), { once: true });
        controller.abort(new JobTimeoutError('session-1', 10));
      }),
    };
    const { sink, reports } = recordingSink();

    const outcome = await runQuestionPipeline(task({ signal: controller.signal }), makeDeps({ generator }), sink);

    expect(outcome.error).toBe('Timed out before an answer was generated');
    expect(reports.at(-1)?.stage).toBe('failed');
  });

  it('does not start a question whose job was already cancelled', async () => {
    const controller = new AbortController();
    controller.abort(new Error('store down'));
    const { sink, reports } = recordingSink();

    const outcome = await runQuestionPipeline(task({ signal: controller.signal }), makeDeps(), sink);

    expect(outcome.error).toBe('Cancelled before an answer was generated');
    expect(reports.map((r) => r.stage)).toEqual(['failed']);
  });

  it('propagates a sink failure', async () => {
    const sink: ProgressSink = {
      report: async () => {
        throw new Error('store unavailable');
      },
    };

    await expect(runQuestionPipeline(task(), makeDeps(), sink)).rejects.toThrow('store unavailable');
  });
});
