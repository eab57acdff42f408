import type { ProviderName } from '../lib/config.js';
import type { LanguageCode } from '../lib/languages.js';
import type { QuestionOutcome } from '../lib/session-store.js';

/** Per-question stages in execution order, plus the terminal failure state. */
export type QuestionStage =
  | 'knowledge_search'
  | 'context_building'
  | 'answer_generation'
  | 'visual_detection'
  | 'citation_generation'
  | 'complete'
  | 'failed';

/** Cumulative progress a question has reached once it enters the stage. */
export const STAGE_WEIGHTS: Record<QuestionStage, number> = {
  knowledge_search: 10,
  context_building: 20,
  answer_generation: 40,
  visual_detection: 70,
  citation_generation: 90,
  complete: 100,
  // A failed question is finished; it counts as fully processed.
  failed: 100,
};

/**
 * Receives every stage transition of every question exactly once.
 * A rejection means progress could not be published and is a job-level failure.
 */
export interface ProgressSink {
  report(index: number, stage: QuestionStage, weight: number, message: string): Promise<void>;
}

/** The single capability the pipeline needs from the provider client. */
export interface AnswerGenerator {
  generate(
    prompt: string,
    language: LanguageCode,
    preference?: ProviderName | null,
    signal?: AbortSignal,
  ): Promise<string>;
}

export interface QuestionTask {
  index: number;
  question: string;
  language: LanguageCode;
  providerPreference: ProviderName | null;
  signal?: AbortSignal;
}

export interface DocumentInput {
  format: string;
  content: string;
  filename?: string;
}

export interface JobInput {
  sessionId: string;
  questions?: string[];
  document?: DocumentInput;
  language: LanguageCode;
  providerPreference?: ProviderName | null;
}

export interface RenderInput {
  sessionId: string;
  language: LanguageCode;
  outcomes: QuestionOutcome[];
  /** Aborted when rendering runs past its deadline. */
  signal?: AbortSignal;
}

/**
 * Turns finished outcomes into a downloadable artifact and returns its
 * reference, or null when nothing was produced.
 */
export interface ArtifactRenderer {
  render(input: RenderInput): Promise<string | null>;
}

export interface DocumentParser {
  parse(document: DocumentInput): string[];
}
