import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  AlreadyRunningError,
  AlreadyTerminalError,
  InvalidTransitionError,
  NotFoundError,
} from './errors.js';
import { withSessionLock } from './session-lock.js';

// ─── Data model ──────────────────────────────────────────────────────

export const SESSION_STATUSES = ['PENDING', 'PROCESSING', 'COMPLETE', 'ERROR'] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const PROGRESS_STAGES = [
  'pending',
  'parsing',
  'knowledge_search',
  'context_building',
  'answer_generation',
  'visual_detection',
  'citation_generation',
  'rendering',
  'complete',
  'failed',
  'error',
] as const;
export type ProgressStage = (typeof PROGRESS_STAGES)[number];

export const VISUAL_ELEMENT_KINDS = ['block_diagram', 'flowchart', 'hierarchy'] as const;
export type VisualElementKind = (typeof VISUAL_ELEMENT_KINDS)[number];

export const sessionSchema = z.object({
  id: z.string(),
  status: z.enum(SESSION_STATUSES),
  language: z.string(),
  metadata: z.record(z.unknown()),
  createdAt: z.string(),
  expiresAt: z.string(),
});
export type Session = z.infer<typeof sessionSchema>;

export const progressEventSchema = z.object({
  sessionId: z.string(),
  stage: z.enum(PROGRESS_STAGES),
  progress: z.number().int().min(0).max(100),
  message: z.string(),
  timestamp: z.string(),
});
export type ProgressEvent = z.infer<typeof progressEventSchema>;
export type NewProgressEvent = Omit<ProgressEvent, 'timestamp'> & { timestamp?: string };

export const visualElementSpecSchema = z.object({
  kind: z.enum(VISUAL_ELEMENT_KINDS),
  caption: z.string(),
});
export type VisualElementSpec = z.infer<typeof visualElementSpecSchema>;

export const questionOutcomeSchema = z.object({
  index: z.number().int().min(0),
  question: z.string(),
  answer: z.string().nullable(),
  error: z.string().nullable(),
  visualElements: z.array(visualElementSpecSchema),
  citations: z.array(z.string()),
});
export type QuestionOutcome = z.infer<typeof questionOutcomeSchema>;

export const resultSchema = z.object({
  sessionId: z.string(),
  success: z.boolean(),
  language: z.string(),
  artifactRef: z.string().nullable(),
  outcomes: z.array(questionOutcomeSchema),
  totals: z.object({
    questions: z.number().int(),
    answered: z.number().int(),
    failed: z.number().int(),
  }),
  completedAt: z.string(),
});
export type Result = z.infer<typeof resultSchema>;

export const answerPreviewSchema = z.object({
  index: z.number().int().min(0),
  question: z.string(),
  answer: z.string().nullable(),
  error: z.string().nullable(),
  visualElementCount: z.number().int().min(0),
  timestamp: z.string(),
});
export type AnswerPreview = z.infer<typeof answerPreviewSchema>;

export interface LatestProgress {
  stage: ProgressStage;
  progress: number;
  message: string;
  status: SessionStatus;
  timestamp: string | null;
}

// ─── Contract ────────────────────────────────────────────────────────

/**
 * TTL-bound shared state for one job: the session record, its append-only
 * progress log, the single Result and the per-question answer previews.
 *
 * Every key of a session expires at the session's `expiresAt`; writes never
 * push that deadline out. Reads and writes on an expired session fail with
 * NotFoundError.
 */
export interface SessionStore {
  create(language: string, metadata?: Record<string, unknown>): Promise<Session>;
  get(sessionId: string): Promise<Session>;
  /** Atomic check-and-set along PENDING → PROCESSING → COMPLETE | ERROR. */
  setStatus(sessionId: string, status: SessionStatus): Promise<Session>;
  /** PENDING → PROCESSING, rejecting a session that is already running or finished. */
  claim(sessionId: string): Promise<Session>;
  /** Appends an event; progress lower than the last recorded value is raised to it. */
  appendProgress(event: NewProgressEvent): Promise<ProgressEvent>;
  listProgress(sessionId: string): Promise<ProgressEvent[]>;
  latestProgress(sessionId: string): Promise<LatestProgress>;
  storeResult(sessionId: string, result: Result): Promise<void>;
  getResult(sessionId: string): Promise<Result | null>;
  recordAnswer(sessionId: string, preview: AnswerPreview): Promise<void>;
  listAnswers(sessionId: string): Promise<AnswerPreview[]>;
  /** Removes every key of the session. Returns false when nothing existed. */
  delete(sessionId: string): Promise<boolean>;
}

// ─── Shared rules ────────────────────────────────────────────────────

const ALLOWED_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  PENDING: ['PROCESSING', 'ERROR'],
  PROCESSING: ['COMPLETE', 'ERROR'],
  COMPLETE: [],
  ERROR: [],
};

export function isTerminalStatus(status: SessionStatus): boolean {
  return status === 'COMPLETE' || status === 'ERROR';
}

export function assertTransition(session: Session, to: SessionStatus): void {
  if (!ALLOWED_TRANSITIONS[session.status].includes(to)) {
    throw new InvalidTransitionError(session.id, session.status, to);
  }
}

export function assertClaimable(session: Session): void {
  if (session.status === 'PROCESSING') throw new AlreadyRunningError(session.id);
  if (isTerminalStatus(session.status)) throw new AlreadyTerminalError(session.id, session.status);
}

export function newSession(language: string, metadata: Record<string, unknown>, ttlSeconds: number): Session {
  const now = Date.now();
  return {
    id: randomUUID(),
    status: 'PENDING',
    language,
    metadata,
    createdAt: new Date(now).toISOString(),
    expiresAt: new Date(now + ttlSeconds * 1000).toISOString(),
  };
}

export function toLatestProgress(session: Session, last: ProgressEvent | undefined): LatestProgress {
  if (!last) {
    return { stage: 'pending', progress: 0, message: '', status: session.status, timestamp: null };
  }
  return {
    stage: last.stage,
    progress: last.progress,
    message: last.message,
    status: session.status,
    timestamp: last.timestamp,
  };
}

export function clampProgress(event: NewProgressEvent, last: ProgressEvent | undefined): ProgressEvent {
  const floor = last?.progress ?? 0;
  return {
    sessionId: event.sessionId,
    stage: event.stage,
    progress: Math.min(100, Math.max(floor, Math.round(event.progress))),
    message: event.message,
    timestamp: event.timestamp ?? new Date().toISOString(),
  };
}

// ─── In-memory implementation ────────────────────────────────────────

interface SessionRecord {
  session: Session;
  events: ProgressEvent[];
  result: Result | null;
  answers: AnswerPreview[];
}

/**
 * Single-process store used when no Redis URL is configured, and in tests.
 * Expiry is evaluated lazily against Date.now() on every access.
 */
export class MemorySessionStore implements SessionStore {
  private readonly records = new Map<string, SessionRecord>();

  constructor(private readonly ttlSeconds = 3600) {}

  private record(sessionId: string): SessionRecord {
    const record = this.records.get(sessionId);
    if (!record) throw new NotFoundError(sessionId);
    if (Date.parse(record.session.expiresAt) <= Date.now()) {
      this.records.delete(sessionId);
      throw new NotFoundError(sessionId);
    }
    return record;
  }

  async create(language: string, metadata: Record<string, unknown> = {}): Promise<Session> {
    const session = newSession(language, metadata, this.ttlSeconds);
    this.records.set(session.id, { session, events: [], result: null, answers: [] });
    return { ...session };
  }

  async get(sessionId: string): Promise<Session> {
    return { ...this.record(sessionId).session };
  }

  async setStatus(sessionId: string, status: SessionStatus): Promise<Session> {
    return withSessionLock(sessionId, async () => {
      const record = this.record(sessionId);
      assertTransition(record.session, status);
      if (status === 'COMPLETE' && !record.result) {
        throw new InvalidTransitionError(sessionId, record.session.status, 'COMPLETE without a stored result');
      }
      record.session = { ...record.session, status };
      return { ...record.session };
    });
  }

  async claim(sessionId: string): Promise<Session> {
    return withSessionLock(sessionId, async () => {
      const record = this.record(sessionId);
      assertClaimable(record.session);
      record.session = { ...record.session, status: 'PROCESSING' };
      return { ...record.session };
    });
  }

  async appendProgress(event: NewProgressEvent): Promise<ProgressEvent> {
    return withSessionLock(event.sessionId, async () => {
      const record = this.record(event.sessionId);
      const stored = clampProgress(event, record.events.at(-1));
      record.events.push(stored);
      return { ...stored };
    });
  }

  async listProgress(sessionId: string): Promise<ProgressEvent[]> {
    return this.record(sessionId).events.map((e) => ({ ...e }));
  }

  async latestProgress(sessionId: string): Promise<LatestProgress> {
    const record = this.record(sessionId);
    return toLatestProgress(record.session, record.events.at(-1));
  }

  async storeResult(sessionId: string, result: Result): Promise<void> {
    await withSessionLock(sessionId, async () => {
      const record = this.record(sessionId);
      if (record.result) {
        throw new InvalidTransitionError(sessionId, record.session.status, 'second result');
      }
      if (record.session.status !== 'PROCESSING') {
        throw new InvalidTransitionError(sessionId, record.session.status, 'result');
      }
      record.result = structuredClone(result);
    });
  }

  async getResult(sessionId: string): Promise<Result | null> {
    const { result } = this.record(sessionId);
    return result ? structuredClone(result) : null;
  }

  async recordAnswer(sessionId: string, preview: AnswerPreview): Promise<void> {
    await withSessionLock(sessionId, async () => {
      this.record(sessionId).answers.push({ ...preview });
    });
  }

  async listAnswers(sessionId: string): Promise<AnswerPreview[]> {
    return this.record(sessionId).answers.map((a) => ({ ...a }));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.records.delete(sessionId);
  }
}
