/**
 * Error taxonomy for the answer pipeline.
 *
 * Every domain error carries a stable `code` and the HTTP status the API layer
 * should answer with. Stage-level errors are absorbed into per-question
 * outcomes; only store, parse and job errors reach the job boundary.
 */

export type ErrorContext = Record<string, unknown>;

export class AppError extends Error {
  readonly code: string;
  readonly httpStatus: number;
  readonly context: ErrorContext;

  constructor(code: string, httpStatus: number, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
    this.context = context;
  }
}

export class NotFoundError extends AppError {
  constructor(sessionId: string) {
    super('NOT_FOUND', 404, `Session ${sessionId} not found or expired`, { sessionId });
  }
}

export class InvalidTransitionError extends AppError {
  constructor(sessionId: string, from: string, to: string) {
    super('INVALID_TRANSITION', 409, `Session ${sessionId} cannot move from ${from} to ${to}`, { sessionId, from, to });
  }
}

export class AlreadyRunningError extends AppError {
  constructor(sessionId: string) {
    super('ALREADY_RUNNING', 409, `Session ${sessionId} is already being processed`, { sessionId });
  }
}

export class AlreadyTerminalError extends AppError {
  constructor(sessionId: string, status: string) {
    super('ALREADY_TERMINAL', 409, `Session ${sessionId} already finished with status ${status}`, { sessionId, status });
  }
}

export class NotReadyError extends AppError {
  constructor(sessionId: string, status: string) {
    super('NOT_READY', 409, `Result not ready. Current status: ${status}`, { sessionId, status });
  }
}

export class StoreUnavailableError extends AppError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STORE_UNAVAILABLE', 503, `Session store unavailable during ${operation}: ${reason}`, { operation }, { cause });
  }
}

export class UnsupportedLanguageError extends AppError {
  constructor(language: string, supported: readonly string[]) {
    super('UNSUPPORTED_LANGUAGE', 400, `Language '${language}' is not supported`, { language, supported });
  }
}

// ─── Document parsing (job-level) ────────────────────────────────────

export class ParseError extends AppError {}

export class UnsupportedFormatError extends ParseError {
  constructor(format: string, supported: readonly string[]) {
    super('UNSUPPORTED_FORMAT', 422, `Unsupported format: ${format}. Supported formats: ${supported.join(', ')}`, { format });
  }
}

export class FileTooLargeError extends ParseError {
  constructor(size: number, maxSize: number) {
    super('FILE_TOO_LARGE', 422, `File size (${size} bytes) exceeds maximum (${maxSize} bytes)`, { size, maxSize });
  }
}

export class NoQuestionsFoundError extends ParseError {
  constructor() {
    super('NO_QUESTIONS_FOUND', 422, 'No questions found in the input document');
  }
}

// ─── Providers ───────────────────────────────────────────────────────

export class ProviderRequestError extends AppError {
  readonly provider: string;
  readonly statusCode: number | null;
  /** Response headers the retry policy reads (Retry-After). */
  readonly headers: Record<string, string>;

  constructor(provider: string, statusCode: number | null, message: string, headers: Record<string, string> = {}) {
    super('PROVIDER_REQUEST_FAILED', 502, message, { provider, statusCode });
    this.provider = provider;
    this.statusCode = statusCode;
    this.headers = headers;
  }
}

export interface ProviderAttempt {
  provider: string;
  error: string;
}

export class AllProvidersExhaustedError extends AppError {
  readonly attempts: ProviderAttempt[];

  constructor(attempts: ProviderAttempt[]) {
    const summary = attempts.length === 0
      ? 'no providers are configured'
      : attempts.map((a) => `${a.provider}: ${a.error}`).join('; ');
    super('ALL_PROVIDERS_EXHAUSTED', 502, `All providers failed to generate an answer (${summary})`, { attempts });
    this.attempts = attempts;
  }
}

export class JobTimeoutError extends AppError {
  constructor(sessionId: string, ms: number) {
    super('JOB_TIMEOUT', 504, `Job for session ${sessionId} exceeded ${ms}ms`, { sessionId, ms });
  }
}

export class RenderTimeoutError extends AppError {
  constructor(sessionId: string, ms: number) {
    super('RENDER_TIMEOUT', 504, `Rendering for session ${sessionId} exceeded ${ms}ms`, { sessionId, ms });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
