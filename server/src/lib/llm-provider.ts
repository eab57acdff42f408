import { z } from 'zod';
import { getAnthropicClient, extractResponseText } from './anthropic.js';
import { ProviderRequestError } from './errors.js';
import type { ProviderName, ProviderSettings } from './config.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface GenerateParams {
  system: string;
  prompt: string;
  max_tokens: number;
  temperature: number;
  timeout_ms: number;
  signal?: AbortSignal;
}

/**
 * One answer-generation backend. Implementations throw ProviderRequestError
 * with the upstream HTTP status so the retry policy can classify failures.
 */
export interface LLMProvider {
  readonly name: ProviderName;
  generate(params: GenerateParams): Promise<string>;
}

export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; timedOut: () => boolean; cleanup: () => void } {
  const controller = new AbortController();
  let didTimeOut = false;
  const timeout = setTimeout(() => {
    didTimeOut = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: controller.signal, timedOut: () => didTimeOut, cleanup };
}

/**
 * Runs one upstream request under the per-call timeout. A timeout becomes a
 * transient ProviderRequestError; a caller abort is rethrown as an AbortError.
 * The request must settle only once the body has been read.
 */
async function withCallTimeout<T>(
  provider: ProviderName,
  params: GenerateParams,
  request: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const { signal, timedOut, cleanup } = createCombinedAbortSignal(params.signal, params.timeout_ms);
  try {
    return await request(signal);
  } catch (err) {
    if (timedOut()) {
      throw new ProviderRequestError(provider, null, `${provider} request timed out after ${params.timeout_ms}ms`);
    }
    if (params.signal?.aborted) {
      throw new DOMException(`${provider} request aborted`, 'AbortError');
    }
    throw err;
  } finally {
    cleanup();
  }
}

interface UpstreamReply {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: string;
}

function retryHeaders(response: Response): Record<string, string> {
  const retryAfter = response.headers.get('retry-after');
  return retryAfter ? { 'retry-after': retryAfter } : {};
}

// A body stream does not always observe the fetch signal, so the read races it.
function readBodyText(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

async function postJson(
  url: string,
  headers: Record<string, string>,
  payload: unknown,
  signal: AbortSignal,
): Promise<UpstreamReply> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(payload),
    signal,
  });
  const body = await readBodyText(response, signal);
  return { status: response.status, ok: response.ok, headers: retryHeaders(response), body };
}

function parseReply<T>(
  provider: ProviderName,
  reply: UpstreamReply,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  if (!reply.ok) {
    throw new ProviderRequestError(
      provider,
      reply.status,
      `${provider} API error ${reply.status}: ${reply.body.slice(0, 500)}`,
      reply.headers,
    );
  }
  let json: unknown;
  try {
    json = JSON.parse(reply.body);
  } catch {
    json = undefined;
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderRequestError(provider, reply.status, `${provider} returned an unexpected response shape`);
  }
  return parsed.data;
}

function requireText(provider: ProviderName, text: string | null | undefined): string {
  const trimmed = text?.trim() ?? '';
  if (!trimmed) {
    throw new ProviderRequestError(provider, null, `${provider} returned an empty answer`);
  }
  return trimmed;
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic' as const;

  constructor(private readonly settings: ProviderSettings) {}

  async generate(params: GenerateParams): Promise<string> {
    const anthropic = getAnthropicClient(this.settings.apiKey, this.settings.baseUrl);
    const response = await withCallTimeout(this.name, params, (signal) =>
      anthropic.messages.create(
        {
          model: this.settings.model,
          max_tokens: params.max_tokens,
          temperature: params.temperature,
          system: params.system,
          messages: [{ role: 'user', content: params.prompt }],
        },
        { signal },
      ),
    );
    return requireText(this.name, extractResponseText(response));
  }
}

// ─── OpenAI-compatible providers (OpenAI, Perplexity) ────────────────

const openAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).default([]),
});

export class OpenAICompatibleProvider implements LLMProvider {
  private readonly baseUrl: string;

  constructor(
    readonly name: 'openai' | 'perplexity',
    private readonly settings: ProviderSettings,
  ) {
    this.baseUrl = settings.baseUrl.replace(/\/$/, '');
  }

  async generate(params: GenerateParams): Promise<string> {
    const reply = await withCallTimeout(this.name, params, (signal) =>
      postJson(
        `${this.baseUrl}/chat/completions`,
        { 'Authorization': `Bearer ${this.settings.apiKey}` },
        {
          model: this.settings.model,
          messages: [
            { role: 'system', content: params.system },
            { role: 'user', content: params.prompt },
          ],
          temperature: params.temperature,
          max_tokens: params.max_tokens,
          stream: false,
        },
        signal,
      ),
    );

    const data = parseReply(this.name, reply, openAIChatResponseSchema);
    return requireText(this.name, data.choices[0]?.message.content);
  }
}

// ─── Gemini provider ─────────────────────────────────────────────────

const geminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
  })).default([]),
});

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  private readonly baseUrl: string;

  constructor(private readonly settings: ProviderSettings) {
    this.baseUrl = settings.baseUrl.replace(/\/$/, '');
  }

  async generate(params: GenerateParams): Promise<string> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.settings.model)}:generateContent`;
    const reply = await withCallTimeout(this.name, params, (signal) =>
      postJson(
        url,
        { 'x-goog-api-key': this.settings.apiKey },
        {
          systemInstruction: { parts: [{ text: params.system }] },
          contents: [{ role: 'user', parts: [{ text: params.prompt }] }],
          generationConfig: {
            temperature: params.temperature,
            maxOutputTokens: params.max_tokens,
          },
        },
        signal,
      ),
    );

    const data = parseReply(this.name, reply, geminiResponseSchema);
    const parts = data.candidates[0]?.content?.parts ?? [];
    return requireText(this.name, parts.map((p) => p.text ?? '').join(''));
  }
}

// ─── Factory ─────────────────────────────────────────────────────────

export function createProvider(name: ProviderName, settings: ProviderSettings): LLMProvider {
  switch (name) {
    case 'anthropic':
      return new AnthropicProvider(settings);
    case 'gemini':
      return new GeminiProvider(settings);
    case 'openai':
    case 'perplexity':
      return new OpenAICompatibleProvider(name, settings);
  }
}
