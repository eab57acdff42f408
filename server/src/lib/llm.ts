import { createProvider, type LLMProvider } from './llm-provider.js';
import { AllProvidersExhaustedError, errorMessage, isAbortError, type ProviderAttempt } from './errors.js';
import { withRetry, type RetryPolicy } from './retry.js';
import { PROVIDER_NAMES, type AppConfig, type ProviderName } from './config.js';
import logger from './logger.js';
import { getLanguageConfig, type LanguageCode } from './languages.js';

export const MAX_TOKENS = 4096;
export const TEMPERATURE = 0.3;

const SYSTEM_PROMPT = 'You are an expert educational assistant. Answer questions accurately, '
  + 'explain concepts step by step, and cite the supplied materials when they are relevant.';

export interface ProviderClientOptions {
  /** Configured providers only; a provider without credentials is never listed. */
  providers: Partial<Record<ProviderName, LLMProvider>>;
  fallbackOrder: readonly ProviderName[];
  retryPolicy: RetryPolicy;
  timeoutMs: number;
}

/**
 * Answer generation over an ordered list of providers.
 *
 * The preferred provider is tried first, then the fallback order. Each
 * provider gets its own bounded retry budget for transient failures; a
 * non-transient failure moves straight to the next provider.
 */
export class ProviderClient {
  private readonly providers: Partial<Record<ProviderName, LLMProvider>>;
  private readonly fallbackOrder: readonly ProviderName[];
  private readonly retryPolicy: RetryPolicy;
  private readonly timeoutMs: number;

  constructor(options: ProviderClientOptions) {
    this.providers = options.providers;
    this.fallbackOrder = options.fallbackOrder;
    this.retryPolicy = options.retryPolicy;
    this.timeoutMs = options.timeoutMs;
  }

  /** Preferred provider first, then fallbacks; configured providers only, no duplicates. */
  resolveOrder(preference?: ProviderName | null): ProviderName[] {
    const order: ProviderName[] = [];
    for (const name of [preference, ...this.fallbackOrder]) {
      if (!name || order.includes(name) || !this.providers[name]) continue;
      order.push(name);
    }
    return order;
  }

  async generate(
    prompt: string,
    language: LanguageCode,
    preference?: ProviderName | null,
    signal?: AbortSignal,
  ): Promise<string> {
    const attempts: ProviderAttempt[] = [];
    const languageName = getLanguageConfig(language)?.name ?? 'English';
    const system = language === 'en' ? SYSTEM_PROMPT : `${SYSTEM_PROMPT} Always answer in ${languageName}.`;

    for (const name of this.resolveOrder(preference)) {
      const provider = this.providers[name];
      if (!provider) continue;
      try {
        const text = await withRetry(
          () => provider.generate({
            system,
            prompt,
            max_tokens: MAX_TOKENS,
            temperature: TEMPERATURE,
            timeout_ms: this.timeoutMs,
            signal,
          }),
          this.retryPolicy,
          {
            signal,
            onRetry: (attempt, error, delayMs) => {
              logger.warn({ provider: name, attempt, delayMs, error: error.message }, 'Provider call failed, retrying');
            },
          },
        );
        if (attempts.length > 0) {
          logger.info({ provider: name, failedBefore: attempts.map((a) => a.provider) }, 'Answer generated by fallback provider');
        }
        return text;
      } catch (err) {
        if (isAbortError(err) || signal?.aborted) throw err;
        logger.warn({ provider: name, error: errorMessage(err) }, 'Provider failed, trying next');
        attempts.push({ provider: name, error: errorMessage(err) });
      }
    }

    throw new AllProvidersExhaustedError(attempts);
  }
}

/**
 * Builds the provider set from configuration. Providers without an API key are skipped.
 */
export function createProviderClient(config: AppConfig): ProviderClient {
  const providers: Partial<Record<ProviderName, LLMProvider>> = {};
  for (const name of PROVIDER_NAMES) {
    const settings = config.providers[name];
    if (settings) providers[name] = createProvider(name, settings);
  }
  return new ProviderClient({
    providers,
    fallbackOrder: config.providerOrder,
    retryPolicy: { ...config.retry, jitter: true },
    timeoutMs: config.providerTimeoutMs,
  });
}
