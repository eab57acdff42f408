import { z } from 'zod';
import { parsePositiveInt } from './http-body-guard.js';

export const PROVIDER_NAMES = ['gemini', 'perplexity', 'openai', 'anthropic'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const providerNameSchema = z.enum(PROVIDER_NAMES);

export type ConcurrencyScope = 'job' | 'global';

export interface ProviderSettings {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export interface AppConfig {
  port: number;
  redisUrl: string | null;
  sessionTtlSeconds: number;
  questionConcurrency: number;
  questionConcurrencyScope: ConcurrencyScope;
  workerConcurrency: number;
  maxJobDurationMs: number;
  renderTimeoutMs: number;
  providerTimeoutMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  contextBudgetChars: number;
  knowledgeTopK: number;
  providerOrder: ProviderName[];
  defaultProvider: ProviderName;
  providers: Partial<Record<ProviderName, ProviderSettings>>;
  outputDir: string;
  maxDocumentBytes: number;
  maxCreateJobBodyBytes: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_ORDER: ProviderName[] = ['gemini', 'perplexity', 'openai', 'anthropic'];

const DEFAULT_MODELS: Record<ProviderName, string> = {
  gemini: 'gemini-2.5-flash',
  perplexity: 'sonar',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-sonnet-4-5-20250929',
};

const DEFAULT_BASE_URLS: Record<ProviderName, string> = {
  gemini: 'https://generativelanguage.googleapis.com/v1beta',
  perplexity: 'https://api.perplexity.ai',
  openai: 'https://api.openai.com/v1',
  anthropic: 'https://api.anthropic.com',
};

/**
 * Parses a comma separated provider list, dropping unknown names and duplicates.
 * Falls back to the default order when nothing valid remains.
 */
export function parseProviderOrder(raw: string | undefined): ProviderName[] {
  if (!raw) return [...DEFAULT_ORDER];
  const order: ProviderName[] = [];
  for (const part of raw.split(',')) {
    const parsed = providerNameSchema.safeParse(part.trim().toLowerCase());
    if (parsed.success && !order.includes(parsed.data)) order.push(parsed.data);
  }
  return order.length > 0 ? order : [...DEFAULT_ORDER];
}

function readProviders(env: Env): Partial<Record<ProviderName, ProviderSettings>> {
  const providers: Partial<Record<ProviderName, ProviderSettings>> = {};
  for (const name of PROVIDER_NAMES) {
    const prefix = name.toUpperCase();
    const apiKey = env[`${prefix}_API_KEY`]?.trim();
    if (!apiKey) continue;
    providers[name] = {
      apiKey,
      model: env[`${prefix}_MODEL`] ?? DEFAULT_MODELS[name],
      baseUrl: env[`${prefix}_BASE_URL`] ?? DEFAULT_BASE_URLS[name],
    };
  }
  return providers;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const providerOrder = parseProviderOrder(env.PROVIDER_ORDER);
  const defaultProvider = providerNameSchema.safeParse(env.DEFAULT_PROVIDER?.trim().toLowerCase());
  const scope = env.QUESTION_CONCURRENCY_SCOPE?.trim().toLowerCase();

  return {
    port: parsePositiveInt(env.PORT, 3001),
    redisUrl: env.REDIS_URL?.trim() || null,
    sessionTtlSeconds: parsePositiveInt(env.SESSION_TTL_SECONDS, 3600),
    questionConcurrency: parsePositiveInt(env.QUESTION_CONCURRENCY, 3),
    questionConcurrencyScope: scope === 'global' ? 'global' : 'job',
    workerConcurrency: parsePositiveInt(env.WORKER_CONCURRENCY, 2),
    // 55 minutes.
    maxJobDurationMs: parsePositiveInt(env.MAX_JOB_DURATION_MS, 3_300_000),
    renderTimeoutMs: parsePositiveInt(env.RENDER_TIMEOUT_MS, 60_000),
    providerTimeoutMs: parsePositiveInt(env.PROVIDER_TIMEOUT_MS, 60_000),
    retry: {
      maxAttempts: parsePositiveInt(env.RETRY_MAX_ATTEMPTS, 3),
      baseDelayMs: parsePositiveInt(env.RETRY_BASE_DELAY_MS, 1000),
      maxDelayMs: parsePositiveInt(env.RETRY_MAX_DELAY_MS, 30_000),
    },
    contextBudgetChars: parsePositiveInt(env.CONTEXT_BUDGET_CHARS, 6000),
    knowledgeTopK: parsePositiveInt(env.KNOWLEDGE_TOP_K, 5),
    providerOrder,
    defaultProvider: defaultProvider.success ? defaultProvider.data : providerOrder[0],
    providers: readProviders(env),
    outputDir: env.OUTPUT_DIR?.trim() || './outputs',
    maxDocumentBytes: parsePositiveInt(env.MAX_DOCUMENT_BYTES, 50 * 1024 * 1024),
    maxCreateJobBodyBytes: parsePositiveInt(env.MAX_CREATE_JOB_BODY_BYTES, 70 * 1024 * 1024),
  };
}
