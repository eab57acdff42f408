import { describe, it, expect } from 'vitest';
import { loadConfig, parseProviderOrder } from '../lib/config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3001);
    expect(config.redisUrl).toBeNull();
    expect(config.sessionTtlSeconds).toBe(3600);
    expect(config.questionConcurrency).toBe(3);
    expect(config.questionConcurrencyScope).toBe('job');
    expect(config.maxJobDurationMs).toBe(3_300_000);
    expect(config.renderTimeoutMs).toBe(60_000);
    expect(config.providerTimeoutMs).toBe(60_000);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 });
    expect(config.contextBudgetChars).toBe(6000);
    expect(config.providerOrder).toEqual(['gemini', 'perplexity', 'openai', 'anthropic']);
    expect(config.defaultProvider).toBe('gemini');
    expect(config.providers).toEqual({});
    expect(config.maxDocumentBytes).toBe(50 * 1024 * 1024);
  });

  it('configures only providers that have a key', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: '  ',
      OPENAI_MODEL: 'gpt-test',
    });

    expect(Object.keys(config.providers)).toEqual(['openai']);
    expect(config.providers.openai).toEqual({
      apiKey: 'test-secret',
      model: 'gpt-test',
      baseUrl: 'https://api.openai.com/v1',
    });
  });

  it('falls back to defaults for invalid numbers', () => {
    const config = loadConfig({
      QUESTION_CONCURRENCY: 'many',
      SESSION_TTL_SECONDS: '-5',
      KNOWLEDGE_TOP_K: '2',
    });

    expect(config.questionConcurrency).toBe(3);
    expect(config.sessionTtlSeconds).toBe(3600);
    expect(config.knowledgeTopK).toBe(2);
  });

  it('reads the concurrency scope and default provider', () => {
    const config = loadConfig({
      QUESTION_CONCURRENCY_SCOPE: 'GLOBAL',
      DEFAULT_PROVIDER: 'Anthropic',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(config.questionConcurrencyScope).toBe('global');
    expect(config.defaultProvider).toBe('anthropic');
    expect(config.redisUrl).toBe('redis://localhost:6379');
  });

  it('uses the first provider in the order when the default is unknown', () => {
    const config = loadConfig({ PROVIDER_ORDER: 'openai,gemini', DEFAULT_PROVIDER: 'mystery' });
    expect(config.defaultProvider).toBe('openai');
  });
});

describe('parseProviderOrder', () => {
  it('drops unknown names and duplicates', () => {
    expect(parseProviderOrder('anthropic, openai,unknown,OPENAI')).toEqual(['anthropic', 'openai']);
  });

  it('falls back to the default order when nothing valid remains', () => {
    expect(parseProviderOrder('nope,,')).toEqual(['gemini', 'perplexity', 'openai', 'anthropic']);
    expect(parseProviderOrder(undefined)).toEqual(['gemini', 'perplexity', 'openai', 'anthropic']);
  });
});
