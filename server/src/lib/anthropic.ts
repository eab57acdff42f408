import Anthropic from '@anthropic-ai/sdk';

const clients = new Map<string, Anthropic>();

/**
 * Lazily create one Anthropic client per API key so modules can be imported in
 * test/dev environments even when Anthropic credentials are not configured.
 * SDK-level retries are disabled: the provider client owns the retry policy.
 */
export function getAnthropicClient(apiKey: string, baseURL?: string): Anthropic {
  const cacheKey = `${baseURL ?? ''}|${apiKey}`;
  let client = clients.get(cacheKey);
  if (!client) {
    client = new Anthropic({ apiKey, baseURL, maxRetries: 0 });
    clients.set(cacheKey, client);
  }
  return client;
}

/**
 * Concatenate the text blocks of an Anthropic API response.
 */
export function extractResponseText(response: Anthropic.Message): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('')
    .trim();
}
