import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  buildAzureCompletionsUrl,
  createAzureOpenAIClient,
  createLLMClient,
  createMockClient,
  loadLLMConfig,
} from '../../src/llm/index.js';

describe('loadLLMConfig', () => {
  it('defaults to azure with the default api version', () => {
    expect(
      loadLLMConfig({
        AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com/',
        AZURE_OPENAI_KEY: 'test-secret',
      }),
    ).toEqual({
      provider: 'azure',
      apiKey: 'test-secret',
      endpoint: 'https://example.openai.azure.com/',
      apiVersion: '2025-01-01-preview',
    });
  });

  it('reads the key for the selected provider', () => {
    expect(
      loadLLMConfig({
        LLM_PROVIDER: 'anthropic',
        LLM_MODEL: 'claude-test',
        ANTHROPIC_API_KEY: 'test-secret',
        AZURE_OPENAI_KEY: 'other-secret',
      }),
    ).toEqual({ provider: 'anthropic', apiKey: 'test-secret', model: 'claude-test' });
  });

  it('rejects unknown providers', () => {
    expect(() => loadLLMConfig({ LLM_PROVIDER: 'gemini' })).toThrow();
  });
});

describe('createLLMClient', () => {
  it('requires credentials for remote providers', () => {
    expect(() => createLLMClient({ provider: 'azure', apiKey: 'test-secret' })).toThrow(
      'AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_KEY are required when using the azure provider',
    );
    expect(() => createLLMClient({ provider: 'openai' })).toThrow(
      'OPENAI_API_KEY is required when using the openai provider',
    );
  });

  it('needs nothing for the mock provider', async () => {
    const client = createLLMClient({ provider: 'mock' });
    expect(await client.generate('system', 'user')).toContain('"type":"done"');
  });
});

describe('buildAzureCompletionsUrl', () => {
  it('joins endpoint, deployment and api version', () => {
    expect(
      buildAzureCompletionsUrl('https://example.openai.azure.com//', 'gpt-4.1-mini', '2025-01-01-preview'),
    ).toBe(
      'https://example.openai.azure.com/openai/deployments/gpt-4.1-mini/chat/completions?api-version=2025-01-01-preview',
    );
  });
});

describe('createAzureOpenAIClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts chat messages with the api-key header', async () => {
    const fetchMock = vi.fn(() =>
      Promise.resolve(
        new Response(JSON.stringify({ choices: [{ message: { content: '{"actions":[]}' } }] }), {
          status: 200,
        }),
      ),
    );
    vi.stubGlobal('fetch', fetchMock);

    const client = createAzureOpenAIClient({
      endpoint: 'https://example.openai.azure.com',
      apiKey: 'test-secret',
    });

    expect(await client.generate('be brief', 'find a listing')).toBe('{"actions":[]}');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.openai.azure.com/openai/deployments/gpt-4.1-mini/chat/completions?api-version=2025-01-01-preview',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'api-key': 'test-secret' },
        body: JSON.stringify({
          messages: [
            { role: 'system', content: 'be brief' },
            { role: 'user', content: 'find a listing' },
          ],
          temperature: 0,
        }),
      },
    );
  });

  it('surfaces API errors with the status code', async () => {
    vi.stubGlobal('fetch', vi.fn(() => Promise.resolve(new Response('quota exceeded', { status: 403 }))));

    const client = createAzureOpenAIClient({
      endpoint: 'https://example.openai.azure.com',
      apiKey: 'test-secret',
    });

    await expect(client.generate('s', 'u')).rejects.toThrow(
      'Azure OpenAI API error (403): quota exceeded',
    );
  });
});

describe('createMockClient', () => {
  it('answers in order and records each call', async () => {
    const client = createMockClient(['first']);

    expect(await client.generate('s', 'u1')).toBe('first');
    expect(await client.generateWithImage?.('s', 'u2', 'aW1n', 'image/png')).toContain('mock provider');
    expect(client.calls).toEqual([
      { systemPrompt: 's', userPrompt: 'u1', withImage: false },
      { systemPrompt: 's', userPrompt: 'u2', withImage: true },
    ]);
  });
});
