import type { LLMClient } from './client.js';
import { DEFAULT_AZURE_API_VERSION } from './client.js';
import type { ChatMessage } from './openai.js';
import {
  fetchWithRetry,
  imageMessages,
  readCompletion,
  textMessages,
} from './openai.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_DEPLOYMENT = 'gpt-4.1-mini';

// ── URL building ─────────────────────────────────────────────

/** Chat-completions URL for an Azure OpenAI deployment. */
export function buildAzureCompletionsUrl(
  endpoint: string,
  deployment: string,
  apiVersion: string,
): string {
  const base = endpoint.replace(/\/+$/, '');
  return `${base}/openai/deployments/${encodeURIComponent(deployment)}/chat/completions?api-version=${encodeURIComponent(apiVersion)}`;
}

// ── Provider factory ─────────────────────────────────────────

export interface AzureClientOptions {
  endpoint: string;
  apiKey: string;
  deployment?: string | undefined;
  apiVersion?: string | undefined;
}

export function createAzureOpenAIClient(options: AzureClientOptions): LLMClient {
  const url = buildAzureCompletionsUrl(
    options.endpoint,
    options.deployment ?? DEFAULT_DEPLOYMENT,
    options.apiVersion ?? DEFAULT_AZURE_API_VERSION,
  );

  const complete = async (messages: ChatMessage[]): Promise<string> => {
    const response = await fetchWithRetry(
      url,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'api-key': options.apiKey,
        },
        body: JSON.stringify({ messages, temperature: 0 }),
      },
      'Azure OpenAI',
    );
    return readCompletion(response);
  };

  return {
    generate(systemPrompt: string, userPrompt: string): Promise<string> {
      return complete(textMessages(systemPrompt, userPrompt));
    },

    generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: string,
    ): Promise<string> {
      return complete(imageMessages(systemPrompt, userPrompt, imageBase64, mimeType));
    },
  };
}
