import { z } from 'zod';

import * as log from '../utils/logger.js';
import type { LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4.1-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';
const MAX_RETRIES = 3;

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Rate-limit-aware fetch ───────────────────────────────────

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  label: string,
): Promise<Response> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    const response = await fetch(url, init);

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : (attempt + 1) * 5000;
      log.warn(`${label} rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `${label} API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error(`${label} API: max retries exceeded due to rate limiting`);
}

// ── Chat-completions message shapes ─────────────────────────

type ChatContent =
  | string
  | (
      | { type: 'text'; text: string }
      | { type: 'image_url'; image_url: { url: string } }
    )[];

export interface ChatMessage {
  role: 'system' | 'user';
  content: ChatContent;
}

export function textMessages(systemPrompt: string, userPrompt: string): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}

export function imageMessages(
  systemPrompt: string,
  userPrompt: string,
  imageBase64: string,
  mimeType: string,
): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    {
      role: 'user',
      content: [
        { type: 'image_url', image_url: { url: `data:${mimeType};base64,${imageBase64}` } },
        { type: 'text', text: userPrompt },
      ],
    },
  ];
}

export async function readCompletion(response: Response): Promise<string> {
  const raw = await response.text();
  const body: unknown = JSON.parse(raw);
  const parsed = chatResponseSchema.parse(body);
  return parsed.choices[0].message.content;
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  const complete = async (messages: ChatMessage[]): Promise<string> => {
    const response = await fetchWithRetry(
      COMPLETIONS_URL,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: resolvedModel,
          messages,
          temperature: 0,
        }),
      },
      'OpenAI',
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
