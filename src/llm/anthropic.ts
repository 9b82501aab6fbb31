import Anthropic from '@anthropic-ai/sdk';

import * as log from '../utils/logger.js';
import type { LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 4096;
const MAX_RETRIES = 3;

type ImageMediaType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

type UserContent = Anthropic.MessageParam['content'];

function toImageMediaType(mimeType: string): ImageMediaType {
  switch (mimeType) {
    case 'image/png':
    case 'image/jpeg':
    case 'image/gif':
    case 'image/webp':
      return mimeType;
    default:
      throw new Error(`Unsupported screenshot type for Anthropic: ${mimeType}`);
  }
}

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  return err instanceof Error && err.message.includes('429');
}

async function withRetry<T>(fn: () => Promise<T>): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt >= MAX_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  const complete = async (systemPrompt: string, content: UserContent): Promise<string> => {
    const response = await withRetry(() =>
      client.messages.create({
        model: resolvedModel,
        max_tokens: MAX_TOKENS,
        system: systemPrompt,
        messages: [{ role: 'user', content }],
        temperature: 0,
      }),
    );

    const firstBlock = response.content[0];
    if (!firstBlock || firstBlock.type !== 'text') {
      throw new Error('Anthropic API returned no text content');
    }
    return firstBlock.text;
  };

  return {
    generate(systemPrompt: string, userPrompt: string): Promise<string> {
      return complete(systemPrompt, userPrompt);
    },

    generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: string,
    ): Promise<string> {
      return complete(systemPrompt, [
        {
          type: 'image',
          source: {
            type: 'base64',
            media_type: toImageMediaType(mimeType),
            data: imageBase64,
          },
        },
        { type: 'text', text: userPrompt },
      ]);
    },
  };
}
