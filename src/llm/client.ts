import { z } from 'zod';

import { llmProviderSchema } from '../schema/config.js';
import type { LLMProvider } from '../schema/config.js';

export { llmProviderSchema };
export type { LLMProvider };

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
  generateWithImage?(
    systemPrompt: string,
    userPrompt: string,
    imageBase64: string,
    mimeType: string,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const DEFAULT_AZURE_API_VERSION = '2025-01-01-preview';

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  apiVersion: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(env: NodeJS.ProcessEnv = process.env): LLMConfig {
  const provider = env['LLM_PROVIDER'] ?? 'azure';

  const apiKey =
    provider === 'azure'
      ? env['AZURE_OPENAI_KEY']
      : provider === 'anthropic'
        ? env['ANTHROPIC_API_KEY']
        : env['OPENAI_API_KEY'];

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey || undefined,
    model: env['LLM_MODEL'] || undefined,
    endpoint: provider === 'azure' ? env['AZURE_OPENAI_ENDPOINT'] || undefined : undefined,
    apiVersion:
      provider === 'azure'
        ? env['AZURE_OPENAI_API_VERSION'] || DEFAULT_AZURE_API_VERSION
        : undefined,
  });
}
