import { z } from 'zod';

import {
  DEFAULT_ALLOWED_DOMAINS,
  DEFAULT_CONVERSATION_PATH,
  DEFAULT_SCRIPT_PATH,
  DEFAULT_START_URL,
  DEFAULT_TASK,
  LIMITS,
} from '../config/defaults.js';

// ── LLM provider ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['azure', 'openai', 'anthropic', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  task: z.string().min(1).optional().default(DEFAULT_TASK),
  startUrl: z.string().url().optional().default(DEFAULT_START_URL),
  allowedDomains: z
    .array(z.string().min(1))
    .optional()
    .default([...DEFAULT_ALLOWED_DOMAINS]),
  maxSteps: z.number().int().positive().optional().default(LIMITS.MAX_STEPS),
  maxActionsPerStep: z
    .number()
    .int()
    .positive()
    .optional()
    .default(LIMITS.MAX_ACTIONS_PER_STEP),
  headless: z.boolean().optional().default(false),
  useVision: z.boolean().optional().default(false),
  scriptPath: z.string().min(1).optional().default(DEFAULT_SCRIPT_PATH),
  conversationPath: z
    .string()
    .min(1)
    .optional()
    .default(DEFAULT_CONVERSATION_PATH),
  provider: llmProviderSchema.optional(),
  model: z.string().min(1).optional(),
  // Placeholder names only; values come from the environment.
  sensitiveData: z.array(z.string().regex(/^\w+$/)).optional().default([]),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
