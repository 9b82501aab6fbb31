import { z } from 'zod';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  stepNumber: z.number().int().positive(),
  url: z.string(),
  nextGoal: z.string(),
  actions: z.array(z.string()),
  errors: z.array(z.string()),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  task: z.string(),
  done: z.boolean(),
  successful: z.boolean().nullable(),
  finalResult: z.string().nullable(),
  urls: z.array(z.string()),
  steps: z.array(jsonOutputStepSchema),
  scriptPath: z.string().nullable(),
  replayExitCode: z.number().int().nullable(),
  exitCode: z.number().int().nonnegative(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
