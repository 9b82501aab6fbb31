import { z } from 'zod';

// ── Version ─────────────────────────────────────────────────
// Bump this when the replay document shape changes.

export const REPLAY_SCRIPT_VERSION = '1' as const;

// ── Individual action schemas ───────────────────────────────

const baseFields = {
  step: z.number().int().positive(),
  action: z.number().int().positive(),
};

export const navigateActionSchema = z.object({
  ...baseFields,
  type: z.literal('navigate'),
  url: z.string().url(),
});

export const clickActionSchema = z.object({
  ...baseFields,
  type: z.literal('click'),
  selector: z.string().min(1),
});

export const fillActionSchema = z.object({
  ...baseFields,
  type: z.literal('fill'),
  selector: z.string().min(1),
  text: z.string(),
});

export const switchTabActionSchema = z.object({
  ...baseFields,
  type: z.literal('switch_tab'),
  pageId: z.number().int().nonnegative(),
});

export const doneActionSchema = z.object({
  ...baseFields,
  type: z.literal('done'),
  success: z.boolean(),
  text: z.string(),
});

export const skippedActionSchema = z.object({
  ...baseFields,
  type: z.literal('skipped'),
  name: z.string().min(1),
  reason: z.string(),
});

// ── Union schema ────────────────────────────────────────────

export const replayActionSchema = z.discriminatedUnion('type', [
  navigateActionSchema,
  clickActionSchema,
  fillActionSchema,
  switchTabActionSchema,
  doneActionSchema,
  skippedActionSchema,
]);

export type ReplayAction = z.infer<typeof replayActionSchema>;
export type NavigateAction = z.infer<typeof navigateActionSchema>;
export type ClickAction = z.infer<typeof clickActionSchema>;
export type FillAction = z.infer<typeof fillActionSchema>;
export type SwitchTabAction = z.infer<typeof switchTabActionSchema>;
export type DoneAction = z.infer<typeof doneActionSchema>;
export type SkippedAction = z.infer<typeof skippedActionSchema>;

// ── Script document ─────────────────────────────────────────

export const replayScriptSchema = z.object({
  version: z.literal(REPLAY_SCRIPT_VERSION),
  task: z.string(),
  createdAt: z.string().datetime(),
  sensitiveDataKeys: z.array(z.string()),
  actions: z.array(replayActionSchema),
});

export type ReplayScript = z.infer<typeof replayScriptSchema>;

// ── Parser ──────────────────────────────────────────────────

export function parseReplayScriptJSON(raw: string): ReplayScript {
  const parsed: unknown = JSON.parse(raw);
  return replayScriptSchema.parse(parsed);
}

/** Label used in progress lines, e.g. `Step 2, Action 1`. */
export function describeActionPosition(action: ReplayAction): string {
  return `Step ${String(action.step)}, Action ${String(action.action)}`;
}
