import { z } from 'zod';

// ── Agent actions ───────────────────────────────────────────

const goToUrlSchema = z.object({
  type: z.literal('go_to_url'),
  url: z.string().url(),
});

const openTabSchema = z.object({
  type: z.literal('open_tab'),
  url: z.string().url(),
});

const clickElementSchema = z.object({
  type: z.literal('click_element'),
  index: z.number().int().nonnegative(),
});

const inputTextSchema = z.object({
  type: z.literal('input_text'),
  index: z.number().int().nonnegative(),
  text: z.string(),
});

const switchTabSchema = z.object({
  type: z.literal('switch_tab'),
  pageId: z.number().int().nonnegative(),
});

const extractContentSchema = z.object({
  type: z.literal('extract_content'),
  goal: z.string().min(1),
});

const doneSchema = z.object({
  type: z.literal('done'),
  success: z.boolean(),
  text: z.string(),
});

export const agentActionSchema = z.discriminatedUnion('type', [
  goToUrlSchema,
  openTabSchema,
  clickElementSchema,
  inputTextSchema,
  switchTabSchema,
  extractContentSchema,
  doneSchema,
]);

export type AgentAction = z.infer<typeof agentActionSchema>;
export type AgentActionType = AgentAction['type'];

// ── Model output for one step ───────────────────────────────

export const agentModelOutputSchema = z.object({
  evaluation: z.string().optional().default(''),
  memory: z.string().optional().default(''),
  nextGoal: z.string().optional().default(''),
  actions: z.array(agentActionSchema).min(1),
});

export type AgentModelOutput = z.infer<typeof agentModelOutputSchema>;

// ── Action result ───────────────────────────────────────────

export const actionResultSchema = z.object({
  success: z.boolean(),
  isDone: z.boolean(),
  error: z.string().optional(),
  extractedContent: z.string().optional(),
});

export type ActionResult = z.infer<typeof actionResultSchema>;

// ── History ─────────────────────────────────────────────────

export const executedActionSchema = z.object({
  action: agentActionSchema,
  result: actionResultSchema,
  /** Absolute XPath of the element an indexed action interacted with. */
  xpath: z.string().optional(),
  /** Page id of a tab the action opened and switched to. */
  openedPageId: z.number().int().nonnegative().optional(),
});

export type ExecutedAction = z.infer<typeof executedActionSchema>;

export const agentHistoryStepSchema = z.object({
  stepNumber: z.number().int().positive(),
  url: z.string(),
  title: z.string(),
  modelOutput: agentModelOutputSchema.nullable(),
  actions: z.array(executedActionSchema),
  /** Set when the step produced no actions (e.g. invalid model output). */
  error: z.string().optional(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
});

export type AgentHistoryStep = z.infer<typeof agentHistoryStepSchema>;

export const agentHistorySchema = z.object({
  task: z.string(),
  steps: z.array(agentHistoryStepSchema),
});

export type AgentHistory = z.infer<typeof agentHistorySchema>;
