import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { LLMClient } from '../llm/index.js';
import type {
  ActionResult,
  AgentAction,
  AgentHistory,
  AgentHistoryStep,
  AgentModelOutput,
  ExecutedAction,
  PageSnapshot,
} from '../schema/index.js';
import { agentModelOutputSchema } from '../schema/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { AgentBrowser } from '../browser/runner.js';
import { assertUrlAllowed } from '../browser/domains.js';
import { replaceSensitiveData } from '../utils/secrets.js';
import type { SensitiveDataMap } from '../utils/secrets.js';
import * as log from '../utils/logger.js';
import { buildStepPrompt, buildSystemPrompt, loadPromptTemplate } from './prompts.js';

// ── Public types ─────────────────────────────────────────────

export interface AgentConfig {
  task: string;
  /** Opened before the first model call and recorded as step 1. */
  startUrl?: string | undefined;
  allowedDomains: readonly string[];
  maxSteps?: number | undefined;
  maxActionsPerStep?: number | undefined;
  useVision?: boolean | undefined;
  conversationPath?: string | undefined;
  sensitiveData?: SensitiveDataMap | undefined;
  totalTimeout?: number | undefined;
}

// ── Error ────────────────────────────────────────────────────

export class AgentResponseError extends Error {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'AgentResponseError';
    this.raw = raw;
  }
}

// ── JSON extraction ─────────────────────────────────────────

export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

// ── Pre-validation fixups ────────────────────────────────────
// Models often answer in the keyed form `{"click_element": {"index": 3}}`
// or with snake_case fields. Normalise before Zod validation.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const FIELD_ALIASES: Readonly<Record<string, string>> = {
  next_goal: 'nextGoal',
  evaluation_previous_goal: 'evaluation',
  page_id: 'pageId',
  action: 'actions',
};

function renameFields(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[FIELD_ALIASES[key] ?? key] = value;
  }
  return out;
}

function fixupAction(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  if ('type' in raw) return renameFields(raw);

  const keys = Object.keys(raw);
  const only = keys[0];
  if (keys.length === 1 && only !== undefined) {
    const params = raw[only];
    return renameFields({ type: only, ...(isRecord(params) ? params : {}) });
  }
  return raw;
}

export function fixupModelOutput(parsed: unknown): unknown {
  if (!isRecord(parsed)) return parsed;

  const obj = renameFields(parsed);
  const current = isRecord(obj['current_state']) ? renameFields(obj['current_state']) : {};
  const actions = obj['actions'];

  return {
    ...current,
    ...obj,
    actions: Array.isArray(actions) ? actions.map(fixupAction) : actions,
  };
}

export function parseModelOutput(raw: string): AgentModelOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch {
    throw new AgentResponseError(`Agent returned invalid JSON: ${raw.slice(0, 200)}`, raw);
  }

  const result = agentModelOutputSchema.safeParse(fixupModelOutput(parsed));
  if (!result.success) {
    throw new AgentResponseError(
      `Agent response validation failed: ${result.error.message}`,
      raw,
    );
  }
  return result.data;
}

// ── Action execution ─────────────────────────────────────────

interface ActionContext {
  browser: AgentBrowser;
  snapshot: PageSnapshot;
  allowedDomains: readonly string[];
  sensitiveData: SensitiveDataMap;
}

function elementXPath(snapshot: PageSnapshot, action: AgentAction): string | undefined {
  if (action.type !== 'click_element' && action.type !== 'input_text') return undefined;
  return snapshot.elements.find((el) => el.index === action.index)?.xpath;
}

function requireXPath(xpath: string | undefined, index: number): string {
  if (xpath === undefined) {
    throw new Error(`Element with index ${String(index)} does not exist on the page`);
  }
  return xpath;
}

interface Performed {
  result: ActionResult;
  openedPageId?: number | undefined;
}

function succeeded(): Performed {
  return { result: { success: true, isDone: false } };
}

async function performAction(
  action: AgentAction,
  xpath: string | undefined,
  ctx: ActionContext,
): Promise<Performed> {
  switch (action.type) {
    case 'go_to_url':
      assertUrlAllowed(action.url, ctx.allowedDomains);
      await ctx.browser.goTo(action.url);
      return succeeded();

    case 'open_tab':
      assertUrlAllowed(action.url, ctx.allowedDomains);
      await ctx.browser.openTab(action.url);
      return succeeded();

    case 'click_element': {
      const openedPageId = await ctx.browser.click(requireXPath(xpath, action.index));
      if (openedPageId !== undefined) {
        log.detail(`Click opened tab ${String(openedPageId)}; continuing there`);
      }
      return { ...succeeded(), openedPageId };
    }

    case 'input_text':
      await ctx.browser.fill(
        requireXPath(xpath, action.index),
        replaceSensitiveData(action.text, ctx.sensitiveData),
      );
      return succeeded();

    case 'switch_tab':
      await ctx.browser.switchTab(action.pageId);
      return succeeded();

    case 'extract_content': {
      const text = await ctx.browser.extractText();
      return {
        result: {
          success: true,
          isDone: false,
          extractedContent: `Page content for "${action.goal}":\n${text}`,
        },
      };
    }

    case 'done':
      return { result: { success: true, isDone: true, extractedContent: action.text } };
  }
}

/** Run one model action against the browser and describe what happened. */
export async function executeAgentAction(
  action: AgentAction,
  ctx: ActionContext,
): Promise<ExecutedAction> {
  const xpath = elementXPath(ctx.snapshot, action);

  let performed: Performed;
  try {
    performed = await performAction(action, xpath, ctx);
  } catch (err) {
    const message = err instanceof Error ? (err.message.split('\n')[0] ?? err.message) : String(err);
    performed = { result: { success: false, isDone: false, error: message } };
  }

  return {
    action,
    result: performed.result,
    ...(xpath !== undefined ? { xpath } : {}),
    ...(performed.openedPageId !== undefined ? { openedPageId: performed.openedPageId } : {}),
  };
}

// ── Conversation log ─────────────────────────────────────────

async function appendConversation(
  filePath: string,
  stepNumber: number,
  parts: readonly (readonly [string, string])[],
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const body = parts.map(([title, text]) => `--- ${title} ---\n${text}\n`).join('');
  await appendFile(filePath, `=== Step ${String(stepNumber)} ===\n${body}\n`, 'utf-8');
}

// ── Main agent loop ──────────────────────────────────────────

/**
 * Observe-decide-act loop. Returns the full history; never throws for
 * browser or model failures, which are recorded on the step instead.
 */
export async function runAgent(
  client: LLMClient,
  browser: AgentBrowser,
  config: AgentConfig,
): Promise<AgentHistory> {
  const maxSteps = config.maxSteps ?? LIMITS.MAX_STEPS;
  const maxActions = config.maxActionsPerStep ?? LIMITS.MAX_ACTIONS_PER_STEP;
  const sensitiveData = config.sensitiveData ?? {};
  const deadline = Date.now() + (config.totalTimeout ?? TIMEOUTS.TOTAL_RUN_TIMEOUT);

  const systemPrompt = buildSystemPrompt(await loadPromptTemplate('agent_system.txt'), {
    maxActionsPerStep: maxActions,
    allowedDomains: config.allowedDomains,
    sensitiveDataKeys: Object.keys(sensitiveData),
  });
  const stepTemplate = await loadPromptTemplate('agent_step.txt');

  const steps: AgentHistoryStep[] = [];
  let consecutiveFailures = 0;

  log.section(`Agent: ${config.task}`);

  // ── 1. Initial navigation ──────────────────────────────────

  if (config.startUrl) {
    log.info(`Navigating to ${config.startUrl}`);
    const startedAt = new Date().toISOString();
    const executed = await executeAgentAction(
      { type: 'go_to_url', url: config.startUrl },
      {
        browser,
        snapshot: emptySnapshot(browser.currentUrl()),
        allowedDomains: config.allowedDomains,
        sensitiveData,
      },
    );
    if (!executed.result.success) {
      log.warn(`Initial navigation failed: ${executed.result.error ?? 'unknown error'}`);
    }
    steps.push({
      stepNumber: 1,
      url: browser.currentUrl(),
      title: '',
      modelOutput: null,
      actions: [executed],
      startedAt,
      finishedAt: new Date().toISOString(),
    });
  }

  // ── 2. Observe-decide-act ──────────────────────────────────

  for (let i = 0; i < maxSteps; i++) {
    if (Date.now() > deadline) {
      log.warn('Timeout reached — stopping agent');
      break;
    }

    const stepNumber = steps.length + 1;
    const startedAt = new Date().toISOString();

    // OBSERVE
    let snapshot: PageSnapshot;
    try {
      snapshot = await browser.observe();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error(`Could not read the page: ${msg}`);
      break;
    }

    const screenshot = config.useVision ? await browser.screenshot() : undefined;

    // DECIDE
    log.llm(`Agent deciding step ${String(i + 1)}/${String(maxSteps)}...`);
    const userPrompt = buildStepPrompt(stepTemplate, {
      task: config.task,
      stepNumber: i + 1,
      maxSteps,
      snapshot,
      history: steps,
    });

    let raw = '';
    let modelOutput: AgentModelOutput;
    try {
      raw =
        screenshot !== undefined && client.generateWithImage
          ? await client.generateWithImage(systemPrompt, userPrompt, screenshot, 'image/png')
          : await client.generate(systemPrompt, userPrompt);
      modelOutput = parseModelOutput(raw);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error(`Agent decision failed: ${msg}`);
      steps.push({
        stepNumber,
        url: snapshot.url,
        title: snapshot.title,
        modelOutput: null,
        actions: [],
        error: msg,
        startedAt,
        finishedAt: new Date().toISOString(),
      });
      await logConversation(config.conversationPath, stepNumber, i === 0, systemPrompt, userPrompt, raw || msg);
      if (++consecutiveFailures >= LIMITS.MAX_CONSECUTIVE_FAILURES) {
        log.error(`Stopping after ${String(consecutiveFailures)} consecutive failures`);
        break;
      }
      continue;
    }

    await logConversation(config.conversationPath, stepNumber, i === 0, systemPrompt, userPrompt, raw);

    if (modelOutput.nextGoal) {
      log.detail(`Next goal: ${modelOutput.nextGoal}`);
    }

    // ACT
    const actions = modelOutput.actions.slice(0, maxActions);
    if (modelOutput.actions.length > maxActions) {
      log.warn(
        `Model proposed ${String(modelOutput.actions.length)} actions; running the first ${String(maxActions)}`,
      );
    }

    const executed: ExecutedAction[] = [];
    for (const [j, action] of actions.entries()) {
      const urlBefore = browser.currentUrl();
      const result = await executeAgentAction(action, {
        browser,
        snapshot,
        allowedDomains: config.allowedDomains,
        sensitiveData,
      });
      executed.push(result);

      log.stepResult(
        j,
        actions.length,
        result.result.success,
        `${action.type}${result.result.error ? ` — ${result.result.error}` : ''}`,
      );

      if (!result.result.success || result.result.isDone) break;

      // Element indexes are stale once the page changes.
      if (j < actions.length - 1 && browser.currentUrl() !== urlBefore) {
        log.detail('Page changed — skipping the remaining actions of this step');
        break;
      }
    }

    steps.push({
      stepNumber,
      url: snapshot.url,
      title: snapshot.title,
      modelOutput,
      actions: executed,
      startedAt,
      finishedAt: new Date().toISOString(),
    });

    const last = executed[executed.length - 1];
    if (last?.result.isDone) {
      log.info(`Agent says done: ${last.result.extractedContent ?? ''}`);
      break;
    }

    if (executed.some((e) => !e.result.success)) {
      if (++consecutiveFailures >= LIMITS.MAX_CONSECUTIVE_FAILURES) {
        log.error(`Stopping after ${String(consecutiveFailures)} consecutive failures`);
        break;
      }
    } else {
      consecutiveFailures = 0;
    }
  }

  return { task: config.task, steps };
}

// ── Helpers ──────────────────────────────────────────────────

function emptySnapshot(url: string): PageSnapshot {
  return { url, title: '', visibleText: '', elements: [], tabs: [] };
}

async function logConversation(
  filePath: string | undefined,
  stepNumber: number,
  includeSystem: boolean,
  systemPrompt: string,
  userPrompt: string,
  response: string,
): Promise<void> {
  if (!filePath) return;

  const parts: (readonly [string, string])[] = [];
  if (includeSystem) parts.push(['system', systemPrompt]);
  parts.push(['user', userPrompt], ['response', response]);

  try {
    await appendConversation(filePath, stepNumber, parts);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    log.warn(`Could not write conversation log: ${msg}`);
  }
}
