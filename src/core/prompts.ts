import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { AgentHistoryStep, PageSnapshot } from '../schema/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';
import { formatElement } from '../browser/prescan.js';
import { secretPlaceholder } from '../utils/secrets.js';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

export async function loadPromptTemplate(name: string): Promise<string> {
  return readFile(path.join(PROMPTS_DIR, name), 'utf-8');
}

/** Substitute every `{{key}}`; unknown keys are left as-is. */
export function fillTemplate(
  template: string,
  vars: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}

// ── System prompt ────────────────────────────────────────────

export interface SystemPromptInput {
  maxActionsPerStep: number;
  allowedDomains: readonly string[];
  sensitiveDataKeys: readonly string[];
}

export function buildSystemPrompt(template: string, input: SystemPromptInput): string {
  return fillTemplate(template, {
    maxActions: String(input.maxActionsPerStep),
    allowedDomains:
      input.allowedDomains.length > 0 ? input.allowedDomains.join(', ') : '(any)',
    secrets:
      input.sensitiveDataKeys.length > 0
        ? input.sensitiveDataKeys.map(secretPlaceholder).join(', ')
        : '(none)',
  });
}

// ── Step prompt ──────────────────────────────────────────────

export interface StepPromptInput {
  task: string;
  stepNumber: number;
  maxSteps: number;
  snapshot: PageSnapshot;
  history: readonly AgentHistoryStep[];
}

export function buildStepPrompt(template: string, input: StepPromptInput): string {
  const { snapshot } = input;

  const tabs =
    snapshot.tabs.length > 0
      ? snapshot.tabs.map((t) => `  ${String(t.pageId)}: ${t.url}`).join('\n')
      : '  (none)';

  const elements =
    snapshot.elements.length > 0
      ? snapshot.elements.map(formatElement).join('\n')
      : '(no interactive elements found)';

  return fillTemplate(template, {
    task: input.task,
    step: String(input.stepNumber),
    maxSteps: String(input.maxSteps),
    history: formatHistory(input.history),
    url: snapshot.url,
    tabs,
    title: snapshot.title,
    elements,
    visibleText: snapshot.visibleText.slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS),
  });
}

// ── History formatting ──────────────────────────────────────

export function formatHistory(history: readonly AgentHistoryStep[]): string {
  if (history.length === 0) return '(no actions taken yet)';

  return history
    .map((step) => {
      const goal = step.modelOutput?.nextGoal ? ` ${step.modelOutput.nextGoal}` : '';
      const lines = [`${String(step.stepNumber)}.${goal}`];

      if (step.error !== undefined) {
        lines.push(`   ✗ ${step.error}`);
      }
      for (const executed of step.actions) {
        const icon = executed.result.success ? '✓' : '✗';
        const note = executed.result.error ?? executed.result.extractedContent ?? '';
        lines.push(
          `   ${icon} ${JSON.stringify(executed.action)}${note ? ` → ${note.slice(0, 200)}` : ''}`,
        );
      }
      return lines.join('\n');
    })
    .join('\n');
}
