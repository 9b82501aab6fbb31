import type { AgentHistory, AgentHistoryStep } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputStep } from '../schema/jsonOutput.js';
import * as history from '../core/history.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputStep };

export interface RunOutcome {
  scriptPath: string | null;
  replayExitCode: number | null;
  exitCode: number;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: AgentHistory, outcome: RunOutcome): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    task: run.task,
    done: history.isDone(run),
    successful: history.isSuccessful(run),
    finalResult: history.finalResult(run),
    urls: history.urls(run),
    steps: run.steps.map(stepToJSON),
    scriptPath: outcome.scriptPath,
    replayExitCode: outcome.replayExitCode,
    exitCode: outcome.exitCode,
  };
}

function stepToJSON(step: AgentHistoryStep): JsonOutputStep {
  const errors = step.actions.flatMap((a) =>
    a.result.error !== undefined ? [a.result.error] : [],
  );
  if (step.error !== undefined) errors.unshift(step.error);

  return {
    stepNumber: step.stepNumber,
    url: step.url,
    nextGoal: step.modelOutput?.nextGoal ?? '',
    actions: step.actions.map((a) => a.action.type),
    errors,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Human-readable history ───────────────────────────────────

/** Outcome line for the end of an agent run; lists step errors unless it succeeded. */
export function describeOutcome(run: AgentHistory): string {
  const successful = history.isSuccessful(run);
  if (successful === true) {
    return `Agent completed the task successfully. Final result: ${history.finalResult(run) ?? ''}`;
  }
  if (run.steps.length === 0) {
    return 'Agent run did not record any steps.';
  }
  const outcome = 'Agent finished, but the task might not be fully successful.';
  if (!history.hasErrors(run)) return outcome;

  const errors = history.errors(run).filter((e): e is string => e !== null);
  return `${outcome} Errors encountered: ${errors.join('; ')}`;
}

/** Full history dump, one labelled block per query. */
export function formatHistorySummary(run: AgentHistory): string[] {
  const lines: string[] = [];

  lines.push('Model thoughts:');
  for (const [i, thought] of history.modelThoughts(run).entries()) {
    lines.push(`  ${String(i + 1)}. eval: ${thought.evaluation} | memory: ${thought.memory} | next: ${thought.nextGoal}`);
  }

  lines.push(`Visited URLs: ${history.urls(run).join(', ')}`);
  lines.push(`Executed action names: ${history.actionNames(run).join(', ')}`);

  lines.push('Model actions:');
  for (const action of history.modelActions(run)) {
    lines.push(`  ${JSON.stringify(action)}`);
  }

  lines.push('Extracted content:');
  for (const content of history.extractedContent(run)) {
    lines.push(`  ${content.replace(/\n/g, ' ').slice(0, 300)}`);
  }

  lines.push(`Final result: ${history.finalResult(run) ?? '(none)'}`);

  if (history.hasErrors(run)) {
    lines.push('Errors:');
    for (const [i, err] of history.errors(run).entries()) {
      if (err !== null) lines.push(`  step ${String(i + 1)}: ${err}`);
    }
  }

  return lines;
}
