import type {
  AgentAction,
  AgentHistory,
  ExecutedAction,
  AgentModelOutput,
} from '../schema/index.js';

// ── History queries ──────────────────────────────────────────
// Read-only views over a recorded agent run.

function allActions(history: AgentHistory): ExecutedAction[] {
  return history.steps.flatMap((s) => s.actions);
}

function lastAction(history: AgentHistory): ExecutedAction | undefined {
  const actions = allActions(history);
  return actions[actions.length - 1];
}

/** The agent's last recorded action reported the task as done. */
export function isDone(history: AgentHistory): boolean {
  return lastAction(history)?.result.isDone ?? false;
}

/**
 * The agent's own verdict from its final `done` action,
 * or `null` when the run never finished.
 */
export function isSuccessful(history: AgentHistory): boolean | null {
  const last = lastAction(history);
  if (!last || !last.result.isDone || last.action.type !== 'done') return null;
  return last.action.success;
}

export function finalResult(history: AgentHistory): string | null {
  const last = lastAction(history);
  return last?.result.extractedContent ?? null;
}

/** Per-step error, or `null` for steps that ran cleanly. */
export function errors(history: AgentHistory): (string | null)[] {
  return history.steps.map((s) => {
    if (s.error !== undefined) return s.error;
    const failed = s.actions.find((a) => a.result.error !== undefined);
    return failed?.result.error ?? null;
  });
}

export function hasErrors(history: AgentHistory): boolean {
  return errors(history).some((e) => e !== null);
}

export function urls(history: AgentHistory): string[] {
  return history.steps.map((s) => s.url);
}

export function actionNames(history: AgentHistory): AgentAction['type'][] {
  return allActions(history).map((a) => a.action.type);
}

export function modelThoughts(
  history: AgentHistory,
): Pick<AgentModelOutput, 'evaluation' | 'memory' | 'nextGoal'>[] {
  return history.steps.flatMap((s) =>
    s.modelOutput
      ? [
          {
            evaluation: s.modelOutput.evaluation,
            memory: s.modelOutput.memory,
            nextGoal: s.modelOutput.nextGoal,
          },
        ]
      : [],
  );
}

export function modelActions(history: AgentHistory): AgentAction[] {
  return allActions(history).map((a) => a.action);
}

export function extractedContent(history: AgentHistory): string[] {
  return allActions(history).flatMap((a) =>
    a.result.extractedContent !== undefined ? [a.result.extractedContent] : [],
  );
}

export function totalActions(history: AgentHistory): number {
  return allActions(history).length;
}
