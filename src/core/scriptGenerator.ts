import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type {
  AgentHistory,
  ExecutedAction,
  ReplayAction,
  ReplayScript,
} from '../schema/index.js';
import { REPLAY_SCRIPT_VERSION, parseReplayScriptJSON } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export interface ScriptGeneratorOptions {
  sensitiveDataKeys?: readonly string[];
  /** Injected for deterministic output in tests. */
  now?: Date;
}

export class ScriptNotFoundError extends Error {
  readonly scriptPath: string;

  constructor(scriptPath: string) {
    super(`Replay script not found at ${scriptPath}`);
    this.name = 'ScriptNotFoundError';
    this.scriptPath = scriptPath;
  }
}

// ── Generator ────────────────────────────────────────────────

/**
 * Turn a recorded agent run into a replay script.
 * Only actions that ran successfully are replayed; element actions
 * use the absolute XPath recorded when the agent performed them. A click
 * that opened a tab is followed by a `switch_tab` to it.
 */
export function generateReplayScript(
  history: AgentHistory,
  options: ScriptGeneratorOptions = {},
): ReplayScript {
  const actions: ReplayAction[] = [];

  for (const step of history.steps) {
    let position = 0;
    for (const executed of step.actions) {
      if (!executed.result.success) continue;
      actions.push(toReplayAction(executed, step.stepNumber, ++position));

      // The agent followed a tab this action opened; the replay must too.
      if (executed.openedPageId !== undefined) {
        actions.push({
          step: step.stepNumber,
          action: ++position,
          type: 'switch_tab',
          pageId: executed.openedPageId,
        });
      }
    }
  }

  return {
    version: REPLAY_SCRIPT_VERSION,
    task: history.task,
    createdAt: (options.now ?? new Date()).toISOString(),
    sensitiveDataKeys: [...(options.sensitiveDataKeys ?? [])],
    actions,
  };
}

function toReplayAction(
  executed: ExecutedAction,
  step: number,
  action: number,
): ReplayAction {
  const position = { step, action };
  const { action: agentAction, xpath } = executed;

  switch (agentAction.type) {
    case 'go_to_url':
    case 'open_tab':
      return { ...position, type: 'navigate', url: agentAction.url };

    case 'click_element':
      return xpath !== undefined
        ? { ...position, type: 'click', selector: `xpath=${xpath}` }
        : skipped(position, agentAction.type, 'no element XPath was recorded');

    case 'input_text':
      return xpath !== undefined
        ? { ...position, type: 'fill', selector: `xpath=${xpath}`, text: agentAction.text }
        : skipped(position, agentAction.type, 'no element XPath was recorded');

    case 'switch_tab':
      return { ...position, type: 'switch_tab', pageId: agentAction.pageId };

    case 'extract_content':
      return skipped(position, agentAction.type, `goal: ${agentAction.goal}`);

    case 'done':
      return { ...position, type: 'done', success: agentAction.success, text: agentAction.text };
  }
}

function skipped(
  position: { step: number; action: number },
  name: string,
  reason: string,
): ReplayAction {
  return { ...position, type: 'skipped', name, reason };
}

// ── Persistence ──────────────────────────────────────────────

export async function writeReplayScript(
  scriptPath: string,
  script: ReplayScript,
): Promise<void> {
  await mkdir(path.dirname(scriptPath), { recursive: true });
  await writeFile(scriptPath, JSON.stringify(script, null, 2) + '\n', 'utf-8');
}

export async function readReplayScript(scriptPath: string): Promise<ReplayScript> {
  let raw: string;
  try {
    raw = await readFile(scriptPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ScriptNotFoundError(scriptPath);
    }
    throw err;
  }
  return parseReplayScriptJSON(raw);
}
