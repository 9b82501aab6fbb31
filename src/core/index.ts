/**
 * Core orchestration module.
 * Agent loop → replay script → replay (in process or as a child process).
 */

export { runAgent, parseModelOutput, executeAgentAction, AgentResponseError } from './agent.js';
export type { AgentConfig } from './agent.js';
export {
  generateReplayScript,
  writeReplayScript,
  readReplayScript,
  ScriptNotFoundError,
} from './scriptGenerator.js';
export type { ScriptGeneratorOptions } from './scriptGenerator.js';
export { runReplayScript, runReplayAction } from './replay.js';
export type {
  ReplayConfig,
  ReplayBrowser,
  ReplayBrowserLauncher,
  ReplayContext,
  ReplayPage,
} from './replay.js';
export { runReplayInSubprocess, streamLines } from './subprocess.js';
export type { SubprocessOptions, LineSink } from './subprocess.js';
export * as history from './history.js';
