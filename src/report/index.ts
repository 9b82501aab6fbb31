/**
 * Report generation module.
 * Deterministic — no LLM calls.
 * Turns a recorded agent history into JSON output and console summaries.
 */

export {
  generateJSON,
  serializeJSON,
  describeOutcome,
  formatHistorySummary,
} from './reporter.js';
export type { JsonOutput, JsonOutputStep, RunOutcome } from './reporter.js';
