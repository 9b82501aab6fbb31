/**
 * Browser module.
 * Playwright session for the agent, page prescan, and the fallback
 * action executor used by replay scripts.
 */

export { tryLocateAndAct, runWithFallback, ActionError } from './fallback.js';
export type {
  ActionKind,
  ActionErrorKind,
  ActionOutcome,
  ActionPage,
  ActionLocator,
  AttemptRecord,
  FallbackCandidate,
  FallbackOptions,
} from './fallback.js';
export { isXPathSelector, parseAbsoluteXPath, buildSuffixSelector, splitSteps } from './xpath.js';
export type { ParsedXPathSelector } from './xpath.js';
export { isUrlAllowed, assertUrlAllowed, DomainNotAllowedError } from './domains.js';
export { launchSession, launchBrowser } from './runner.js';
export type { RunnerConfig, AgentBrowser, BrowserSession } from './runner.js';
export { prescanCurrentPage, formatElement } from './prescan.js';
