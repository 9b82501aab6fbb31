import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { buildSuffixSelector, parseAbsoluteXPath } from './xpath.js';

// ── Public types ─────────────────────────────────────────────

export type ActionKind = 'click' | 'fill';

export type ActionErrorKind =
  | 'no_fallback_for_selector_kind'
  | 'all_fallbacks_exhausted'
  | 'invalid_action';

export interface AttemptRecord {
  /** 0 for the original selector, `i` for the fallback that drops `i` steps. */
  index: number;
  selector: string;
  timeout: number;
  outcome: 'success' | 'failed';
  error?: string;
}

export interface FallbackCandidate {
  index: number;
  selector: string;
  timeout: number;
  isFallback: boolean;
}

export type AttemptFn = (candidate: FallbackCandidate) => Promise<void>;

export interface FallbackOptions {
  action: ActionKind;
  label: string;
  maxFallbacks?: number;
  initialTimeout?: number;
  fallbackTimeout?: number;
}

export interface ActionOutcome {
  /** Selector that finally worked. */
  selector: string;
  attempts: AttemptRecord[];
}

/** The slice of a Playwright locator the executor drives. */
export interface ActionLocator {
  click(options: { timeout: number }): Promise<void>;
  fill(value: string, options: { timeout: number }): Promise<void>;
  clear(options: { timeout: number }): Promise<void>;
}

/** The slice of a Playwright page the executor drives. */
export interface ActionPage {
  locator(selector: string): { first(): ActionLocator };
  waitForTimeout(timeout: number): Promise<void>;
}

export interface ActOptions {
  text?: string | undefined;
  label?: string;
  maxFallbacks?: number;
}

// ── Error ─────────────────────────────────────────────────────

export class ActionError extends Error {
  readonly kind: ActionErrorKind;
  readonly action: string;
  readonly selector: string;
  readonly label: string;
  readonly attempts: readonly AttemptRecord[];

  constructor(
    kind: ActionErrorKind,
    action: string,
    selector: string,
    label: string,
    attempts: readonly AttemptRecord[],
    reason: string,
  ) {
    super(`Action '${action}' failed. ${reason} (${label})`);
    this.name = 'ActionError';
    this.kind = kind;
    this.action = action;
    this.selector = selector;
    this.label = label;
    this.attempts = attempts;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }
}

// ── Retry core ────────────────────────────────────────────────

/**
 * Try `selector`, then progressively shorter suffix-anchored variants of it.
 *
 * Fallback only applies to absolute XPath selectors: with `k` steps there are
 * at most `min(maxFallbacks, k - 1)` fallbacks, each dropping one more
 * leading step than the last. The callback performs the interaction and
 * rejects on failure.
 */
export async function runWithFallback(
  selector: string,
  attempt: AttemptFn,
  options: FallbackOptions,
): Promise<ActionOutcome> {
  const { action, label } = options;
  const maxFallbacks = options.maxFallbacks ?? LIMITS.MAX_FALLBACKS;
  const initialTimeout = options.initialTimeout ?? TIMEOUTS.INITIAL_ACTION;
  const fallbackTimeout = options.fallbackTimeout ?? TIMEOUTS.FALLBACK_ACTION;
  const attempts: AttemptRecord[] = [];

  log.attempt(`Attempting ${action} (${label}) using selector: ${JSON.stringify(selector)}`);

  try {
    await attempt({ index: 0, selector, timeout: initialTimeout, isFallback: false });
    attempts.push({ index: 0, selector, timeout: initialTimeout, outcome: 'success' });
    log.detail(`Action '${action}' successful with original selector.`);
    return { selector, attempts };
  } catch (err) {
    const message = errorMessage(err);
    attempts.push({ index: 0, selector, timeout: initialTimeout, outcome: 'failed', error: message });
    log.warn(`Action '${action}' failed with original selector (${JSON.stringify(selector)}): ${message}`);
  }

  const parsed = parseAbsoluteXPath(selector);
  if (!parsed) {
    throw new ActionError(
      'no_fallback_for_selector_kind',
      action,
      selector,
      label,
      attempts,
      `Fallback not possible for non-XPath selector: ${JSON.stringify(selector)}.`,
    );
  }

  const limit = Math.min(maxFallbacks, parsed.segments.length - 1);
  if (limit > 0) {
    log.detail(`Starting fallback (${String(limit)} candidate(s))...`);
  }

  for (let i = 1; i <= limit; i++) {
    const candidate = buildSuffixSelector(parsed, i);
    log.fallback(`Fallback attempt ${String(i)}/${String(limit)}: trying ${JSON.stringify(candidate)}`);

    try {
      await attempt({ index: i, selector: candidate, timeout: fallbackTimeout, isFallback: true });
      attempts.push({ index: i, selector: candidate, timeout: fallbackTimeout, outcome: 'success' });
      log.fallback(`Action '${action}' successful with fallback selector: ${JSON.stringify(candidate)}`);
      return { selector: candidate, attempts };
    } catch (err) {
      const message = errorMessage(err);
      attempts.push({
        index: i,
        selector: candidate,
        timeout: fallbackTimeout,
        outcome: 'failed',
        error: message,
      });
      log.fallback(`Fallback attempt ${String(i)} failed: ${message}`);
    }
  }

  throw new ActionError(
    'all_fallbacks_exhausted',
    action,
    selector,
    label,
    attempts,
    `Gave up after ${String(attempts.length)} attempt(s) (${String(limit)} fallback(s)). Original selector: ${JSON.stringify(selector)}.`,
  );
}

// ── Page-level executor ──────────────────────────────────────

/**
 * Click or fill the first element matching `selector`, falling back to
 * trimmed XPath variants. Waits the settle interval after success.
 */
export async function tryLocateAndAct(
  page: ActionPage,
  selector: string,
  action: ActionKind,
  options: ActOptions = {},
): Promise<ActionOutcome> {
  const label = options.label ?? '';
  const perform = resolvePerform(page, selector, action, options.text, label);

  const outcome = await runWithFallback(selector, perform, {
    action,
    label,
    ...(options.maxFallbacks !== undefined ? { maxFallbacks: options.maxFallbacks } : {}),
  });

  await page.waitForTimeout(TIMEOUTS.ACTION_SETTLE);
  return outcome;
}

function resolvePerform(
  page: ActionPage,
  selector: string,
  action: string,
  text: string | undefined,
  label: string,
): AttemptFn {
  if (action === 'click') {
    return async ({ selector: candidate, timeout }) => {
      await page.locator(candidate).first().click({ timeout });
    };
  }

  if (action === 'fill' && text !== undefined) {
    return async ({ selector: candidate, timeout, isFallback }) => {
      const locator = page.locator(candidate).first();
      if (isFallback) {
        try {
          await locator.clear({ timeout });
          await page.waitForTimeout(TIMEOUTS.CLEAR_SETTLE);
        } catch (err) {
          log.warn(`Failed to clear field during fallback (${label}): ${errorMessage(err)}`);
        }
      }
      await locator.fill(text, { timeout });
    };
  }

  throw new ActionError(
    'invalid_action',
    action,
    selector,
    label,
    [],
    `Invalid action type '${action}' or missing text for fill.`,
  );
}

// ── Helpers ──────────────────────────────────────────────────

function errorMessage(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  // Playwright errors carry a multi-line call log; the first line is enough.
  return message.split('\n')[0] ?? message;
}
