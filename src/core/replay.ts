import type { ReplayAction, ReplayScript } from '../schema/index.js';
import { describeActionPosition } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { ActionError, tryLocateAndAct } from '../browser/fallback.js';
import type { ActionPage } from '../browser/fallback.js';
import { launchBrowser } from '../browser/runner.js';
import { replaceSensitiveData } from '../utils/secrets.js';
import type { SensitiveDataMap } from '../utils/secrets.js';
import * as log from '../utils/logger.js';

// ── Browser seam ─────────────────────────────────────────────
// Structural slices of Playwright's Browser / BrowserContext / Page.

export interface ReplayPage extends ActionPage {
  goto(url: string, options: { timeout: number }): Promise<unknown>;
  waitForLoadState(state: 'load', options: { timeout: number }): Promise<void>;
  bringToFront(): Promise<void>;
}

export interface ReplayContext {
  pages(): ReplayPage[];
  newPage(): Promise<ReplayPage>;
  close(): Promise<void>;
}

export interface ReplayBrowser {
  newContext(options: { permissions: string[]; viewport: null }): Promise<ReplayContext>;
  close(): Promise<void>;
}

export type ReplayBrowserLauncher = (config: { headless: boolean }) => Promise<ReplayBrowser>;

export interface ReplayConfig {
  headless: boolean;
  sensitiveData: SensitiveDataMap;
  launch?: ReplayBrowserLauncher;
}

// ── Single action ────────────────────────────────────────────

interface ReplayState {
  page: ReplayPage;
  context: ReplayContext;
  sensitiveData: SensitiveDataMap;
}

/** Perform one replay action; resolves to the page that is active afterwards. */
export async function runReplayAction(
  action: ReplayAction,
  state: ReplayState,
): Promise<ReplayPage> {
  const label = describeActionPosition(action);
  const { page } = state;

  switch (action.type) {
    case 'navigate':
      log.info(`Navigating to: ${action.url} (${label})`);
      await page.goto(action.url, { timeout: TIMEOUTS.NAVIGATION });
      await page.waitForLoadState('load', { timeout: TIMEOUTS.NAVIGATION });
      await page.waitForTimeout(TIMEOUTS.NAVIGATION_SETTLE);
      return page;

    case 'click':
      await tryLocateAndAct(page, action.selector, 'click', { label });
      return page;

    case 'fill':
      await tryLocateAndAct(page, action.selector, 'fill', {
        text: replaceSensitiveData(action.text, state.sensitiveData),
        label,
      });
      return page;

    case 'switch_tab': {
      log.info(`Switching to tab with page id ${String(action.pageId)} (${label})`);
      const target = state.context.pages()[action.pageId];
      if (!target) {
        log.warn(`Tab with page id ${String(action.pageId)} not found to switch (${label})`);
        return page;
      }
      await target.bringToFront();
      await target.waitForLoadState('load', { timeout: TIMEOUTS.TAB_LOAD });
      await target.waitForTimeout(TIMEOUTS.TAB_SETTLE);
      return target;
    }

    case 'done':
      log.section(`Task marked as done by agent (${label})`);
      log.info(`Agent reported success: ${String(action.success)}`);
      log.info(replaceSensitiveData(action.text, state.sensitiveData));
      return page;

    case 'skipped':
      log.detail(`Action ${action.name} (${action.reason}) skipped in replay (${label})`);
      return page;
  }
}

// ── Whole script ─────────────────────────────────────────────

/**
 * Replay every action in order. The first failure aborts the rest.
 * Resolves to the process exit code: 0 on success, 1 on any failure.
 * The context and browser are closed on every path.
 */
export async function runReplayScript(
  script: ReplayScript,
  config: ReplayConfig,
): Promise<number> {
  const launch = config.launch ?? launchBrowser;
  let browser: ReplayBrowser | undefined;
  let context: ReplayContext | undefined;
  let exitCode = 0;

  try {
    log.info('Launching chromium browser...');
    browser = await launch({ headless: config.headless });
    context = await browser.newContext({
      permissions: ['clipboard-read', 'clipboard-write'],
      viewport: null,
    });
    log.info('Browser context created.');

    const existing = context.pages()[0];
    let page = existing ?? (await context.newPage());
    log.detail(existing ? 'Using initial page provided by context.' : 'Created a new page as none existed.');

    log.section(`Replaying: ${script.task}`);

    for (const action of script.actions) {
      page = await runReplayAction(action, {
        page,
        context,
        sensitiveData: config.sensitiveData,
      });
    }
  } catch (err) {
    exitCode = 1;
    if (err instanceof ActionError) {
      log.error(`Action Error: ${err.message}`);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`An unexpected error occurred: ${message}`);
      if (err instanceof Error && err.stack) {
        log.detail(err.stack);
      }
    }
  } finally {
    log.section('Replay finished');
    log.info('Closing browser/context...');
    await closeQuietly('context', context);
    await closeQuietly('browser', browser);
    log.info('Browser/context closed.');
  }

  if (exitCode !== 0) {
    log.error(`Script finished with errors (exit code ${String(exitCode)}).`);
  }
  return exitCode;
}

// ── Helpers ──────────────────────────────────────────────────

async function closeQuietly(
  what: string,
  target: { close(): Promise<void> } | undefined,
): Promise<void> {
  if (!target) return;
  try {
    await target.close();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Could not close ${what}: ${message}`);
  }
}
