import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';

import type { PageSnapshot } from '../schema/index.js';
import { TIMEOUTS, TOKEN_GUARDS } from '../config/defaults.js';
import { prescanCurrentPage } from './prescan.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
}

/** Browser operations the agent loop relies on. */
export interface AgentBrowser {
  currentUrl(): string;
  observe(): Promise<PageSnapshot>;
  /** PNG screenshot of the active tab as base64, if one could be taken. */
  screenshot(): Promise<string | undefined>;
  goTo(url: string): Promise<void>;
  openTab(url: string): Promise<void>;
  /** Resolves to the page id of a tab the click opened and made active. */
  click(xpath: string): Promise<number | undefined>;
  fill(xpath: string, text: string): Promise<void>;
  switchTab(pageId: number): Promise<void>;
  extractText(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserSession extends AgentBrowser {
  readonly context: BrowserContext;
  readonly page: Page;
}

// ── Launchers ────────────────────────────────────────────────

export async function launchBrowser(config: RunnerConfig): Promise<Browser> {
  return chromium.launch({ headless: config.headless });
}

export async function launchSession(
  config: RunnerConfig,
): Promise<BrowserSession> {
  const browser = await launchBrowser(config);
  const context = await browser.newContext();
  let page = await context.newPage();

  const tabUrls = (): string[] => context.pages().map((p) => p.url());

  const settle = async (): Promise<void> => {
    await page
      .waitForLoadState('domcontentloaded', { timeout: TIMEOUTS.AGENT_NAVIGATION })
      .catch(() => undefined);
  };

  return {
    context,

    get page(): Page {
      return page;
    },

    currentUrl(): string {
      return page.url();
    },

    observe(): Promise<PageSnapshot> {
      return prescanCurrentPage(page, tabUrls());
    },

    async screenshot(): Promise<string | undefined> {
      const buf = await page.screenshot({ type: 'png' }).catch(() => undefined);
      return buf?.toString('base64');
    },

    async goTo(url: string): Promise<void> {
      await page.goto(url, {
        timeout: TIMEOUTS.AGENT_NAVIGATION,
        waitUntil: 'domcontentloaded',
      });
    },

    async openTab(url: string): Promise<void> {
      page = await context.newPage();
      await page.goto(url, {
        timeout: TIMEOUTS.AGENT_NAVIGATION,
        waitUntil: 'domcontentloaded',
      });
    },

    async click(xpath: string): Promise<number | undefined> {
      const pagesBefore = context.pages().length;
      await page
        .locator(`xpath=${xpath}`)
        .first()
        .click({ timeout: TIMEOUTS.AGENT_ACTION });

      // Links with target=_blank open a new tab; follow it like a user would.
      const pages = context.pages();
      const newest = pages[pages.length - 1];
      let openedPageId: number | undefined;
      if (pages.length > pagesBefore && newest) {
        page = newest;
        openedPageId = pages.length - 1;
      }
      await settle();
      return openedPageId;
    },

    async fill(xpath: string, text: string): Promise<void> {
      await page
        .locator(`xpath=${xpath}`)
        .first()
        .fill(text, { timeout: TIMEOUTS.AGENT_ACTION });
    },

    async switchTab(pageId: number): Promise<void> {
      const target = context.pages()[pageId];
      if (!target) {
        throw new Error(`No tab with page id ${String(pageId)}`);
      }
      page = target;
      await page.bringToFront();
      await settle();
    },

    async extractText(): Promise<string> {
      const text = await page.innerText('body');
      return text.slice(0, TOKEN_GUARDS.MAX_EXTRACTED_CHARS);
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}
