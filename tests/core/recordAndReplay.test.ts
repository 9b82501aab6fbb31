import { describe, expect, it } from 'vitest';

import { runAgent } from '../../src/core/agent.js';
import { runReplayScript } from '../../src/core/replay.js';
import type { ReplayBrowser, ReplayContext, ReplayPage } from '../../src/core/replay.js';
import { generateReplayScript } from '../../src/core/scriptGenerator.js';
import { createMockClient } from '../../src/llm/mock.js';
import type { AgentBrowser } from '../../src/browser/runner.js';
import type { PageSnapshot } from '../../src/schema/index.js';

const HOME = 'https://www.realtor.ca/';
const LISTING = 'https://www.realtor.ca/real-estate/1';
const LISTING_LINK = '/html/body/div[2]/a[1]';
const PRICE = '/html/body/main/span[3]';

// ── Agent side: the listing link opens a new tab ─────────────

function agentBrowser(): AgentBrowser {
  const tabs = ['about:blank'];
  let active = 0;

  const snapshot = (): PageSnapshot => ({
    url: tabs[active] ?? '',
    title: '',
    visibleText: '',
    elements: [
      { index: 0, tag: 'a', xpath: LISTING_LINK, text: '123 Main St' },
      { index: 1, tag: 'span', xpath: PRICE, text: '$500,000' },
    ],
    tabs: tabs.map((url, pageId) => ({ pageId, url })),
  });

  return {
    currentUrl: () => tabs[active] ?? '',
    observe: () => Promise.resolve(snapshot()),
    screenshot: () => Promise.resolve(undefined),
    async goTo(url) {
      tabs[active] = url;
    },
    async openTab(url) {
      active = tabs.push(url) - 1;
    },
    async click(xpath) {
      if (xpath !== LISTING_LINK) return undefined;
      active = tabs.push(LISTING) - 1;
      return active;
    },
    async fill() {},
    async switchTab(pageId) {
      active = pageId;
    },
    extractText: () => Promise.resolve(''),
    async close() {},
  };
}

// ── Replay side: the same link opens page 1 ──────────────────

function replayLauncher() {
  const pages: ReplayPage[] = [];
  const clicks: string[] = [];

  const makePage = (id: number, selectors: readonly string[]): ReplayPage => ({
    goto: () => Promise.resolve(null),
    waitForLoadState: () => Promise.resolve(),
    bringToFront: () => Promise.resolve(),
    waitForTimeout: () => Promise.resolve(),
    locator(selector) {
      const click = async ({ timeout }: { timeout: number }): Promise<void> => {
        if (!selectors.includes(selector)) throw new Error(`Timeout ${String(timeout)}ms exceeded.`);
        clicks.push(`page${String(id)} ${selector}`);
        if (selector === `xpath=${LISTING_LINK}`) {
          pages.push(makePage(pages.length, [`xpath=${PRICE}`]));
        }
      };
      return {
        first: () => ({
          click,
          fill: () => Promise.reject(new Error('not an input')),
          clear: () => Promise.reject(new Error('not an input')),
        }),
      };
    },
  });

  pages.push(makePage(0, [`xpath=${LISTING_LINK}`]));

  const context: ReplayContext = {
    pages: () => pages,
    newPage: () => Promise.reject(new Error('unexpected newPage')),
    close: () => Promise.resolve(),
  };
  const browser: ReplayBrowser = {
    newContext: () => Promise.resolve(context),
    close: () => Promise.resolve(),
  };

  return { launch: () => Promise.resolve(browser), clicks };
}

describe('record and replay', () => {
  it('follows a tab opened by a click', async () => {
    const client = createMockClient([
      '{"actions":[{"type":"click_element","index":0}]}',
      '{"actions":[{"type":"click_element","index":1}]}',
      '{"actions":[{"type":"done","success":true,"text":"$500,000"}]}',
    ]);

    const run = await runAgent(client, agentBrowser(), {
      task: 'Read the price of the first listing',
      startUrl: HOME,
      allowedDomains: ['realtor.ca'],
    });

    expect(run.steps[1]?.actions[0]?.openedPageId).toBe(1);

    const script = generateReplayScript(run, { now: new Date('2026-01-05T10:05:00.000Z') });
    expect(script.actions).toEqual([
      { step: 1, action: 1, type: 'navigate', url: HOME },
      { step: 2, action: 1, type: 'click', selector: `xpath=${LISTING_LINK}` },
      { step: 2, action: 2, type: 'switch_tab', pageId: 1 },
      { step: 3, action: 1, type: 'click', selector: `xpath=${PRICE}` },
      { step: 4, action: 1, type: 'done', success: true, text: '$500,000' },
    ]);

    const { launch, clicks } = replayLauncher();
    const code = await runReplayScript(script, { headless: true, sensitiveData: {}, launch });

    expect(code).toBe(0);
    expect(clicks).toEqual([`page0 xpath=${LISTING_LINK}`, `page1 xpath=${PRICE}`]);
  });
});
