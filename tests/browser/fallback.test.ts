import { describe, expect, it } from 'vitest';

import {
  ActionError,
  runWithFallback,
  tryLocateAndAct,
} from '../../src/browser/fallback.js';
import type {
  ActionLocator,
  ActionPage,
  FallbackCandidate,
} from '../../src/browser/fallback.js';

// ── Fake page ────────────────────────────────────────────────

interface Call {
  op: 'click' | 'fill' | 'clear';
  selector: string;
  timeout: number;
  value?: string;
}

interface FakePageOptions {
  /** Selectors that resolve to an element. */
  matches?: readonly string[];
  failClear?: boolean;
}

function fakePage(options: FakePageOptions = {}) {
  const matches = new Set(options.matches ?? []);
  const calls: Call[] = [];
  const waits: number[] = [];

  const resolve = (selector: string, timeout: number): void => {
    if (!matches.has(selector)) {
      throw new Error(`locator: Timeout ${String(timeout)}ms exceeded.\nCall log:\n  - waiting for ${selector}`);
    }
  };

  const page: ActionPage = {
    locator(selector: string) {
      const locator: ActionLocator = {
        async click({ timeout }) {
          calls.push({ op: 'click', selector, timeout });
          resolve(selector, timeout);
        },
        async fill(value, { timeout }) {
          calls.push({ op: 'fill', selector, timeout, value });
          resolve(selector, timeout);
        },
        async clear({ timeout }) {
          calls.push({ op: 'clear', selector, timeout });
          if (options.failClear) throw new Error('element is not an input');
          resolve(selector, timeout);
        },
      };
      return { first: () => locator };
    },
    async waitForTimeout(timeout: number) {
      waits.push(timeout);
    },
  };

  return { page, calls, waits };
}

async function captureActionError(promise: Promise<unknown>): Promise<ActionError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ActionError) return err;
    throw err;
  }
  throw new Error('expected an ActionError');
}

// ── runWithFallback ─────────────────────────────────────────

describe('runWithFallback', () => {
  it('stops at the first fallback that succeeds', async () => {
    const tried: FallbackCandidate[] = [];
    const outcome = await runWithFallback(
      '//a/b/c/d',
      async (candidate) => {
        tried.push(candidate);
        if (candidate.selector !== '//b/c/d') throw new Error('not found');
      },
      { action: 'click', label: 'Step 2, Action 1' },
    );

    expect(outcome.selector).toBe('//b/c/d');
    expect(outcome.attempts).toHaveLength(2);
    expect(tried).toEqual([
      { index: 0, selector: '//a/b/c/d', timeout: 10_000, isFallback: false },
      { index: 1, selector: '//b/c/d', timeout: 1_000, isFallback: true },
    ]);
  });

  it('reports every attempt once all fallbacks are exhausted', async () => {
    const err = await captureActionError(
      runWithFallback(
        '//a/b/c/d',
        () => Promise.reject(new Error('not found')),
        { action: 'click', label: 'Step 2, Action 1' },
      ),
    );

    expect(err.kind).toBe('all_fallbacks_exhausted');
    expect(err.attemptCount).toBe(4);
    expect(err.attempts.map((a) => a.selector)).toEqual(['//a/b/c/d', '//b/c/d', '//c/d', '//d']);
    expect(err.attempts.every((a) => a.outcome === 'failed')).toBe(true);
    expect(err.message).toBe(
      `Action 'click' failed. Gave up after 4 attempt(s) (3 fallback(s)). Original selector: "//a/b/c/d". (Step 2, Action 1)`,
    );
  });

  it('makes one attempt for selectors that are not absolute XPath', async () => {
    let count = 0;
    const err = await captureActionError(
      runWithFallback(
        '#search-button',
        () => {
          count++;
          return Promise.reject(new Error('not found'));
        },
        { action: 'click', label: 'Step 1, Action 1' },
      ),
    );

    expect(count).toBe(1);
    expect(err.kind).toBe('no_fallback_for_selector_kind');
    expect(err.attemptCount).toBe(1);
  });

  it('tries one fallback for a two-step path and none for a single step', async () => {
    const fail = () => Promise.reject(new Error('not found'));

    const two = await captureActionError(
      runWithFallback('xpath=/html/body', fail, { action: 'click', label: 'x' }),
    );
    expect(two.attempts.map((a) => a.selector)).toEqual(['xpath=/html/body', 'xpath=//body']);

    const one = await captureActionError(
      runWithFallback('xpath=/html', fail, { action: 'click', label: 'x' }),
    );
    expect(one.kind).toBe('all_fallbacks_exhausted');
    expect(one.attemptCount).toBe(1);
  });

  it('caps the number of fallbacks', async () => {
    const deep = '/' + Array.from({ length: 60 }, (_, i) => `div[${String(i + 1)}]`).join('/');
    const fail = () => Promise.reject(new Error('not found'));

    const capped = await captureActionError(
      runWithFallback(`xpath=${deep}`, fail, { action: 'click', label: 'x' }),
    );
    expect(capped.attemptCount).toBe(51);
    expect(capped.attempts[50]?.selector).toBe(
      'xpath=//' + Array.from({ length: 10 }, (_, i) => `div[${String(i + 51)}]`).join('/'),
    );

    const custom = await captureActionError(
      runWithFallback('//a/b/c/d', fail, { action: 'click', label: 'x', maxFallbacks: 2 }),
    );
    expect(custom.attempts.map((a) => a.selector)).toEqual(['//a/b/c/d', '//b/c/d', '//c/d']);
  });

  it('keeps only the first line of each failure message', async () => {
    const err = await captureActionError(
      runWithFallback(
        '#price',
        () => Promise.reject(new Error('Timeout 10000ms exceeded.\nCall log:\n  - waiting')),
        { action: 'click', label: 'x' },
      ),
    );
    expect(err.attempts[0]?.error).toBe('Timeout 10000ms exceeded.');
  });
});

// ── tryLocateAndAct ─────────────────────────────────────────

describe('tryLocateAndAct', () => {
  it('clicks with the original selector and waits for the page to settle', async () => {
    const { page, calls, waits } = fakePage({ matches: ['xpath=/html/body/div[2]/a'] });

    const outcome = await tryLocateAndAct(page, 'xpath=/html/body/div[2]/a', 'click', {
      label: 'Step 3, Action 1',
    });

    expect(outcome.attempts).toHaveLength(1);
    expect(calls).toEqual([{ op: 'click', selector: 'xpath=/html/body/div[2]/a', timeout: 10_000 }]);
    expect(waits).toEqual([500]);
  });

  it('clears a fallback field before filling it', async () => {
    const { page, calls, waits } = fakePage({ matches: ['xpath=//form/input'] });

    const outcome = await tryLocateAndAct(page, 'xpath=/html/body/form/input', 'fill', {
      text: 'Ottawa',
      label: 'Step 2, Action 1',
    });

    expect(outcome.selector).toBe('xpath=//form/input');
    expect(calls.map((c) => `${c.op} ${c.selector}`)).toEqual([
      'fill xpath=/html/body/form/input',
      'clear xpath=//body/form/input',
      'fill xpath=//body/form/input',
      'clear xpath=//form/input',
      'fill xpath=//form/input',
    ]);
    expect(calls[4]).toEqual({
      op: 'fill',
      selector: 'xpath=//form/input',
      timeout: 1_000,
      value: 'Ottawa',
    });
    expect(waits).toEqual([100, 500]);
  });

  it('still fills when clearing the fallback field fails', async () => {
    const { page, calls, waits } = fakePage({ matches: ['//form/input'], failClear: true });

    await tryLocateAndAct(page, '//body/form/input', 'fill', { text: 'Ottawa' });

    expect(calls.map((c) => `${c.op} ${c.selector}`)).toEqual([
      'fill //body/form/input',
      'clear //form/input',
      'fill //form/input',
    ]);
    expect(waits).toEqual([500]);
  });

  it('rejects a fill without text before touching the page', async () => {
    const { page, calls } = fakePage({ matches: ['#city'] });

    const err = await captureActionError(tryLocateAndAct(page, '#city', 'fill'));

    expect(err.kind).toBe('invalid_action');
    expect(err.attemptCount).toBe(0);
    expect(calls).toEqual([]);
  });

  it('does not settle after a failed action', async () => {
    const { page, waits } = fakePage();

    const err = await captureActionError(tryLocateAndAct(page, '#missing', 'click'));

    expect(err.kind).toBe('no_fallback_for_selector_kind');
    expect(waits).toEqual([]);
  });
});
