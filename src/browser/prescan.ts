import type { Page } from 'playwright';

import type { InteractiveElement, PageSnapshot } from '../schema/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';

// ── Public API ───────────────────────────────────────────────

/**
 * Extract a structured snapshot of the current page for the agent.
 * Pure DOM extraction — no AI, no navigation.
 * Every element carries an index the model refers to and the absolute
 * XPath the replay script will use.
 */
export async function prescanCurrentPage(
  page: Page,
  tabUrls: readonly string[] = [],
): Promise<PageSnapshot> {
  const [title, visibleText, elements] = await Promise.all([
    page.title().catch(() => ''),
    page
      .innerText('body')
      .then((t) => t.slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS), () => ''),
    page.evaluate(extractFromDOM, {
      maxElements: TOKEN_GUARDS.MAX_ELEMENTS,
      maxText: TOKEN_GUARDS.MAX_ELEMENT_TEXT_CHARS,
    }),
  ]);

  return {
    url: page.url(),
    title,
    visibleText,
    elements,
    tabs: tabUrls.map((url, pageId) => ({ pageId, url })),
  };
}

/** One line per element, as shown to the model. */
export function formatElement(el: InteractiveElement): string {
  const parts = [`[${String(el.index)}]<${el.tag}`];

  if (el.type) parts.push(`type="${el.type}"`);
  if (el.name) parts.push(`name="${el.name}"`);
  if (el.placeholder) parts.push(`placeholder="${el.placeholder}"`);
  if (el.ariaLabel) parts.push(`aria-label="${el.ariaLabel}"`);
  if (el.href) parts.push(`href="${el.href}"`);

  parts.push('>');

  if (el.text) parts.push(el.text);

  return parts.join(' ');
}

// ── Browser-context extraction ───────────────────────────────
// This function is serialized and executed inside the browser.
// It must NOT reference any outer-scope variables.

function extractFromDOM(limits: {
  maxElements: number;
  maxText: number;
}): InteractiveElement[] {
  function attr(el: Element, name: string): string | undefined {
    return el.getAttribute(name) ?? undefined;
  }

  function textOf(el: Element): string | undefined {
    const t = el.textContent?.replace(/\s+/g, ' ').trim();
    return t ? t.slice(0, limits.maxText) : undefined;
  }

  function isVisible(el: Element): boolean {
    const rect = el.getBoundingClientRect();
    if (rect.width === 0 || rect.height === 0) return false;
    const style = window.getComputedStyle(el);
    return style.visibility !== 'hidden' && style.display !== 'none';
  }

  function xpathOf(el: Element): string {
    const steps: string[] = [];
    let node: Element | null = el;

    while (node && node.nodeType === Node.ELEMENT_NODE) {
      const tag = node.tagName.toLowerCase();
      const parent: Element | null = node.parentElement;

      if (parent) {
        const sameTag = Array.from(parent.children).filter(
          (c) => c.tagName === node?.tagName,
        );
        steps.unshift(
          sameTag.length > 1 ? `${tag}[${String(sameTag.indexOf(node) + 1)}]` : tag,
        );
      } else {
        steps.unshift(tag);
      }

      node = parent;
    }

    return `/${steps.join('/')}`;
  }

  const selector = [
    'a[href]',
    'button',
    'input:not([type="hidden"])',
    'select',
    'textarea',
    '[role="button"]',
    '[role="link"]',
    '[role="tab"]',
    '[role="menuitem"]',
    '[role="option"]',
    '[contenteditable="true"]',
  ].join(', ');

  const elements: InteractiveElement[] = [];

  for (const el of Array.from(document.querySelectorAll(selector))) {
    if (elements.length >= limits.maxElements) break;
    if (!isVisible(el)) continue;

    const data: InteractiveElement = {
      index: elements.length,
      tag: el.tagName.toLowerCase(),
      xpath: xpathOf(el),
    };

    const type = attr(el, 'type');
    const text =
      el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement
        ? el.value || undefined
        : textOf(el);
    const name = attr(el, 'name');
    const placeholder = attr(el, 'placeholder');
    const ariaLabel = attr(el, 'aria-label');
    const href = attr(el, 'href');

    if (type) data.type = type;
    if (text) data.text = text.slice(0, limits.maxText);
    if (name) data.name = name;
    if (placeholder) data.placeholder = placeholder;
    if (ariaLabel) data.ariaLabel = ariaLabel;
    if (href) data.href = href.slice(0, limits.maxText);

    elements.push(data);
  }

  return elements;
}
