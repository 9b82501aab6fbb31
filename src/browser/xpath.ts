// ── XPath selector handling ───────────────────────────────────
// Playwright accepts XPath either with an explicit `xpath=` engine prefix
// or as a bare expression starting with `//`.

const XPATH_PREFIX = 'xpath=';

export interface ParsedXPathSelector {
  /** Whether the selector carried the `xpath=` engine prefix. */
  prefixed: boolean;
  expression: string;
  segments: string[];
}

export function isXPathSelector(selector: string): boolean {
  return selector.startsWith(XPATH_PREFIX) || selector.startsWith('//');
}

/**
 * Parse an absolute XPath selector into its location steps.
 * Returns `null` for anything that is not an XPath anchored at the root.
 */
export function parseAbsoluteXPath(selector: string): ParsedXPathSelector | null {
  if (!isXPathSelector(selector)) return null;

  const prefixed = selector.startsWith(XPATH_PREFIX);
  const expression = prefixed ? selector.slice(XPATH_PREFIX.length).trim() : selector;
  if (!expression.startsWith('/')) return null;

  const segments = splitSteps(expression);
  if (segments.length === 0) return null;

  return { prefixed, expression, segments };
}

/**
 * Suffix-anchored selector that drops the first `dropCount` steps and
 * searches anywhere below the root.
 */
export function buildSuffixSelector(
  parsed: ParsedXPathSelector,
  dropCount: number,
): string {
  const suffix = `//${parsed.segments.slice(dropCount).join('/')}`;
  return parsed.prefixed ? `${XPATH_PREFIX}${suffix}` : suffix;
}

/**
 * Split an XPath expression on `/` separators. Slashes inside predicates
 * and string literals belong to their step. Empty steps are dropped.
 */
export function splitSteps(expression: string): string[] {
  const steps: string[] = [];
  let current = '';
  let depth = 0;
  let quote: string | null = null;

  for (const ch of expression) {
    if (quote !== null) {
      current += ch;
      if (ch === quote) quote = null;
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === '[' || ch === '(') {
      depth++;
      current += ch;
    } else if (ch === ']' || ch === ')') {
      depth = Math.max(0, depth - 1);
      current += ch;
    } else if (ch === '/' && depth === 0) {
      if (current.length > 0) steps.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (current.length > 0) steps.push(current);
  return steps;
}
