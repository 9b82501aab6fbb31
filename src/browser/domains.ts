// ── Navigation allow-list ─────────────────────────────────────

export class DomainNotAllowedError extends Error {
  readonly url: string;
  readonly allowedDomains: readonly string[];

  constructor(url: string, allowedDomains: readonly string[]) {
    super(`Navigation to ${url} is not allowed (allowed: ${allowedDomains.join(', ')})`);
    this.name = 'DomainNotAllowedError';
    this.url = url;
    this.allowedDomains = allowedDomains;
  }
}

/**
 * A host matches a domain when it equals it or is a subdomain of it:
 * `www.realtor.ca` matches `realtor.ca`, `notrealtor.ca` does not.
 * An empty allow-list permits everything.
 */
export function isUrlAllowed(url: string, allowedDomains: readonly string[]): boolean {
  if (allowedDomains.length === 0) return true;

  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  return allowedDomains.some((domain) => {
    const d = domain.toLowerCase().replace(/^\*\./, '');
    return host === d || host.endsWith(`.${d}`);
  });
}

export function assertUrlAllowed(url: string, allowedDomains: readonly string[]): void {
  if (!isUrlAllowed(url, allowedDomains)) {
    throw new DomainNotAllowedError(url, allowedDomains);
  }
}
