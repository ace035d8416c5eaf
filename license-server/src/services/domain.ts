/**
 * Domain canonicalization and the developer/staging allow-list.
 */

/** Always exempt, even with nothing configured. */
export const BUILT_IN_EXEMPT_PATTERNS: readonly string[] = ['localhost', '*.local', '*.test'];

const HOSTNAME = /^[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?(\.[a-z0-9_]([a-z0-9_-]*[a-z0-9_])?)*$/;
const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Accepts a bare hostname or a URL and returns the canonical hostname:
 * no scheme, port or path, lowercase, no leading `www.`, no trailing dots.
 * Returns null for input that is not a hostname.
 */
export function normalizeDomain(input: string): string | null {
  const trimmed = input.trim();
  if (!trimmed || trimmed.length > 2048) return null;

  let host: string;
  try {
    host = new URL(HAS_SCHEME.test(trimmed) ? trimmed : `http://${trimmed}`).hostname;
  } catch {
    return null;
  }

  host = host.toLowerCase().replace(/\.+$/, '');
  if (host.startsWith('www.') && host.length > 4) {
    host = host.slice(4);
  }

  if (!host || host.length > 253 || !HOSTNAME.test(host)) return null;
  return host;
}

/** Splits a newline/comma separated pattern list. */
export function parseDomainPatterns(raw: string): string[] {
  return raw
    .split(/[\n\r,]+/)
    .map((p) => p.trim().toLowerCase().replace(/\.+$/, ''))
    .filter((p) => p.length > 0);
}

/**
 * A pattern matches the domain itself or any strict subdomain of it.
 * `*.example` matches strict subdomains only.
 */
export function isExempt(domain: string, patterns: readonly string[]): boolean {
  const host = normalizeDomain(domain) ?? domain.trim().toLowerCase();

  return patterns.some((raw) => {
    const pattern = raw.trim().toLowerCase();
    if (!pattern) return false;

    if (pattern.startsWith('*.')) {
      return host.endsWith(pattern.slice(1));
    }
    return host === pattern || host.endsWith(`.${pattern}`);
  });
}

export class ExemptDomainMatcher {
  readonly patterns: readonly string[];

  constructor(configured: string | readonly string[] = []) {
    const extra = typeof configured === 'string' ? parseDomainPatterns(configured) : configured;
    this.patterns = [...new Set([...BUILT_IN_EXEMPT_PATTERNS, ...extra])];
  }

  matches(domain: string): boolean {
    return isExempt(domain, this.patterns);
  }
}
