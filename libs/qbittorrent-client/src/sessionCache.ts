/**
 * Session artifacts (cookies) returned by the WebUI login, plus the local
 * expiry window they are trusted for.
 */
export class SessionCache {
  private readonly artifacts = new Map<string, string>();
  private expiresAt: number;
  private lastUsedAt: number;

  constructor(
    private readonly expiryWindowMs: number,
    private readonly now: () => number = Date.now,
  ) {
    const current = this.now();
    this.expiresAt = current + expiryWindowMs;
    this.lastUsedAt = current;
  }

  /** Merges artifacts by name, overwriting existing values. */
  update(artifacts: Readonly<Record<string, string>>): void {
    for (const [name, value] of Object.entries(artifacts)) {
      this.artifacts.set(name, value);
    }
    this.lastUsedAt = this.now();
  }

  clear(): void {
    this.artifacts.clear();
    this.expiresAt = this.now() + this.expiryWindowMs;
  }

  get size(): number {
    return this.artifacts.size;
  }

  get expiry(): number {
    return this.expiresAt;
  }

  get lastUsed(): number {
    return this.lastUsedAt;
  }

  isExpired(): boolean {
    return this.now() > this.expiresAt;
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.artifacts);
  }

  /** `Cookie` header value, or undefined when the cache is empty. */
  cookieHeader(): string | undefined {
    if (this.artifacts.size === 0) {
      return undefined;
    }
    return [...this.artifacts].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}

/**
 * Extracts `name=value` pairs from raw `Set-Cookie` lines. Attributes after
 * the first `;` are ignored.
 */
export function parseSetCookie(lines: readonly string[]): Record<string, string> {
  const artifacts: Record<string, string> = {};
  for (const line of lines) {
    const pair = line.split(';', 1)[0] ?? '';
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    const name = pair.slice(0, separator).trim();
    if (name) {
      artifacts[name] = pair.slice(separator + 1).trim();
    }
  }
  return artifacts;
}
