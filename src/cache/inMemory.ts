import type { CachedCredential, CredentialCache } from "../types/cache.js";
import type { Logger } from "../types/logger.js";
import type { UserProfile } from "../types/profile.js";

export interface InMemoryCredentialCacheOptions {
  /**
   * Upper bound on stored tokens. When exceeded, the least recently used
   * entry is evicted. Unbounded when omitted.
   */
  maxEntries?: number;
  logger?: Logger;
}

/**
 * Process-local credential cache.
 *
 * Entries are never expired here: a stale entry stays until the same token is
 * verified again and overwrites it, or until capacity eviction removes it.
 */
export class InMemoryCredentialCache implements CredentialCache {
  private entries = new Map<string, CachedCredential>();
  private maxEntries?: number;
  private logger?: Logger;

  constructor(options?: InMemoryCredentialCacheOptions) {
    this.maxEntries = options?.maxEntries;
    this.logger = options?.logger;
  }

  get size(): number {
    return this.entries.size;
  }

  async lookup(token: string): Promise<CachedCredential | undefined> {
    const entry = this.entries.get(token);
    if (!entry) return undefined;

    if (this.maxEntries !== undefined) {
      // Map iteration order doubles as recency order
      this.entries.delete(token);
      this.entries.set(token, entry);
    }
    return entry;
  }

  async store(token: string, profile: UserProfile): Promise<void> {
    this.entries.delete(token);
    this.entries.set(token, { profile, createdAt: Date.now() });

    if (this.maxEntries === undefined) return;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.logger?.debug(`[InMemoryCredentialCache] Evicted least recently used entry for ${oldest.value.slice(0, 8)}...`);
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
