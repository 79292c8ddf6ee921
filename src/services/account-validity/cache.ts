// ═══════════════════════════════════════════════════════════════════════════════
// EXPIRATION CACHE — Bounded LRU with Explicit Invalidation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Caches `getExpiration` lookups per account, including misses (null). Every
// store write touching an account calls `invalidate` for it. A load that was
// in flight while its key was invalidated does not populate the cache.
//
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExpirationCacheConfig {
  /** Maximum number of cached accounts */
  maxEntries: number;
}

export const DEFAULT_CACHE_CONFIG: ExpirationCacheConfig = {
  maxEntries: 10_000,
};

interface LoadTicket {
  stale: boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

export class ExpirationCache {
  private readonly config: ExpirationCacheConfig;
  private readonly entries = new Map<string, number | null>();
  private readonly pending = new Map<string, Set<LoadTicket>>();
  private hits = 0;
  private misses = 0;

  constructor(config: Partial<ExpirationCacheConfig> = {}) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  /**
   * Return the cached expiration, or run the loader and cache its result.
   */
  async load(accountId: string, loader: () => Promise<number | null>): Promise<number | null> {
    if (this.entries.has(accountId)) {
      const value = this.entries.get(accountId) ?? null;
      // Refresh recency
      this.entries.delete(accountId);
      this.entries.set(accountId, value);
      this.hits++;
      return value;
    }

    this.misses++;
    const ticket: LoadTicket = { stale: false };
    const tickets = this.pending.get(accountId) ?? new Set<LoadTicket>();
    tickets.add(ticket);
    this.pending.set(accountId, tickets);

    try {
      const value = await loader();
      if (!ticket.stale) {
        this.set(accountId, value);
      }
      return value;
    } finally {
      tickets.delete(ticket);
      if (tickets.size === 0) {
        this.pending.delete(accountId);
      }
    }
  }

  invalidate(accountId: string): void {
    this.entries.delete(accountId);
    const tickets = this.pending.get(accountId);
    if (tickets) {
      for (const ticket of tickets) {
        ticket.stale = true;
      }
    }
  }

  clear(): void {
    this.entries.clear();
    for (const tickets of this.pending.values()) {
      for (const ticket of tickets) {
        ticket.stale = true;
      }
    }
  }

  has(accountId: string): boolean {
    return this.entries.has(accountId);
  }

  getStats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  private set(accountId: string, value: number | null): void {
    this.entries.delete(accountId);
    this.entries.set(accountId, value);

    while (this.entries.size > this.config.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
