/**
 * Per-run lookup cache with explicit negative entries.
 *
 * `get()` returning undefined means "never looked up"; a `miss` entry means
 * "looked up, nothing there" and must short-circuit the network call.
 */

export type CacheEntry<T> =
  | { status: 'hit'; value: T }
  | { status: 'miss' };

export interface LookupCacheStats {
  entries: number;
  hits: number;
  misses: number;
  /** get() calls answered from the cache */
  served: number;
}

export class LookupCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private servedCount = 0;

  get(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (entry) this.servedCount++;
    return entry;
  }

  setHit(key: string, value: T): void {
    this.entries.set(key, { status: 'hit', value });
  }

  setMiss(key: string): void {
    this.entries.set(key, { status: 'miss' });
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): LookupCacheStats {
    let hits = 0;
    for (const entry of this.entries.values()) {
      if (entry.status === 'hit') hits++;
    }
    return {
      entries: this.entries.size,
      hits,
      misses: this.entries.size - hits,
      served: this.servedCount,
    };
  }
}
