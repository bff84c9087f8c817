import type { Result } from "@/lib/result";

export const HOUR_MS = 60 * 60 * 1000;

export type TtlCacheOptions = {
  ttlMs: number;
  maxEntries?: number;
  now?: () => number;
};

type CacheEntry<V> = {
  value: V;
  expiresAt: number;
};

export function cacheKey(...parts: Array<string | number | boolean>): string {
  return JSON.stringify(parts);
}

/**
 * Time-bounded memo for upstream lookups. Entries expire `ttlMs` after
 * they are stored; when full, expired entries go first and then the
 * oldest insertion.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<Result<V>>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    if (!(options.ttlMs > 0)) {
      throw new Error(`TtlCache ttlMs must be positive, got ${options.ttlMs}`);
    }

    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? 256;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      this.pruneExpired();
    }

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Returns the cached value or runs `loader`. Only successful results
   * are stored, so a failed lookup is retried on the next call.
   */
  async getOrLoad(
    key: string,
    loader: () => Promise<Result<V>>,
  ): Promise<Result<V>> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return { ok: true, value: cached };
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const load = loader()
      .then((result) => {
        if (result.ok) this.set(key, result.value);
        return result;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, load);
    return load;
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
