import { createHash } from "node:crypto";
import { log } from "./logger.js";

export type CacheOptions = {
  /** Time-to-live in milliseconds (default: 5 minutes) */
  ttlMs?: number;
  /** Maximum number of entries (default: 100) */
  maxEntries?: number;
};

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

/**
 * In-memory LRU cache with a fixed TTL. Search results are the main tenant:
 * the same term is often searched again when a run is revised.
 */
export class Cache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private ttlMs: number;
  private maxEntries: number;
  private hits = 0;
  private misses = 0;

  constructor(opts: CacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 5 * 60 * 1000;
    this.maxEntries = Math.max(1, opts.maxEntries ?? 100);
  }

  /** Stable short key for any list of parts. */
  static key(...parts: Array<string | number>): string {
    return createHash("sha256").update(parts.join("\u0000")).digest("hex").slice(0, 16);
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry || Date.now() > entry.expiresAt) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      log.debug("Cache eviction", { key: oldest.value.slice(0, 8) });
    }
    this.entries.set(key, { value, expiresAt: Date.now() + this.ttlMs });
  }

  /** Return the cached value for `key`, or compute, store and return it. */
  async getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const value = await compute();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): { size: number; hits: number; misses: number } {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }

  get size(): number {
    return this.entries.size;
  }
}
