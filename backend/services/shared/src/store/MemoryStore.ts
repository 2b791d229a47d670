// backend/services/shared/src/store/MemoryStore.ts
/**
 * Purpose:
 * - In-process IStore. Used when no Redis URL is configured, and by tests.
 *
 * Notes:
 * - Process-local only. NOT shared across processes or nodes.
 * - Cache entries live in a bounded LRU with a per-entry TTL; expired
 *   entries are purged on their own, least recently used ones are evicted
 *   once `max` is reached.
 * - Seeded keys (set()) sit outside the LRU and never expire.
 */

import { LRUCache } from "lru-cache";
import type { IStore } from "./IStore";

export const DEFAULT_CACHE_MAX = 10_000;

export type MemoryStoreOptions = {
  /** Max cache entries kept at once. */
  max?: number;
};

export class MemoryStore implements IStore {
  private readonly seeded = new Map<string, string>();
  private readonly cache: LRUCache<string, string>;

  constructor(opts: MemoryStoreOptions = {}) {
    this.cache = new LRUCache<string, string>({
      max: opts.max ?? DEFAULT_CACHE_MAX,
      ttlAutopurge: true,
    });
  }

  /** Seed or overwrite a key with no expiry. */
  public set(key: string, value: string): void {
    this.seeded.set(key, value);
  }

  public async get(key: string): Promise<string | null> {
    return this.seeded.get(key) ?? this.cache.get(key) ?? null;
  }

  public async cacheGet(key: string): Promise<string | null> {
    return this.cache.get(key) ?? this.seeded.get(key) ?? null;
  }

  public async cacheSet(
    key: string,
    value: string,
    ttlSec: number
  ): Promise<void> {
    this.cache.set(key, value, { ttl: ttlSec * 1000 });
  }

  public async ping(): Promise<void> {}

  public async close(): Promise<void> {
    this.cache.clear();
    this.seeded.clear();
  }

  /** Live cache entries plus seeded keys. */
  public get size(): number {
    return this.cache.size + this.seeded.size;
  }
}
