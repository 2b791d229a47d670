// backend/services/shared/src/store/IStore.ts
/**
 * Purpose:
 * - Key-value backing service consulted by the scoring collaborators.
 *
 * Contract:
 * - get(): authoritative read. Throws StoreUnavailableError when the store
 *   cannot be reached.
 * - cacheGet()/cacheSet(): best effort. A broken store reads as a miss and
 *   drops writes; callers must tolerate both.
 */

export interface IStore {
  get(key: string): Promise<string | null>;
  cacheGet(key: string): Promise<string | null>;
  cacheSet(key: string, value: string, ttlSec: number): Promise<void>;
  /** Readiness probe; throws when the store is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}
