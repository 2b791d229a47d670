// backend/services/shared/src/store/RedisStore.ts
/**
 * Purpose:
 * - IStore over Redis.
 *
 * Semantics:
 * - Every operation is tried up to `attempts` times, reconnecting between
 *   tries (the client itself never reconnects on its own).
 * - get(): throws StoreUnavailableError once the attempts are used up.
 * - cacheGet()/cacheSet(): fail-open; a warning is logged and the call
 *   reads as a miss / drops the write.
 */

import { createClient } from "redis";
import { logger } from "../logger/logger";
import { StoreUnavailableError, type IStore } from "./IStore";

/** The slice of the Redis client the store needs. */
export interface RedisLike {
  connect(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSec: number): Promise<void>;
  ping(): Promise<void>;
  quit(): Promise<void>;
}

export type RedisStoreOptions = {
  attempts: number;
};

export function createRedisClient(url: string, timeoutMs: number): RedisLike {
  const client = createClient({
    url,
    socket: { connectTimeout: timeoutMs, reconnectStrategy: false },
  });

  client.on("error", (err: unknown) => {
    logger.warn({ err }, "[redis] client error");
  });

  return {
    connect: async () => {
      if (!client.isOpen) await client.connect();
    },
    get: (key) => client.get(key),
    set: async (key, value, ttlSec) => {
      await client.set(key, value, { EX: ttlSec });
    },
    ping: async () => {
      await client.ping();
    },
    quit: async () => {
      if (client.isOpen) await client.quit();
    },
  };
}

export class RedisStore implements IStore {
  private readonly attempts: number;

  constructor(private readonly client: RedisLike, opts: RedisStoreOptions) {
    if (!Number.isInteger(opts.attempts) || opts.attempts < 1) {
      throw new Error(`RedisStore: attempts must be >= 1 (got ${opts.attempts})`);
    }
    this.attempts = opts.attempts;
  }

  public async get(key: string): Promise<string | null> {
    return this.withRetries("get", key, () => this.client.get(key));
  }

  public async cacheGet(key: string): Promise<string | null> {
    try {
      return await this.withRetries("cacheGet", key, () => this.client.get(key));
    } catch (err) {
      logger.warn({ key, err }, "[store] cache read skipped");
      return null;
    }
  }

  public async cacheSet(
    key: string,
    value: string,
    ttlSec: number
  ): Promise<void> {
    try {
      await this.withRetries("cacheSet", key, () =>
        this.client.set(key, value, ttlSec)
      );
    } catch (err) {
      logger.warn({ key, err }, "[store] cache write skipped");
    }
  }

  public async ping(): Promise<void> {
    await this.withRetries("ping", "-", () => this.client.ping());
  }

  public async close(): Promise<void> {
    await this.client.quit();
  }

  private async withRetries<T>(
    op: string,
    key: string,
    fn: () => Promise<T>
  ): Promise<T> {
    let lastErr: unknown;
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        await this.client.connect();
        return await fn();
      } catch (err) {
        lastErr = err;
        logger.debug({ op, key, attempt, err }, "[store] attempt failed");
      }
    }
    throw new StoreUnavailableError(
      `store ${op} failed after ${this.attempts} attempts`,
      { cause: lastErr }
    );
  }
}
