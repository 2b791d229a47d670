// backend/services/shared/test/memoryStore.spec.ts
import { describe, expect, it } from "vitest";
import { MemoryStore } from "../src/store/MemoryStore";

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

describe("MemoryStore", () => {
  it("seeded keys are readable through both paths", async () => {
    const store = new MemoryStore();
    store.set("i:1", '["books"]');
    expect(await store.get("i:1")).toBe('["books"]');
    expect(await store.cacheGet("i:1")).toBe('["books"]');
  });

  it("cache entries read back until their ttl runs out", async () => {
    const store = new MemoryStore();
    await store.cacheSet("uid:a", "3", 1);
    expect(await store.cacheGet("uid:a")).toBe("3");

    await sleep(1_100);
    expect(await store.cacheGet("uid:a")).toBe(null);
  });

  it("expired entries are reclaimed without being read again", async () => {
    const store = new MemoryStore();
    for (let i = 0; i < 100; i++) {
      await store.cacheSet(`uid:${i}`, "1.5", 1);
    }
    expect(store.size).toBe(100);

    await sleep(1_100);
    await store.cacheSet("uid:last", "3", 60);
    expect(store.size).toBe(1);
  });

  it("the cache stays bounded, evicting the least recently used", async () => {
    const store = new MemoryStore({ max: 3 });
    store.set("i:1", "[]");
    for (const k of ["a", "b", "c", "d", "e"]) {
      await store.cacheSet(`uid:${k}`, k, 3600);
    }
    expect(store.size).toBe(4);
    expect(await store.cacheGet("uid:a")).toBe(null);
    expect(await store.cacheGet("uid:e")).toBe("e");
    expect(await store.get("i:1")).toBe("[]");
  });

  it("missing keys read as null; close empties the store", async () => {
    const store = new MemoryStore();
    expect(await store.get("nope")).toBe(null);
    store.set("k", "v");
    await store.cacheSet("c", "v", 60);
    await store.ping();
    await store.close();
    expect(store.size).toBe(0);
  });
});
