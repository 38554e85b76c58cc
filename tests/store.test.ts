import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { CacheStore } from "../src/lib/cache-store.js";
import { ConflictError } from "../src/lib/errors.js";
import { ExportStateStore } from "../src/lib/export-state.js";
import { MemoryStore, RedisStore } from "../src/lib/store.js";
import { fakeRedis } from "./helpers/fake-redis.js";

describe("MemoryStore", () => {
  it("expires keys after their ttl", async () => {
    let now = 1_000_000;
    const store = new MemoryStore(() => now);
    await store.set("a", "1", 10);
    await store.set("b", "2");

    now += 9_999;
    expect(await store.get("a")).toBe("1");
    now += 1;
    expect(await store.get("a")).toBeNull();
    expect(await store.get("b")).toBe("2");
  });

  it("writes with setIfAbsent only once", async () => {
    const store = new MemoryStore();
    expect(await store.setIfAbsent("lock", "one")).toBe(true);
    expect(await store.setIfAbsent("lock", "two")).toBe(false);
    expect(await store.get("lock")).toBe("one");
  });

  it("lists live keys by prefix and reports deletions", async () => {
    const store = new MemoryStore();
    await store.set("cache:x", "1");
    await store.set("cache:y", "2");
    await store.set("export:state", "3");

    expect((await store.keys("cache:")).sort()).toEqual(["cache:x", "cache:y"]);
    expect(await store.del("cache:x")).toBe(1);
    expect(await store.del("cache:x")).toBe(0);
  });
});

describe("RedisStore", () => {
  let client: ReturnType<typeof fakeRedis>;
  let store: RedisStore;

  beforeEach(() => {
    client = fakeRedis();
    store = new RedisStore(client, "p:");
  });

  it("prefixes keys and sets an expiry only when given a ttl", async () => {
    await store.set("a", "1");
    await store.set("b", "2", 30);

    expect(client.set).toHaveBeenNthCalledWith(1, "p:a", "1");
    expect(client.set).toHaveBeenNthCalledWith(2, "p:b", "2", "EX", 30);
    expect(client.ttls.has("p:a")).toBe(false);
    expect(client.ttls.get("p:b")).toBe(30);
    expect(await store.get("a")).toBe("1");
    expect(await store.get("missing")).toBeNull();
  });

  it("writes with setIfAbsent only when the key is free", async () => {
    expect(await store.setIfAbsent("lock", "one")).toBe(true);
    expect(await store.setIfAbsent("lock", "two")).toBe(false);
    expect(client.set).toHaveBeenLastCalledWith("p:lock", "two", "NX");
    expect(client.data.get("p:lock")).toBe("one");
  });

  it("follows the scan cursor and strips the prefix", async () => {
    for (const id of ["a", "b", "c", "d", "e"]) client.data.set(`p:cache:${id}`, "x");
    client.data.set("p:export:state", "{}");
    client.data.set("other:cache:z", "x");

    expect((await store.keys("cache:")).sort()).toEqual(["cache:a", "cache:b", "cache:c", "cache:d", "cache:e"]);
    expect(client.scan).toHaveBeenCalledTimes(3);
    expect(client.scan).toHaveBeenNthCalledWith(1, "0", "MATCH", "p:cache:*", "COUNT", 200);
    expect(client.scan).toHaveBeenNthCalledWith(3, "4", "MATCH", "p:cache:*", "COUNT", 200);
  });

  it("reports how many keys were deleted", async () => {
    await store.set("a", "1");
    expect(await store.del("a")).toBe(1);
    expect(await store.del("a")).toBe(0);
  });

  it("backs a cache whose clear removes only cache entries", async () => {
    const cache = new CacheStore(store);
    for (const key of ["a", "b", "c"]) {
      await cache.getOrFetch(key, async () => 1, { ttlSeconds: 60, schema: z.number() });
    }
    await store.set("export:state", "{}");

    expect(client.ttls.get("p:cache:a")).toBe(60);
    expect(await cache.clear()).toBe(3);
    expect([...client.data.keys()]).toEqual(["p:export:state"]);
  });

  it("keeps export state across a restart so a failed run resumes", async () => {
    const before = new ExportStateStore(store);
    let run = await before.start();
    run = await before.recordPageSuccess(run, 1, 100);
    run = await before.recordPageSuccess(run, 2, 100);
    await before.recordFailure(run, "Error on page 3: boom");
    expect(client.data.has("p:export:lock")).toBe(false);

    const after = new ExportStateStore(new RedisStore(client, "p:"));
    expect(await after.snapshot()).toMatchObject({ status: "failed", can_resume: true, last_successful_page: 2 });

    const resumed = await after.resume();
    expect(resumed).toMatchObject({ start_page: 3, current_page: 3, last_successful_page: 2, total_companies: 200 });
    expect(client.data.get("p:export:lock")).toBe(resumed.run_id);
    await expect(after.start()).rejects.toBeInstanceOf(ConflictError);

    expect((await after.history()).map((r) => r.run_id)).toEqual([run.run_id]);
    expect(client.ttls.get(`p:export:archive:${run.run_id}`)).toBe(30 * 86400);
  });
});
