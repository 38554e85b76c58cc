import { z } from "zod";
import type { KeyValueStore } from "./store.js";

const KEY_PREFIX = "cache:";

const entrySchema = z.object({
  fingerprint: z.string(),
  payload: z.unknown(),
  fetched_at: z.string(),
  expires_at: z.string(),
});

export type StoredCacheEntry = z.infer<typeof entrySchema>;

export interface CacheEntry<T> {
  fingerprint: string;
  payload: T;
  fetched_at: string;
  expires_at: string;
}

export interface GetOrFetchOptions<T> {
  /**
   * Lifetime given to a freshly fetched entry, and the maximum age this
   * caller accepts for an existing one.
   */
  ttlSeconds: number;
  /** Validates payloads read back from the store. */
  schema: z.ZodType<T>;
}

/**
 * Read-through cache keyed by query fingerprint. Failed fetches are never
 * cached and always reach the caller.
 */
export class CacheStore {
  private readonly inflight = new Map<string, Promise<unknown>>();

  constructor(
    private readonly store: KeyValueStore,
    private readonly now: () => number = Date.now,
  ) {}

  async getOrFetch<T>(fingerprint: string, fetchFn: () => Promise<T>, opts: GetOrFetchOptions<T>): Promise<T> {
    const cached = await this.read(fingerprint, opts);
    if (cached !== undefined) {
      console.log(`Cache hit for ${fingerprint}`);
      return cached;
    }

    const pending = this.inflight.get(fingerprint);
    if (pending) {
      return opts.schema.parse(await pending);
    }

    const task = this.fetchAndStore(fingerprint, fetchFn, opts.ttlSeconds);
    this.inflight.set(fingerprint, task);
    try {
      return await task;
    } finally {
      this.inflight.delete(fingerprint);
    }
  }

  async invalidate(fingerprint: string): Promise<boolean> {
    return (await this.store.del(KEY_PREFIX + fingerprint)) > 0;
  }

  /** Remove every cache entry; returns how many were removed. */
  async clear(): Promise<number> {
    const keys = await this.store.keys(KEY_PREFIX);
    let removed = 0;
    for (const key of keys) {
      removed += await this.store.del(key);
    }
    console.log(`Cleared ${removed} cache entries`);
    return removed;
  }

  /** Raw entry for a fingerprint, live or not; undefined when absent. */
  async peek(fingerprint: string): Promise<StoredCacheEntry | undefined> {
    const raw = await this.store.get(KEY_PREFIX + fingerprint);
    if (raw === null) return undefined;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.warn(`Unreadable cache entry ${fingerprint}:`, error);
      return undefined;
    }
    const parsed = entrySchema.safeParse(json);
    return parsed.success ? parsed.data : undefined;
  }

  private async read<T>(fingerprint: string, opts: GetOrFetchOptions<T>): Promise<T | undefined> {
    const entry = await this.peek(fingerprint);
    if (!entry) return undefined;

    const now = this.now();
    const fetchedAt = Date.parse(entry.fetched_at);
    const expiresAt = Date.parse(entry.expires_at);
    if (!(now < expiresAt) || !(now - fetchedAt < opts.ttlSeconds * 1000)) {
      return undefined;
    }

    const payload = opts.schema.safeParse(entry.payload);
    if (!payload.success) {
      console.warn(`Discarding cache entry ${fingerprint}: payload no longer matches its schema`);
      await this.invalidate(fingerprint);
      return undefined;
    }
    return payload.data;
  }

  private async fetchAndStore<T>(fingerprint: string, fetchFn: () => Promise<T>, ttlSeconds: number): Promise<T> {
    const payload = await fetchFn();
    const fetchedAt = this.now();
    const entry: CacheEntry<T> = {
      fingerprint,
      payload,
      fetched_at: new Date(fetchedAt).toISOString(),
      expires_at: new Date(fetchedAt + ttlSeconds * 1000).toISOString(),
    };
    await this.store.set(KEY_PREFIX + fingerprint, JSON.stringify(entry), ttlSeconds);
    return payload;
  }
}
