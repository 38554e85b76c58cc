import type { Redis } from "ioredis";

/**
 * String key-value storage with optional per-key expiry. The cache and the
 * export state both persist through this so they survive a restart when
 * backed by Redis.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** Write only when the key is absent; resolves true when the write happened. */
  setIfAbsent(key: string, value: string): Promise<boolean>;
  del(key: string): Promise<number>;
  /** Keys starting with the given prefix. */
  keys(prefix: string): Promise<string[]>;
}

/** The ioredis commands {@link RedisStore} issues. */
export type RedisCommands = Pick<Redis, "get" | "set" | "del" | "scan">;

const SCAN_BATCH = 200;

export class RedisStore implements KeyValueStore {
  constructor(
    private readonly r: RedisCommands,
    private readonly prefix = "",
  ) {}

  private k(key: string): string {
    return `${this.prefix}${key}`;
  }

  async get(key: string): Promise<string | null> {
    return this.r.get(this.k(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined) {
      await this.r.set(this.k(key), value, "EX", ttlSeconds);
    } else {
      await this.r.set(this.k(key), value);
    }
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    const result = await this.r.set(this.k(key), value, "NX");
    return result === "OK";
  }

  async del(key: string): Promise<number> {
    return this.r.del(this.k(key));
  }

  /** Walks a SCAN cursor over the prefix; SCAN may repeat keys, so they are de-duplicated. */
  async keys(prefix: string): Promise<string[]> {
    const pattern = `${this.k(prefix).replace(/[*?[\]\\]/g, "\\$&")}*`;
    const found = new Set<string>();
    let cursor = "0";
    do {
      const [nextCursor, batch] = await this.r.scan(cursor, "MATCH", pattern, "COUNT", SCAN_BATCH);
      cursor = nextCursor;
      for (const key of batch) found.add(key.slice(this.prefix.length));
    } while (cursor !== "0");
    return [...found];
  }
}

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

/**
 * In-process store for tests and single-machine runs. Nothing survives the
 * process.
 */
export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds !== undefined ? this.now() + ttlSeconds * 1000 : null;
    this.entries.set(key, { value, expiresAt });
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: null });
    return true;
  }

  async del(key: string): Promise<number> {
    return this.entries.delete(key) ? 1 : 0;
  }

  async keys(prefix: string): Promise<string[]> {
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix) && this.live(key) !== null);
  }
}
