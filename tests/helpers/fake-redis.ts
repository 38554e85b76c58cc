import { vi } from "vitest";

/**
 * Map-backed stand-in for the ioredis commands the store issues. SCAN pages
 * through matches two at a time so callers must follow the cursor.
 */
export function fakeRedis() {
  const data = new Map<string, string>();
  const ttls = new Map<string, number>();

  return {
    data,
    ttls,
    get: vi.fn().mockImplementation(async (key: string) => data.get(key) ?? null),
    set: vi.fn().mockImplementation(async (key: string, value: string, mode?: string, seconds?: number) => {
      if (mode === "NX" && data.has(key)) return null;
      data.set(key, value);
      if (mode === "EX" && seconds !== undefined) ttls.set(key, seconds);
      else ttls.delete(key);
      return "OK";
    }),
    del: vi.fn().mockImplementation(async (...keys: string[]) => keys.filter((key) => data.delete(key)).length),
    scan: vi.fn().mockImplementation(async (cursor: string, _match: string, pattern: string) => {
      const prefix = pattern.slice(0, -1);
      const matches = [...data.keys()].filter((key) => key.startsWith(prefix));
      const start = Number(cursor);
      const next = start + 2;
      return [next >= matches.length ? "0" : String(next), matches.slice(start, next)];
    }),
  };
}
