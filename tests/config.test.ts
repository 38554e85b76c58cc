import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.port).toBe(5001);
    expect(config.pdl).toEqual({ apiKey: "", baseUrl: "https://api.peopledatalabs.com", timeoutMs: 15000 });
    expect(config.store.driver).toBe("redis");
    expect(config.store.redis).toEqual({ host: "127.0.0.1", port: 6379, password: "", keyPrefix: "prospector:" });
    expect(config.cache).toEqual({ searchTtlSeconds: 86400, exportTtlSeconds: 3600 });
    expect(config.export).toEqual({
      pageSize: 100,
      pageDelayMs: 500,
      maxRecords: 10000,
      maxPages: 100,
      archiveTtlSeconds: 2592000,
    });
  });

  it("reads overrides and treats empty values as unset", () => {
    const config = loadConfig({
      PORT: "8080",
      PDL_API_KEY: "test-key",
      PDL_BASE_URL: "https://pdl.test/",
      STORE_DRIVER: "memory",
      EXPORT_PAGE_DELAY_MS: "0",
      REDIS_PORT: "",
    });

    expect(config.port).toBe(8080);
    expect(config.pdl.apiKey).toBe("test-key");
    expect(config.pdl.baseUrl).toBe("https://pdl.test");
    expect(config.store.driver).toBe("memory");
    expect(config.export.pageDelayMs).toBe(0);
    expect(config.store.redis.port).toBe(6379);
  });

  it("caps the export page size at the provider maximum", () => {
    expect(loadConfig({ EXPORT_PAGE_SIZE: "250" }).export.pageSize).toBe(100);
  });

  it("derives the page limit from the record limit and page size", () => {
    expect(loadConfig({ EXPORT_PAGE_SIZE: "50" }).export.maxPages).toBe(200);
    expect(loadConfig({ EXPORT_PAGE_SIZE: "30" }).export.maxPages).toBe(333);
    expect(loadConfig({ EXPORT_PAGE_SIZE: "100", EXPORT_MAX_RECORDS: "250" }).export.maxPages).toBe(2);
    expect(loadConfig({ EXPORT_MAX_RECORDS: "40" }).export.maxPages).toBe(1);
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(/^Invalid environment: PORT/);
    expect(() => loadConfig({ STORE_DRIVER: "disk" })).toThrow(/STORE_DRIVER/);
  });
});
