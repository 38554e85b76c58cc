import { z } from "zod";

const intVar = (fallback: number, min = 0) =>
  z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
    z.coerce.number().int().min(min).default(fallback),
  );

const envSchema = z.object({
  PORT: intVar(5001, 1),
  PDL_API_KEY: z.string().default(""),
  PDL_BASE_URL: z.string().url().default("https://api.peopledatalabs.com"),
  PDL_TIMEOUT_MS: intVar(15000, 1),
  STORE_DRIVER: z.enum(["redis", "memory"]).default("redis"),
  REDIS_HOST: z.string().default("127.0.0.1"),
  REDIS_PORT: intVar(6379, 1),
  REDIS_PASSWORD: z.string().default(""),
  REDIS_KEY_PREFIX: z.string().default("prospector:"),
  SEARCH_CACHE_TTL_SECONDS: intVar(24 * 3600, 1),
  EXPORT_CACHE_TTL_SECONDS: intVar(3600, 1),
  ARCHIVE_TTL_SECONDS: intVar(30 * 86400, 1),
  EXPORT_PAGE_SIZE: intVar(100, 1),
  EXPORT_PAGE_DELAY_MS: intVar(500),
  EXPORT_MAX_RECORDS: intVar(10000, 1),
});

export interface AppConfig {
  port: number;
  pdl: { apiKey: string; baseUrl: string; timeoutMs: number };
  store: {
    driver: "redis" | "memory";
    redis: { host: string; port: number; password: string; keyPrefix: string };
  };
  cache: { searchTtlSeconds: number; exportTtlSeconds: number };
  export: {
    pageSize: number;
    pageDelayMs: number;
    maxRecords: number;
    /** Last page whose records all fall within `maxRecords`. */
    maxPages: number;
    archiveTtlSeconds: number;
  };
}

/**
 * Parse the process environment into an {@link AppConfig}. Unset or empty
 * variables take their defaults; malformed ones throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  // The provider caps a search request at 100 records.
  const pageSize = Math.min(e.EXPORT_PAGE_SIZE, 100);

  return {
    port: e.PORT,
    pdl: { apiKey: e.PDL_API_KEY, baseUrl: e.PDL_BASE_URL.replace(/\/+$/, ""), timeoutMs: e.PDL_TIMEOUT_MS },
    store: {
      driver: e.STORE_DRIVER,
      redis: {
        host: e.REDIS_HOST,
        port: e.REDIS_PORT,
        password: e.REDIS_PASSWORD,
        keyPrefix: e.REDIS_KEY_PREFIX,
      },
    },
    cache: {
      searchTtlSeconds: e.SEARCH_CACHE_TTL_SECONDS,
      exportTtlSeconds: e.EXPORT_CACHE_TTL_SECONDS,
    },
    export: {
      pageSize,
      pageDelayMs: e.EXPORT_PAGE_DELAY_MS,
      maxRecords: e.EXPORT_MAX_RECORDS,
      maxPages: Math.max(1, Math.floor(e.EXPORT_MAX_RECORDS / pageSize)),
      archiveTtlSeconds: e.ARCHIVE_TTL_SECONDS,
    },
  };
}
