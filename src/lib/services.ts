import { exportFilters } from "../config/export-filters.js";
import { loadConfig, type AppConfig } from "../config/env.js";
import { CacheStore } from "./cache-store.js";
import { CompanyAnalysisService } from "./company-analysis.js";
import { ExportOrchestrator } from "./export-orchestrator.js";
import { ExportStateStore } from "./export-state.js";
import { PdlClient } from "./pdl.js";
import { QueryService } from "./query-service.js";
import { getRedisClient } from "./redis.js";
import { MemoryStore, RedisStore, type KeyValueStore } from "./store.js";
import type { CompanyDataSource } from "./types.js";

export interface Services {
  config: AppConfig;
  source: CompanyDataSource;
  cache: CacheStore;
  exportState: ExportStateStore;
  orchestrator: ExportOrchestrator;
  query: QueryService;
  analysis: CompanyAnalysisService;
}

export interface ServiceOverrides {
  store?: KeyValueStore;
  source?: CompanyDataSource;
  now?: () => number;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const store =
    overrides.store ??
    (config.store.driver === "memory"
      ? new MemoryStore()
      : new RedisStore(getRedisClient(config.store.redis), config.store.redis.keyPrefix));
  const source = overrides.source ?? new PdlClient(config.pdl);
  const now = overrides.now ?? Date.now;

  const cache = new CacheStore(store, now);
  const exportState = new ExportStateStore(store, config.export.archiveTtlSeconds, () => new Date(now()));
  const orchestrator = new ExportOrchestrator(exportState, cache, source, {
    filters: exportFilters,
    pageSize: config.export.pageSize,
    cacheTtlSeconds: config.cache.exportTtlSeconds,
    pageDelayMs: config.export.pageDelayMs,
    maxPages: config.export.maxPages,
  });

  return {
    config,
    source,
    cache,
    exportState,
    orchestrator,
    query: new QueryService(cache, source, config.cache.searchTtlSeconds),
    analysis: new CompanyAnalysisService(cache, source, config.cache.searchTtlSeconds),
  };
}

let services: Services | null = null;

/** Process-wide services built from the environment on first use. */
export function getServices(): Services {
  if (services) return services;
  services = createServices(loadConfig());
  return services;
}
