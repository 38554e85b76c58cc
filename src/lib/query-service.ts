import type { CacheStore } from "./cache-store.js";
import { ValidationError } from "./errors.js";
import { countFingerprint, normalizeFilters, pageFingerprint } from "./fingerprint.js";
import { companyPageSchema, countSchema } from "./schemas.js";
import type { CompanyDataSource, CompanyRecord, SearchFilters } from "./types.js";

export interface SearchResult {
  companies: CompanyRecord[];
  total: number;
  page: number;
  size: number;
  total_pages: number;
}

export const MAX_PAGE_SIZE = 100;

/**
 * Interactive company search. Shares the cache with exports but never
 * touches export state.
 */
export class QueryService {
  constructor(
    private readonly cache: CacheStore,
    private readonly source: CompanyDataSource,
    private readonly ttlSeconds: number,
  ) {}

  async search(filters: SearchFilters, page: number, size: number): Promise<SearchResult> {
    if (!Number.isInteger(page) || page < 1) throw new ValidationError("page must be a positive integer");
    if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
      throw new ValidationError(`size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }

    const normalized = normalizeFilters(filters);
    const total = await this.count(normalized);
    const totalPages = Math.ceil(total / size);

    if (page > totalPages) {
      return { companies: [], total, page, size, total_pages: totalPages };
    }

    const result = await this.cache.getOrFetch(
      pageFingerprint(normalized, page, size),
      () => this.source.fetchPage(normalized, page, size),
      { ttlSeconds: this.ttlSeconds, schema: companyPageSchema },
    );

    console.log(`Search page ${page}/${totalPages}: ${result.companies.length} of ${total} companies`);
    return { companies: result.companies, total, page, size, total_pages: totalPages };
  }

  async count(filters: SearchFilters): Promise<number> {
    return this.cache.getOrFetch(countFingerprint(filters), () => this.source.countCompanies(filters), {
      ttlSeconds: this.ttlSeconds,
      schema: countSchema,
    });
  }
}
