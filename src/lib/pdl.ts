import type { z } from "zod";
import { ENGINEERING_SAMPLE_SIZE } from "../config/engineering.js";
import { TARGET_COUNTRIES } from "../config/export-filters.js";
import type { AppConfig } from "../config/env.js";
import { UpstreamError, errorMessage } from "./errors.js";
import { isEngineeringLeader, normalizeCompany, normalizeDomain, normalizePerson } from "./normalize.js";
import { pdlCompanySchema, pdlPersonSchema, pdlSearchResponseSchema } from "./schemas.js";
import type {
  CompanyDataSource,
  CompanyPage,
  CompanyRecord,
  EngineeringTeam,
  PdlCompany,
  PdlPerson,
  PdlSearchResponse,
  SearchFilters,
} from "./types.js";

type EsClause = Record<string, unknown>;

/** Elasticsearch-style query the company search endpoint accepts. */
export function buildCompanyQuery(filters: SearchFilters): EsClause {
  const must: EsClause[] = [];

  if (filters.min_employees !== undefined || filters.max_employees !== undefined) {
    const range: Record<string, number> = {};
    if (filters.min_employees !== undefined) range.gte = filters.min_employees;
    if (filters.max_employees !== undefined) range.lte = filters.max_employees;
    must.push({ range: { employee_count: range } });
  }

  if (filters.funding_stages.length > 0) {
    must.push({ terms: { latest_funding_stage: filters.funding_stages } });
  }

  must.push({ exists: { field: "total_funding_raised" } });
  must.push({ terms: { "location.country": TARGET_COUNTRIES } });

  return { bool: { must } };
}

export function buildEngineeringQuery(domain: string): EsClause {
  return {
    bool: {
      must: [{ term: { job_company_website: domain } }, { term: { job_title_role: "engineering" } }],
    },
  };
}

interface RequestOptions {
  method: "GET" | "POST";
  body?: unknown;
  query?: Record<string, string>;
  /** Treat 404 as "no records" instead of an error. */
  notFoundOk?: boolean;
}

/**
 * People Data Labs client. Every failure surfaces as an {@link UpstreamError}.
 */
export class PdlClient implements CompanyDataSource {
  constructor(
    private readonly config: AppConfig["pdl"],
    private readonly fetchImpl: typeof fetch = (input, init) => fetch(input, init),
  ) {}

  async fetchPage(filters: SearchFilters, page: number, size: number): Promise<CompanyPage> {
    const response = await this.searchCompanies(filters, size, (page - 1) * size);
    return { total: response.total, companies: response.data.map(normalizeCompany) };
  }

  async countCompanies(filters: SearchFilters): Promise<number> {
    const response = await this.searchCompanies(filters, 1, 0);
    return response.total;
  }

  async findCompany(name: string): Promise<CompanyRecord | null> {
    const body = await this.request("/v5/company/enrich", { method: "GET", query: { name }, notFoundOk: true });
    if (body === null) return null;
    return normalizeCompany(this.parse(pdlCompanySchema, body, "company enrich"));
  }

  async getEngineeringTeam(domain: string, totalEmployees: number | null): Promise<EngineeringTeam> {
    const site = normalizeDomain(domain);
    const body = await this.request("/v5/person/search", {
      method: "POST",
      body: { query: buildEngineeringQuery(site), size: ENGINEERING_SAMPLE_SIZE },
      notFoundOk: true,
    });
    const people: PdlSearchResponse<PdlPerson> =
      body === null
        ? { status: 404, total: 0, data: [] }
        : this.parse(pdlSearchResponseSchema(pdlPersonSchema), body, "person search");

    const headcount = people.total;
    const percentage = totalEmployees && totalEmployees > 0 ? Math.round((headcount / totalEmployees) * 10000) / 100 : 0;

    return {
      domain: site,
      engineering_headcount: headcount,
      total_employees: totalEmployees,
      engineering_percentage: Math.min(percentage, 100),
      engineering_leaders: people.data.filter(isEngineeringLeader).map(normalizePerson),
    };
  }

  /** Whether the configured key is accepted by the provider. */
  async authenticate(): Promise<boolean> {
    try {
      await this.searchCompanies({ funding_stages: [] }, 1, 0);
      return true;
    } catch (error) {
      if (error instanceof UpstreamError && error.kind === "auth") return false;
      throw error;
    }
  }

  private async searchCompanies(filters: SearchFilters, size: number, from: number): Promise<PdlSearchResponse<PdlCompany>> {
    const body = await this.request("/v5/company/search", {
      method: "POST",
      body: { query: buildCompanyQuery(filters), size, from },
      notFoundOk: true,
    });
    if (body === null) return { status: 404, total: 0, data: [] };
    return this.parse(pdlSearchResponseSchema(pdlCompanySchema), body, "company search");
  }

  private parse<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")} ${issue.message}` : "unexpected shape";
      throw new UpstreamError("malformed", `Malformed ${what} response: ${where}`);
    }
    return parsed.data;
  }

  private async request(path: string, opts: RequestOptions): Promise<unknown> {
    if (!this.config.apiKey) {
      throw new UpstreamError("auth", "PDL_API_KEY is not configured");
    }

    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(opts.query ?? {})) url.searchParams.set(key, value);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: opts.method,
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          "X-Api-Key": this.config.apiKey,
        },
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError("network", `PDL request to ${path} failed: ${errorMessage(error)}`);
    }

    if (response.status === 404 && opts.notFoundOk) return null;

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 300);
      console.error(`PDL returned ${response.status} for ${path}: ${detail}`);
      if (response.status === 429) {
        throw new UpstreamError("rate_limit", "PDL API rate limit exceeded", 429);
      }
      if (response.status === 401 || response.status === 403) {
        throw new UpstreamError("auth", "Invalid PDL API key or unauthorized access", response.status);
      }
      throw new UpstreamError("http", `PDL API error (${response.status})`, response.status);
    }

    try {
      return await response.json();
    } catch {
      throw new UpstreamError("malformed", `Invalid JSON response from ${path}`, response.status);
    }
  }
}
