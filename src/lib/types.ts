/* ── Provider (People Data Labs) payloads ── */

export interface PdlLocation {
  name?: string | null;
  locality?: string | null;
  region?: string | null;
  country?: string | null;
}

export interface PdlCompany {
  name?: string | null;
  website?: string | null;
  linkedin_url?: string | null;
  employee_count?: number | null;
  location?: PdlLocation | null;
  industry?: string | null;
  founded?: number | null;
  latest_funding_stage?: string | null;
  total_funding_raised?: number | null;
}

export interface PdlSearchResponse<T> {
  status: number;
  data: T[];
  total: number;
}

export interface PdlPerson {
  full_name?: string | null;
  job_title?: string | null;
  job_title_levels?: string[] | null;
  linkedin_url?: string | null;
  location_country?: string | null;
}

/* ── Normalized records ── */

export interface SearchFilters {
  min_employees?: number;
  max_employees?: number;
  funding_stages: string[];
}

export interface CompanyRecord {
  name: string | null;
  website: string | null;
  linkedin_url: string | null;
  employee_count: number | null;
  location: string | null;
  industry: string | null;
  founded_year: number | null;
  funding_stage: string | null;
  funding_total: number | null;
}

/** One page of companies as returned by a {@link CompanyDataSource}. */
export interface CompanyPage {
  total: number;
  companies: CompanyRecord[];
}

export interface EngineeringLeader {
  name: string | null;
  title: string | null;
  linkedin_url: string | null;
  location: string | null;
}

export interface EngineeringTeam {
  domain: string;
  engineering_headcount: number;
  total_employees: number | null;
  engineering_percentage: number;
  engineering_leaders: EngineeringLeader[];
}

/**
 * The upstream company database. Every method either resolves with
 * normalized data or rejects with an UpstreamError.
 */
export interface CompanyDataSource {
  /** Fetch one 1-indexed page of companies matching the filters. */
  fetchPage(filters: SearchFilters, page: number, size: number): Promise<CompanyPage>;
  countCompanies(filters: SearchFilters): Promise<number>;
  /** Look a company up by name; null when the provider has no match. */
  findCompany(name: string): Promise<CompanyRecord | null>;
  getEngineeringTeam(domain: string, totalEmployees: number | null): Promise<EngineeringTeam>;
  authenticate(): Promise<boolean>;
}
