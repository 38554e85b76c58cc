import type { CacheStore } from "./cache-store.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { fingerprint } from "./fingerprint.js";
import { buildOutreach, type OutreachMessage } from "./outreach.js";
import { companyRecordSchema, engineeringTeamSchema } from "./schemas.js";
import type { CompanyDataSource, CompanyRecord, EngineeringTeam } from "./types.js";

export interface CompanyAnalysis {
  company: CompanyRecord;
  engineering: EngineeringTeam | { error: string };
  personalized_messages: OutreachMessage[];
}

/** `https://www.acme.io/about` → `acme.io` */
export function domainFromWebsite(website: string | null): string | null {
  if (!website) return null;
  const host = website
    .trim()
    .replace(/^[a-z]+:\/\//i, "")
    .split(/[/?#]/)[0]
    .replace(/:\d+$/, "")
    .replace(/^www\./i, "")
    .toLowerCase();
  return host.includes(".") ? host : null;
}

export class CompanyAnalysisService {
  constructor(
    private readonly cache: CacheStore,
    private readonly source: CompanyDataSource,
    private readonly ttlSeconds: number,
  ) {}

  /**
   * Company profile, engineering team and outreach drafts. A failed team
   * lookup is reported inside `engineering` so the profile stays usable.
   */
  async analyzeCompany(companyName: string): Promise<CompanyAnalysis> {
    const name = companyName.trim();
    if (!name) throw new ValidationError("company_name is required");

    // Misses throw inside the fetch so they are never cached.
    const company = await this.cache.getOrFetch(
      fingerprint("company:lookup", { name: name.toLowerCase() }),
      async () => {
        const found = await this.source.findCompany(name);
        if (!found || !found.name) throw new NotFoundError(`Could not find company data for: ${name}`);
        return found;
      },
      { ttlSeconds: this.ttlSeconds, schema: companyRecordSchema },
    );

    const domain = domainFromWebsite(company.website);
    if (!domain) {
      return { company, engineering: { error: "Could not determine company domain" }, personalized_messages: [] };
    }

    let engineering: EngineeringTeam;
    try {
      engineering = await this.cache.getOrFetch(
        fingerprint("company:engineering", { domain, total_employees: company.employee_count }),
        () => this.source.getEngineeringTeam(domain, company.employee_count),
        { ttlSeconds: this.ttlSeconds, schema: engineeringTeamSchema },
      );
    } catch (error) {
      console.error(`Engineering lookup failed for ${domain}:`, error);
      return { company, engineering: { error: "Could not retrieve engineering data" }, personalized_messages: [] };
    }

    return {
      company,
      engineering,
      personalized_messages: buildOutreach(company, engineering.engineering_leaders, engineering.engineering_percentage),
    };
  }
}
