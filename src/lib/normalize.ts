import { LEADER_LEVELS, LEADER_TITLES } from "../config/engineering.js";
import type { CompanyRecord, EngineeringLeader, PdlCompany, PdlLocation, PdlPerson } from "./types.js";

const text = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

const num = (value: number | null | undefined): number | null =>
  typeof value === "number" && Number.isFinite(value) ? value : null;

/** "Austin, Texas, United States" from the provider's location parts. */
export function formatLocation(location: PdlLocation | null | undefined): string | null {
  if (!location) return null;
  const parts = [location.locality, location.region, location.country]
    .map(text)
    .filter((p): p is string => p !== null)
    .map((p) => p.replace(/\b\w/g, (ch) => ch.toUpperCase()));
  if (parts.length > 0) return parts.join(", ");
  return text(location.name);
}

export function normalizeCompany(raw: PdlCompany): CompanyRecord {
  return {
    name: text(raw.name),
    website: text(raw.website),
    linkedin_url: text(raw.linkedin_url),
    employee_count: num(raw.employee_count),
    location: formatLocation(raw.location),
    industry: text(raw.industry),
    founded_year: num(raw.founded),
    funding_stage: text(raw.latest_funding_stage),
    funding_total: num(raw.total_funding_raised),
  };
}

export function normalizePerson(raw: PdlPerson): EngineeringLeader {
  return {
    name: text(raw.full_name),
    title: text(raw.job_title),
    linkedin_url: text(raw.linkedin_url),
    location: text(raw.location_country),
  };
}

export function isEngineeringLeader(raw: PdlPerson): boolean {
  const title = (raw.job_title ?? "").toLowerCase();
  if (LEADER_TITLES.some((t) => new RegExp(`\\b${t}\\b`).test(title))) return true;
  return (raw.job_title_levels ?? []).some((level) => LEADER_LEVELS.includes(level.toLowerCase()));
}

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^www\./, "");
}
