import { stringify } from "csv-stringify/sync";
import type { CompanyRecord } from "./types.js";

export const CSV_COLUMNS = [
  "name",
  "website",
  "linkedin_url",
  "total_employees",
  "location",
  "industry",
  "founded_year",
  "funding_stage",
  "funding_total",
] as const;

export interface ExportArtifact {
  readonly filename: string;
  readonly content_type: "text/csv";
  readonly body: Uint8Array;
  readonly companies: readonly CompanyRecord[];
  readonly first_page: number | null;
  readonly last_page: number | null;
  readonly created_at: string;
}

const na = (value: string | number | null): string | number => (value === null || value === "" ? "N/A" : value);

function toRow(c: CompanyRecord): Record<(typeof CSV_COLUMNS)[number], string | number> {
  return {
    name: na(c.name),
    website: na(c.website),
    linkedin_url: na(c.linkedin_url),
    total_employees: na(c.employee_count),
    location: na(c.location),
    industry: na(c.industry),
    founded_year: na(c.founded_year),
    funding_stage: na(c.funding_stage),
    funding_total: na(c.funding_total),
  };
}

/** `20261019_093015` in UTC. */
export function exportTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

export function artifactFilename(createdAt: Date, firstPage: number | null, lastPage: number | null): string {
  const range = firstPage !== null && lastPage !== null ? `${firstPage}-${lastPage}` : "none";
  return `companies_export_${exportTimestamp(createdAt)}_pages_${range}.csv`;
}

export function renderCsv(companies: readonly CompanyRecord[]): string {
  return stringify(companies.map(toRow), { header: true, columns: [...CSV_COLUMNS] });
}

/**
 * Package the companies fetched from pages `firstPage..lastPage` into an
 * immutable CSV artifact.
 */
export function packageArtifact(
  companies: readonly CompanyRecord[],
  firstPage: number | null,
  lastPage: number | null,
  createdAt: Date = new Date(),
): ExportArtifact {
  const artifact: ExportArtifact = {
    filename: artifactFilename(createdAt, firstPage, lastPage),
    content_type: "text/csv",
    body: Buffer.from(renderCsv(companies), "utf-8"),
    companies: Object.freeze([...companies]),
    first_page: firstPage,
    last_page: lastPage,
    created_at: createdAt.toISOString(),
  };
  return Object.freeze(artifact);
}
