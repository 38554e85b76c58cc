import { createHash } from "crypto";
import type { SearchFilters } from "./types.js";

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

/**
 * Recursively sort object keys and drop null or undefined members so that
 * two objects built in a different order serialize identically.
 */
function canonicalize(value: unknown): Canonical {
  if (value === null || value === undefined) return null;
  if (typeof value === "boolean" || typeof value === "number" || typeof value === "string") return value;
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === "object") {
    const out: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member === undefined || member === null) continue;
      out[key] = canonicalize(member);
    }
    return out;
  }
  throw new TypeError(`Cannot fingerprint a value of type ${typeof value}`);
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * Normalize filters: stages trimmed, lower-cased, de-duplicated and sorted;
 * absent bounds omitted.
 */
export function normalizeFilters(filters: SearchFilters): SearchFilters {
  const stages = [...new Set(filters.funding_stages.map((s) => s.trim().toLowerCase()).filter(Boolean))].sort();
  const out: SearchFilters = { funding_stages: stages };
  if (filters.min_employees !== undefined) out.min_employees = filters.min_employees;
  if (filters.max_employees !== undefined) out.max_employees = filters.max_employees;
  return out;
}

/**
 * Deterministic cache key for a query: `<scope>:<sha256 of the canonical params>`.
 */
export function fingerprint(scope: string, params: Record<string, unknown>): string {
  const hash = createHash("sha256").update(canonicalJson(params)).digest("hex");
  return `${scope}:${hash}`;
}

export function pageFingerprint(filters: SearchFilters, page: number, size: number): string {
  return fingerprint("companies:page", { ...normalizeFilters(filters), page, size });
}

export function countFingerprint(filters: SearchFilters): string {
  return fingerprint("companies:count", { ...normalizeFilters(filters) });
}
