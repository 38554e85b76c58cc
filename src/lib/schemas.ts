import { z } from "zod";
import type {
  CompanyPage,
  CompanyRecord,
  EngineeringLeader,
  EngineeringTeam,
  PdlCompany,
  PdlPerson,
} from "./types.js";

/* ── Cached payloads ── */

export const companyRecordSchema: z.ZodType<CompanyRecord> = z.object({
  name: z.string().nullable(),
  website: z.string().nullable(),
  linkedin_url: z.string().nullable(),
  employee_count: z.number().nullable(),
  location: z.string().nullable(),
  industry: z.string().nullable(),
  founded_year: z.number().nullable(),
  funding_stage: z.string().nullable(),
  funding_total: z.number().nullable(),
});

export const companyPageSchema: z.ZodType<CompanyPage> = z.object({
  total: z.number().int().nonnegative(),
  companies: z.array(companyRecordSchema),
});

export const countSchema = z.number().int().nonnegative();

const leaderSchema: z.ZodType<EngineeringLeader> = z.object({
  name: z.string().nullable(),
  title: z.string().nullable(),
  linkedin_url: z.string().nullable(),
  location: z.string().nullable(),
});

export const engineeringTeamSchema: z.ZodType<EngineeringTeam> = z.object({
  domain: z.string(),
  engineering_headcount: z.number().int().nonnegative(),
  total_employees: z.number().nullable(),
  engineering_percentage: z.number(),
  engineering_leaders: z.array(leaderSchema),
});

/* ── Provider responses ── */

const optionalString = z.string().nullish();
const optionalNumber = z.number().nullish();

export const pdlCompanySchema: z.ZodType<PdlCompany> = z.object({
  name: optionalString,
  website: optionalString,
  linkedin_url: optionalString,
  employee_count: optionalNumber,
  location: z
    .object({
      name: optionalString,
      locality: optionalString,
      region: optionalString,
      country: optionalString,
    })
    .nullish(),
  industry: optionalString,
  founded: optionalNumber,
  latest_funding_stage: optionalString,
  total_funding_raised: optionalNumber,
});

export const pdlPersonSchema: z.ZodType<PdlPerson> = z.object({
  full_name: optionalString,
  job_title: optionalString,
  job_title_levels: z.array(z.string()).nullish(),
  linkedin_url: optionalString,
  location_country: optionalString,
});

export function pdlSearchResponseSchema<T>(item: z.ZodType<T>) {
  return z.object({
    status: z.number(),
    data: z.array(item),
    total: z.number().int().nonnegative(),
  });
}
