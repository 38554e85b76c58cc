import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { SearchFilters } from "./types.js";

/** Empty strings and null mean "not given"; digit strings read as numbers. */
const blankToUndefined = (v: unknown) =>
  v === "" || v === null ? undefined : typeof v === "string" && /^\d+$/.test(v.trim()) ? Number(v) : v;

const whole = (name: string, min: 0 | 1) => {
  const message = `${name} must be a ${min === 0 ? "non-negative" : "positive"} number`;
  return z.number({ invalid_type_error: message }).int(`${name} must be a whole number`).min(min, message);
};

/** Optional count; absent or blank stays undefined. */
const count = (name: string, min: 0 | 1 = 0) => z.preprocess(blankToUndefined, whole(name, min).optional());

/** Count that falls back to `fallback` when absent or blank. */
const countOr = (name: string, fallback: number) => z.preprocess(blankToUndefined, whole(name, 1).default(fallback));

const stages = z.preprocess(
  (v) => (typeof v === "string" ? v.split(",") : v ?? []),
  z.array(z.string({ invalid_type_error: "funding_stages must be a list of strings" })),
);

export const searchRequestSchema = z
  .object({
    min_employees: count("min_employees"),
    max_employees: count("max_employees"),
    funding_stages: stages,
    page: countOr("page", 1),
    size: countOr("size", 10),
  })
  .refine((b) => b.min_employees === undefined || b.max_employees === undefined || b.min_employees <= b.max_employees, {
    message: "min_employees must not exceed max_employees",
    path: ["min_employees"],
  });

export const startExportSchema = z.object({
  start_page: count("start_page", 1),
  resume: z.boolean().default(false),
});

export const analyzeRequestSchema = z.object({
  company_name: z.string({ required_error: "company_name is required" }).trim().min(1, "company_name is required"),
});

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? "Invalid request", {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return parsed.data;
}

export function toFilters(body: z.infer<typeof searchRequestSchema>): SearchFilters {
  const filters: SearchFilters = { funding_stages: body.funding_stages };
  if (body.min_employees !== undefined) filters.min_employees = body.min_employees;
  if (body.max_employees !== undefined) filters.max_employees = body.max_employees;
  return filters;
}
