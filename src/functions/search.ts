import { getServices, type Services } from "../lib/services.js";
import { errorResponse, json, preflight, readJson, type FunctionConfig } from "../lib/http.js";
import { parseBody, searchRequestSchema, toFilters } from "../lib/validation.js";

/**
 * POST /api/search
 * One page of companies matching the filters, plus the total match count.
 *
 * Body:
 *   min_employees  - lower employee bound (optional)
 *   max_employees  - upper employee bound (optional)
 *   funding_stages - e.g. ["series_a"] (optional)
 *   page           - 1-indexed page (default 1)
 *   size           - page size, 1-100 (default 10)
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();

  try {
    const body = parseBody(searchRequestSchema, await readJson(req));
    const result = await services.query.search(toFilters(body), body.page, body.size);
    return json(result);
  } catch (error) {
    return errorResponse(error, "Error during company search");
  }
};

export const config: FunctionConfig = {
  path: "/api/search",
  method: ["POST"],
};
