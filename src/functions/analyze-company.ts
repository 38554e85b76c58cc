import { getServices, type Services } from "../lib/services.js";
import { errorResponse, json, preflight, readJson, type FunctionConfig } from "../lib/http.js";
import { analyzeRequestSchema, parseBody } from "../lib/validation.js";

/**
 * POST /api/analyze_company { company_name }
 * Company profile, engineering team and outreach drafts. Engineering lookup
 * failures come back as `engineering.error` with a 200.
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();

  try {
    const { company_name } = parseBody(analyzeRequestSchema, await readJson(req));
    return json(await services.analysis.analyzeCompany(company_name));
  } catch (error) {
    return errorResponse(error, "Error analyzing company");
  }
};

export const config: FunctionConfig = {
  path: "/api/analyze_company",
  method: ["POST"],
};
