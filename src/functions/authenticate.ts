import { getServices, type Services } from "../lib/services.js";
import { errorResponse, json, preflight, type FunctionConfig } from "../lib/http.js";

/**
 * POST /api/authenticate
 * Checks that the configured provider API key is accepted.
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();

  try {
    return json({ pdl: await services.source.authenticate() });
  } catch (error) {
    return errorResponse(error, "Error checking API key");
  }
};

export const config: FunctionConfig = {
  path: "/api/authenticate",
  method: ["POST"],
};
