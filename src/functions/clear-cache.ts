import { getServices, type Services } from "../lib/services.js";
import { errorResponse, json, preflight, type FunctionConfig } from "../lib/http.js";

/**
 * POST /api/clear_cache
 * Drops every cached provider response so the next queries hit the API.
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();

  try {
    const cleared = await services.cache.clear();
    return json({ cleared });
  } catch (error) {
    return errorResponse(error, "Error clearing cache");
  }
};

export const config: FunctionConfig = {
  path: "/api/clear_cache",
  method: ["POST"],
};
