import { getServices, type Services } from "../lib/services.js";
import { errorResponse, json, preflight, type FunctionConfig } from "../lib/http.js";

/**
 * GET /api/export_history
 * Finished export runs, newest first.
 *
 * Query params:
 *   limit - max runs (default 20)
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();

  try {
    const url = new URL(req.url);
    const limit = parseInt(url.searchParams.get("limit") || "20", 10);
    const runs = await services.exportState.history(Number.isFinite(limit) && limit > 0 ? limit : 20);
    return json({ count: runs.length, runs });
  } catch (error) {
    return errorResponse(error, "Error reading export history");
  }
};

export const config: FunctionConfig = {
  path: "/api/export_history",
  method: ["GET"],
};
