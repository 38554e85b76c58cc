import { getServices, type Services } from "../lib/services.js";
import { errorResponse, json, preflight, type FunctionConfig } from "../lib/http.js";

/**
 * GET /api/export_status
 * Progress of the current (or last) export run. Safe to poll.
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();

  try {
    const snap = await services.exportState.snapshot();
    return json({
      run_id: snap.run_id,
      status: snap.status,
      total_companies: snap.total_companies,
      current_page: snap.current_page,
      can_resume: snap.can_resume,
      last_successful_page: snap.last_successful_page,
      error: snap.status === "failed" ? snap.reason : null,
      message: snap.reason,
      last_updated: snap.updated_at,
    });
  } catch (error) {
    return errorResponse(error, "Error reading export status");
  }
};

export const config: FunctionConfig = {
  path: "/api/export_status",
  method: ["GET"],
};
