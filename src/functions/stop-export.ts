import { getServices, type Services } from "../lib/services.js";
import { json, preflight, type FunctionConfig } from "../lib/http.js";

/**
 * POST /api/stop_export
 * Asks the running export to stop at the next page boundary. The run ends
 * as failed and stays resumable.
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();
  const stopping = services.orchestrator.requestStop();
  if (stopping) console.log("Stop requested for running export");
  return json({ stopping });
};

export const config: FunctionConfig = {
  path: "/api/stop_export",
  method: ["POST"],
};
