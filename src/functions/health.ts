import type { FunctionConfig } from "../lib/http.js";
import { json, preflight } from "../lib/http.js";

/**
 * GET /api/health
 */
export default async (req: Request) => {
  if (req.method === "OPTIONS") return preflight();
  return json({ status: "ok", timestamp: new Date().toISOString() });
};

export const config: FunctionConfig = {
  path: "/api/health",
  method: ["GET"],
};
