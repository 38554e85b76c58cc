import { getServices, type Services } from "../lib/services.js";
import { errorResponse, json, preflight, readJson, CORS_HEADERS, type FunctionConfig } from "../lib/http.js";
import { parseBody, startExportSchema } from "../lib/validation.js";

/**
 * POST /api/start_export
 * Runs the export to completion (or failure) and answers with the CSV.
 *
 * Body: { start_page?: number, resume?: boolean }
 *   resume=true continues one page after the last successful page of the
 *   previous run and ignores start_page.
 *
 * A failed run that still fetched rows returns the partial CSV with
 * X-Export-Status: failed and the reason in X-Export-Error.
 */
export default async (req: Request, services: Services = getServices()) => {
  if (req.method === "OPTIONS") return preflight();

  try {
    const body = parseBody(startExportSchema, await readJson(req));
    const result = await services.orchestrator.runExport({
      startPage: body.start_page,
      resume: body.resume,
    });
    const { artifact } = result;

    if (artifact.companies.length === 0) {
      const status = result.status === "failed" ? 502 : 404;
      const error = result.status === "failed" ? result.reason : "No companies found matching criteria";
      return json({ error, run_id: result.run_id, last_successful_page: result.last_successful_page }, status);
    }

    const headers: Record<string, string> = {
      ...CORS_HEADERS,
      "Content-Type": `${artifact.content_type}; charset=utf-8`,
      "Content-Disposition": `attachment; filename="${artifact.filename}"`,
      "X-Export-Run-Id": result.run_id,
      "X-Export-Status": result.status,
      "X-Export-Pages": `${artifact.first_page}-${artifact.last_page}`,
      "X-Export-Last-Successful-Page": String(result.last_successful_page),
    };
    if (result.status === "failed") headers["X-Export-Error"] = result.reason;

    return new Response(artifact.body, { status: 200, headers });
  } catch (error) {
    return errorResponse(error, "Export failed");
  }
};

export const config: FunctionConfig = {
  path: "/api/start_export",
  method: ["POST"],
};
