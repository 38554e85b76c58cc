import { DomainError, ValidationError, errorMessage } from "./errors.js";

export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
};

export interface FunctionConfig {
  path: string;
  method: Array<"GET" | "POST">;
}

export function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data, null, 2), {
    status,
    headers: { ...CORS_HEADERS, "Content-Type": "application/json", ...headers },
  });
}

export function preflight(): Response {
  return new Response("", { status: 200, headers: CORS_HEADERS });
}

/** Map an error to `{ error }` with the status its class carries. */
export function errorResponse(error: unknown, context: string): Response {
  if (error instanceof DomainError) {
    console.error(`${context}: ${error.name}: ${error.message}`);
    return json({ error: error.message, code: error.code }, error.statusCode);
  }
  console.error(`${context}:`, error);
  return json({ error: errorMessage(error) }, 500);
}

/** Parse a JSON request body; an empty body reads as `{}`. */
export async function readJson(req: Request): Promise<unknown> {
  const text = await req.text();
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}
