import { Hono } from "hono";
import { functions } from "./functions/index.js";
import { json } from "./lib/http.js";
import type { Services } from "./lib/services.js";

/**
 * Mount every function on its configured path. OPTIONS is routed to the
 * same handler so each one answers its own CORS preflight.
 */
export function createApp(services: Services): Hono {
  const app = new Hono();

  for (const fn of functions) {
    app.on([...fn.config.method, "OPTIONS"], fn.config.path, (c) => fn.handler(c.req.raw, services));
  }

  app.notFound((c) => json({ error: `No route for ${c.req.method} ${c.req.path}` }, 404));
  app.onError((err) => {
    console.error("Unhandled error:", err);
    return json({ error: err.message }, 500);
  });

  return app;
}
