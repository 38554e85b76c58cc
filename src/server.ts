import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { disconnectRedis } from "./lib/redis.js";
import { getServices } from "./lib/services.js";

async function main(): Promise<void> {
  const services = getServices();
  const { config } = services;

  if (!config.pdl.apiKey) {
    console.warn("PDL_API_KEY is not set; provider requests will fail");
  }

  const recovered = await services.exportState.recoverInterrupted();
  if (recovered) {
    console.log(`Export ${recovered.run_id} can be resumed from page ${recovered.last_successful_page + 1}`);
  }

  const server = serve({ fetch: createApp(services).fetch, port: config.port }, (info) => {
    console.log(`Listening on http://localhost:${info.port} (store: ${config.store.driver})`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      disconnectRedis()
        .catch((error: unknown) => console.error("Error closing Redis:", error))
        .finally(() => process.exit(0));
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
