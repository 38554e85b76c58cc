import { Redis } from "ioredis";
import type { AppConfig } from "../config/env.js";

let client: Redis | null = null;

export function getRedisClient(config: AppConfig["store"]["redis"]): Redis {
  if (client) return client;

  client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password || undefined,
    maxRetriesPerRequest: 3,
    connectTimeout: 5000,
    commandTimeout: 10000,
  });

  return client;
}

export async function disconnectRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
  }
}
