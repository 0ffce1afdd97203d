import { Redis } from "ioredis";
import type { GatewaySecurityConfig } from "../config.js";
import type { GatewaySecurityLogger } from "../logger.js";
import { RedisAdmissionStore } from "./redis-store.js";
import { InMemoryAdmissionStore, type AdmissionStore } from "./store.js";

const DEFAULT_REDIS_URL = "redis://127.0.0.1:6379";

export function createAdmissionStore(
  config: GatewaySecurityConfig,
  logger?: GatewaySecurityLogger,
): AdmissionStore {
  if (config.store.mode === "memory") {
    return new InMemoryAdmissionStore({ logger });
  }

  // Retries and pooling belong to the client; a failed command fails the call
  const client = new Redis(config.store.url ?? DEFAULT_REDIS_URL, {
    lazyConnect: true,
    maxRetriesPerRequest: 0,
    commandTimeout: config.store.commandTimeoutMs,
  });
  return new RedisAdmissionStore(client, { tableName: config.store.tableName, logger });
}

export async function closeAdmissionStore(store: AdmissionStore): Promise<void> {
  if (store instanceof RedisAdmissionStore) {
    await store.close();
  }
}
