/**
 * Extension configuration types and defaults for gateway-security.
 *
 * Store default: in-memory, so a bare gateway boots without Redis.
 * Production deployments set `store.mode = "redis"` and `store.url`.
 */

// ---------------------------------------------------------------------------
// Admission store
// ---------------------------------------------------------------------------

export type StoreMode = "memory" | "redis";

export type StoreConfig = {
  mode: StoreMode;
  /** Redis connection URL (redis:// or rediss://) */
  url?: string;
  /** Hash key holding the ip → status code mapping */
  tableName: string;
  /** Per-command timeout; a timed-out read falls back to "none" */
  commandTimeoutMs?: number;
};

// ---------------------------------------------------------------------------
// HTTP surface
// ---------------------------------------------------------------------------

export type HttpConfig = {
  maxBodyBytes: number;
};

export type GatewaySecurityConfig = {
  store: StoreConfig;
  http: HttpConfig;
};

export const DEFAULT_STATUS_TABLE = "status_list";

export const DEFAULT_CONFIG: GatewaySecurityConfig = {
  store: {
    mode: "memory",
    tableName: DEFAULT_STATUS_TABLE,
  },
  http: {
    maxBodyBytes: 1024 * 1024,
  },
};

const VALID_STORE_MODES: ReadonlySet<string> = new Set<StoreMode>(["memory", "redis"]);

function isStoreMode(value: unknown): value is StoreMode {
  return typeof value === "string" && VALID_STORE_MODES.has(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

function positiveNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : undefined;
}

function nonBlankString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

/** Merge user-supplied partial config with defaults. */
export function resolveConfig(raw?: Record<string, unknown>): GatewaySecurityConfig {
  if (!raw) {
    return { store: { ...DEFAULT_CONFIG.store }, http: { ...DEFAULT_CONFIG.http } };
  }

  const storeRaw = asRecord(raw.store);
  const httpRaw = asRecord(raw.http);

  return {
    store: {
      mode: isStoreMode(storeRaw.mode) ? storeRaw.mode : DEFAULT_CONFIG.store.mode,
      url: nonBlankString(storeRaw.url),
      tableName: nonBlankString(storeRaw.tableName) ?? DEFAULT_STATUS_TABLE,
      commandTimeoutMs: positiveNumber(storeRaw.commandTimeoutMs),
    },
    http: {
      maxBodyBytes: positiveNumber(httpRaw.maxBodyBytes) ?? DEFAULT_CONFIG.http.maxBodyBytes,
    },
  };
}

/**
 * Build config from environment variables (CLI entry point).
 *
 *   GATEWAY_GUARD_STORE_MODE        memory | redis
 *   GATEWAY_GUARD_REDIS_URL         implies redis mode when set
 *   GATEWAY_GUARD_STATUS_TABLE      hash key, default "status_list"
 *   GATEWAY_GUARD_REDIS_TIMEOUT_MS  per-command timeout
 */
export function resolveConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewaySecurityConfig {
  const url = nonBlankString(env.GATEWAY_GUARD_REDIS_URL);
  const timeout = Number(env.GATEWAY_GUARD_REDIS_TIMEOUT_MS);
  return resolveConfig({
    store: {
      mode: env.GATEWAY_GUARD_STORE_MODE ?? (url ? "redis" : undefined),
      url,
      tableName: env.GATEWAY_GUARD_STATUS_TABLE,
      commandTimeoutMs: Number.isFinite(timeout) ? timeout : undefined,
    },
  });
}
