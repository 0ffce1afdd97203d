import type { RedisHashClient } from "./redis-store.js";

/**
 * In-process stand-in for the Redis hash commands the admission store issues.
 * Values are stored as strings, like Redis does.
 */
export function createFakeRedisHashClient() {
  const hashes = new Map<string, Map<string, string>>();
  let unavailable = false;
  const commands: string[] = [];

  function hash(key: string): Map<string, string> {
    let existing = hashes.get(key);
    if (!existing) {
      existing = new Map();
      hashes.set(key, existing);
    }
    return existing;
  }

  function ensureAvailable(): void {
    if (unavailable) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    }
  }

  const client: RedisHashClient = {
    async hset(key, fields) {
      commands.push("HSET");
      ensureAvailable();
      const target = hash(key);
      let added = 0;
      for (const [field, value] of Object.entries(fields)) {
        if (!target.has(field)) added += 1;
        target.set(field, String(value));
      }
      return added;
    },
    async hget(key, field) {
      commands.push("HGET");
      ensureAvailable();
      return hashes.get(key)?.get(field) ?? null;
    },
    async hgetall(key) {
      commands.push("HGETALL");
      ensureAvailable();
      return Object.fromEntries(hashes.get(key) ?? []);
    },
    async quit() {
      return "OK";
    },
  };

  return {
    client,
    commands,
    /** Write a raw value, bypassing the store's encoding. */
    setRaw(key: string, field: string, value: string) {
      hash(key).set(field, value);
    },
    setUnavailable(value: boolean) {
      unavailable = value;
    },
  };
}
