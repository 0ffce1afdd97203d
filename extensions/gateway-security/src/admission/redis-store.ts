/**
 * Redis-backed admission store. The mapping lives in one hash:
 *
 *   HSET    <table> <ip> <code>
 *   HSET    <table> <ip1> <code1> <ip2> <code2> ...
 *   HGET    <table> <ip>
 *   HGETALL <table>
 */

import { StorageError, describeError } from "../errors.js";
import { silentLogger, type GatewaySecurityLogger } from "../logger.js";
import {
  IpStatus,
  ipStatusFromCode,
  ipStatusToCode,
  isInt8,
  type IpStatusPayload,
} from "./ip-status.js";
import { logReadFailure, type AdmissionStore } from "./store.js";

/** The slice of an ioredis client this store needs. */
export type RedisHashClient = {
  hset(key: string, fields: Record<string, string | number>): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  quit(): Promise<unknown>;
};

export type RedisAdmissionStoreOptions = {
  tableName: string;
  logger?: GatewaySecurityLogger;
};

function decodeCode(raw: string): number {
  const code = Number(raw);
  if (raw.trim().length === 0 || !isInt8(code)) {
    throw new Error(`stored status is not an int8: ${JSON.stringify(raw)}`);
  }
  return code;
}

export class RedisAdmissionStore implements AdmissionStore {
  private readonly tableName: string;
  private readonly logger: GatewaySecurityLogger;

  constructor(
    private readonly client: RedisHashClient,
    options: RedisAdmissionStoreOptions,
  ) {
    this.tableName = options.tableName;
    this.logger = options.logger ?? silentLogger;
  }

  async insert(ip: string, status: IpStatus): Promise<void> {
    try {
      await this.client.hset(this.tableName, { [ip]: ipStatusToCode(status) });
    } catch (err) {
      throw new StorageError(`admission store insert failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async bulkInsert(records: readonly IpStatusPayload[]): Promise<void> {
    if (records.length === 0) return;

    // Later records overwrite earlier ones for the same ip. fromEntries defines
    // own properties, so a "__proto__" key is written like any other.
    const fields = Object.fromEntries(
      new Map(records.map((record): [string, number] => [record.ip, record.status])),
    );

    try {
      await this.client.hset(this.tableName, fields);
    } catch (err) {
      throw new StorageError(`admission store bulk insert failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async read(ip: string): Promise<IpStatus> {
    try {
      const raw = await this.client.hget(this.tableName, ip);
      if (raw === null) return IpStatus.None;
      return ipStatusFromCode(decodeCode(raw));
    } catch (err) {
      logReadFailure(this.logger, "read", err);
      return IpStatus.None;
    }
  }

  async readAll(): Promise<Map<string, number>> {
    try {
      const raw = await this.client.hgetall(this.tableName);
      const entries = new Map<string, number>();
      for (const [ip, value] of Object.entries(raw)) {
        entries.set(ip, decodeCode(value));
      }
      return entries;
    } catch (err) {
      logReadFailure(this.logger, "readAll", err);
      return new Map();
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
