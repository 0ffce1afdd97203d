/**
 * Admission store: persistent ip → status code mapping.
 *
 * Writes surface StorageError so an operator never silently loses an
 * allow/block entry. Reads fail open: an unreadable status is None and an
 * unreadable listing is empty.
 */

import { StorageError, describeError, redactSensitiveInfo } from "../errors.js";
import { LOG_PREFIX, silentLogger, type GatewaySecurityLogger } from "../logger.js";
import { IpStatus, ipStatusFromCode, ipStatusToCode, type IpStatusPayload } from "./ip-status.js";

export interface AdmissionStore {
  insert(ip: string, status: IpStatus): Promise<void>;
  /** One batched upsert; a repeated ip keeps its last value. */
  bulkInsert(records: readonly IpStatusPayload[]): Promise<void>;
  read(ip: string): Promise<IpStatus>;
  /** Raw stored codes, not normalized through ipStatusFromCode. */
  readAll(): Promise<Map<string, number>>;
}

export function logReadFailure(
  logger: GatewaySecurityLogger,
  operation: string,
  err: unknown,
): void {
  logger.warn(
    `${LOG_PREFIX} admission store ${operation} failed, falling back to normal procedure: ${redactSensitiveInfo(describeError(err))}`,
  );
}

/**
 * Process-local store. Used in tests and single-node development; `setUnavailable`
 * simulates a store outage.
 */
export class InMemoryAdmissionStore implements AdmissionStore {
  private readonly entries = new Map<string, number>();
  private unavailable = false;
  private readonly logger: GatewaySecurityLogger;

  constructor(options: { logger?: GatewaySecurityLogger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  private assertAvailable(operation: string): void {
    if (this.unavailable) {
      throw new StorageError(`admission store unavailable (${operation})`);
    }
  }

  async insert(ip: string, status: IpStatus): Promise<void> {
    this.assertAvailable("insert");
    this.entries.set(ip, ipStatusToCode(status));
  }

  async bulkInsert(records: readonly IpStatusPayload[]): Promise<void> {
    this.assertAvailable("bulkInsert");
    for (const record of records) {
      this.entries.set(record.ip, record.status);
    }
  }

  async read(ip: string): Promise<IpStatus> {
    try {
      this.assertAvailable("read");
    } catch (err) {
      logReadFailure(this.logger, "read", err);
      return IpStatus.None;
    }
    const code = this.entries.get(ip);
    return code === undefined ? IpStatus.None : ipStatusFromCode(code);
  }

  async readAll(): Promise<Map<string, number>> {
    try {
      this.assertAvailable("readAll");
    } catch (err) {
      logReadFailure(this.logger, "readAll", err);
      return new Map();
    }
    return new Map(this.entries);
  }
}
