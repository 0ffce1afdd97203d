/**
 * IP admission status: the gateway's per-address decision input.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import ipaddr from "ipaddr.js";
import { PayloadValidationError } from "../errors.js";

export enum IpStatus {
  /** Follow the normal security procedure. */
  None = -1,
  /** Bypass the security checks on the middleware layer. */
  Trusted = 0,
  /** Respond with 403 Forbidden without further checks. */
  Blocked = 1,
}

/**
 * Map a stored code to a status. Anything other than 0 or 1, including -1
 * and out-of-range values, is None.
 */
export function ipStatusFromCode(code: number): IpStatus {
  switch (code) {
    case 0:
      return IpStatus.Trusted;
    case 1:
      return IpStatus.Blocked;
    default:
      return IpStatus.None;
  }
}

export function ipStatusToCode(status: IpStatus): number {
  switch (status) {
    case IpStatus.Trusted:
      return 0;
    case IpStatus.Blocked:
      return 1;
    case IpStatus.None:
      return -1;
  }
}

export type IpStatusLabel = "none" | "trusted" | "blocked";

export function describeIpStatus(status: IpStatus): IpStatusLabel {
  switch (status) {
    case IpStatus.Trusted:
      return "trusted";
    case IpStatus.Blocked:
      return "blocked";
    case IpStatus.None:
      return "none";
  }
}

export const INT8_MIN = -128;
export const INT8_MAX = 127;

export function isInt8(value: number): boolean {
  return Number.isInteger(value) && value >= INT8_MIN && value <= INT8_MAX;
}

export const IpStatusPayloadSchema = Type.Object({
  ip: Type.String({ minLength: 1 }),
  status: Type.Integer({ minimum: INT8_MIN, maximum: INT8_MAX }),
});

export type IpStatusPayload = Static<typeof IpStatusPayloadSchema>;

export function isValidIp(ip: string): boolean {
  return ipaddr.IPv4.isValidFourPartDecimal(ip) || ipaddr.IPv6.isValid(ip);
}

/**
 * Validate an operator-submitted list of `{ ip, status }` records.
 * Order is preserved; duplicates are left for the store to resolve.
 */
export function parseIpStatusPayloads(value: unknown): IpStatusPayload[] {
  if (!Array.isArray(value)) {
    throw new PayloadValidationError("ip status payload must be a JSON array");
  }

  return value.map((entry: unknown, index) => {
    if (!Value.Check(IpStatusPayloadSchema, entry)) {
      throw new PayloadValidationError(
        `invalid ip status entry at index ${index}: expected { ip: string, status: int8 }`,
      );
    }
    if (!isValidIp(entry.ip)) {
      throw new PayloadValidationError(`invalid ip address at index ${index}: ${entry.ip}`);
    }
    return { ip: entry.ip, status: entry.status };
  });
}
