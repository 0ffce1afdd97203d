/**
 * Admission guard consulted per inbound connection, before the normal checks.
 */

import { LOG_PREFIX, silentLogger, type GatewaySecurityLogger } from "../logger.js";
import { IpStatus } from "./ip-status.js";
import type { AdmissionStore } from "./store.js";

/**
 * - bypass:  trusted, skip security checks entirely
 * - reject:  blocked, answer 403 immediately
 * - inspect: no decision recorded, run the normal check pipeline
 */
export type AdmissionAction = "bypass" | "reject" | "inspect";

export type AdmissionDecision = {
  ip: string;
  status: IpStatus;
  action: AdmissionAction;
};

export function resolveAdmission(status: IpStatus): AdmissionAction {
  switch (status) {
    case IpStatus.Trusted:
      return "bypass";
    case IpStatus.Blocked:
      return "reject";
    case IpStatus.None:
      return "inspect";
  }
}

export function createAdmissionGuard(
  store: AdmissionStore,
  options: { logger?: GatewaySecurityLogger } = {},
) {
  const logger = options.logger ?? silentLogger;

  return {
    /** Never rejects: store failures read as IpStatus.None. */
    async check(ip: string): Promise<AdmissionDecision> {
      const status = await store.read(ip);
      const action = resolveAdmission(status);
      if (action === "reject") {
        logger.info(`${LOG_PREFIX} rejected blocked ip ${ip}`);
      }
      return { ip, status, action };
    },
  };
}

export type AdmissionGuard = ReturnType<typeof createAdmissionGuard>;
