/**
 * Gateway Security extension
 *
 * Registers:
 * - Gateway: gateway.claim.verify (signed-claim authentication)
 * - HTTP:    GET/POST /ip-status (operator admission list)
 * - Guard:   per-connection admission check (trusted / blocked / none)
 * - Service: admission store lifecycle
 */

import { createAdmissionStore, closeAdmissionStore } from "./admission/create-store.js";
import { createAdmissionGuard, type AdmissionGuard } from "./admission/guard.js";
import {
  createIpStatusHttpHandler,
  IP_STATUS_PATH,
  type IpStatusRequest,
  type IpStatusResponse,
} from "./admission/http.js";
import { resolveConfig } from "./config.js";
import { createClaimVerifyHandler } from "./identity/gateway.js";
import { LOG_PREFIX, type GatewaySecurityLogger } from "./logger.js";
import type { GatewayRequestHandler, GatewayService, HttpRouteHandler } from "./types.js";

export const CLAIM_VERIFY_METHOD = "gateway.claim.verify";

export type GatewaySecurityHostApi = {
  pluginConfig?: Record<string, unknown>;
  logger: GatewaySecurityLogger;
  registerGatewayMethod: (method: string, handler: GatewayRequestHandler) => void;
  registerHttpRoute: (route: {
    path: string;
    handler: HttpRouteHandler<IpStatusRequest, IpStatusResponse>;
  }) => void;
  registerAdmissionGuard: (guard: AdmissionGuard) => void;
  registerService: (service: GatewayService) => void;
};

const plugin = {
  id: "gateway-security",
  name: "Gateway Security",
  description: "Signed-claim authentication and IP admission list for the API gateway",
  version: "0.1.0",

  register(api: GatewaySecurityHostApi): void {
    const config = resolveConfig(api.pluginConfig);
    const store = createAdmissionStore(config, api.logger);

    api.registerGatewayMethod(CLAIM_VERIFY_METHOD, createClaimVerifyHandler({ logger: api.logger }));

    api.registerHttpRoute({
      path: IP_STATUS_PATH,
      handler: createIpStatusHttpHandler(store, config, api.logger),
    });

    api.registerAdmissionGuard(createAdmissionGuard(store, { logger: api.logger }));

    api.registerService({
      id: "gateway-security-store",
      async stop() {
        await closeAdmissionStore(store);
        api.logger.info(`${LOG_PREFIX} admission store closed`);
      },
    });

    api.logger.info(`${LOG_PREFIX} registered (store: ${config.store.mode})`);
  },
};

export default plugin;

export * from "./admission/create-store.js";
export * from "./admission/guard.js";
export * from "./admission/http.js";
export * from "./admission/ip-status.js";
export * from "./admission/redis-store.js";
export * from "./admission/store.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./errors/codes.js";
export * from "./identity/checksum.js";
export * from "./identity/date-message.js";
export * from "./identity/gateway.js";
export * from "./identity/signed-message.js";
export * from "./identity/types.js";
export * from "./logger.js";
export * from "./types.js";
