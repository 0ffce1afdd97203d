/**
 * Gateway method for signed-claim authentication.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ErrorCode, ERROR_CODE_DESCRIPTIONS } from "../errors/codes.js";
import { formatGatewaySecurityErrorResponse } from "../errors.js";
import type { GatewaySecurityLogger } from "../logger.js";
import type { GatewayRequestHandler, GatewayRequestHandlerOptions } from "../types.js";
import { authenticateClaim } from "./signed-message.js";
import { claimFromWire } from "./types.js";

export const SignedMessageClaimSchema = Type.Object({
  address: Type.String({ minLength: 1 }),
  date_message: Type.String({ minLength: 1 }),
  signature: Type.String({ minLength: 1 }),
});

export type SignedMessageClaimParams = Static<typeof SignedMessageClaimSchema>;

export type ClaimVerifyHandlerOptions = {
  logger?: GatewaySecurityLogger;
  /** Clock override for tests */
  now?: () => Date;
};

export function createClaimVerifyHandler(
  options: ClaimVerifyHandlerOptions = {},
): GatewayRequestHandler {
  return async ({ params, respond }: GatewayRequestHandlerOptions) => {
    if (!Value.Check(SignedMessageClaimSchema, params)) {
      respond(false, {
        error: ErrorCode.E_INVALID_ARGUMENT,
        message: "address, date_message and signature are required",
      });
      return;
    }

    const outcome = await authenticateClaim(claimFromWire(params), {
      now: options.now?.(),
      logger: options.logger,
    });

    switch (outcome.status) {
      case "authenticated":
        respond(true, { ok: true, address: outcome.address });
        return;
      case "rejected": {
        const code = outcome.reason === "expired" ? ErrorCode.E_EXPIRED : ErrorCode.E_FORBIDDEN;
        respond(false, { error: code, message: ERROR_CODE_DESCRIPTIONS[code] });
        return;
      }
      case "malformed":
        respond(false, { ...formatGatewaySecurityErrorResponse(outcome.error) });
        return;
    }
  };
}
