import { describe, expect, it, vi } from "vitest";
import { formatDateMessage } from "./date-message.js";
import { createClaimVerifyHandler } from "./gateway.js";
import { addressForSecretKey, signClaim } from "./signed-message.js";
import { claimToWire, type SignedMessageClaim } from "./types.js";

const TEST_KEY = `0x${"4c".repeat(32)}`;
const NOW = new Date("2030-06-01T12:00:00.000Z");

async function wireClaim(expiry: Date) {
  const claim: SignedMessageClaim = {
    address: addressForSecretKey(TEST_KEY),
    dateMessage: formatDateMessage(expiry, 120),
    signature: "",
  };
  await signClaim(claim, TEST_KEY);
  return claimToWire(claim);
}

type HandlerResult = { ok: boolean; payload: Record<string, unknown> } | undefined;

function createResponder() {
  let result: HandlerResult;
  return {
    respond: (ok: boolean, payload: Record<string, unknown>) => {
      result = { ok, payload };
    },
    result: () => result,
  };
}

describe("claim verify gateway method", () => {
  const handler = createClaimVerifyHandler({ now: () => NOW });

  it("authenticates a valid claim", async () => {
    const params = await wireClaim(new Date(NOW.getTime() + 5 * 60_000));
    const { respond, result } = createResponder();

    await handler({ params, respond });

    expect(result()).toEqual({ ok: true, payload: { ok: true, address: params.address } });
  });

  it("rejects params missing a field", async () => {
    const { respond, result } = createResponder();

    await handler({ params: { address: "0x00", signature: "0x00" }, respond });

    expect(result()).toEqual({
      ok: false,
      payload: {
        error: "E_INVALID_ARGUMENT",
        message: "address, date_message and signature are required",
      },
    });
  });

  it("answers E_EXPIRED for an expired claim", async () => {
    const params = await wireClaim(new Date(NOW.getTime() - 1000));
    const { respond, result } = createResponder();

    await handler({ params, respond });

    expect(result()?.ok).toBe(false);
    expect(result()?.payload.error).toBe("E_EXPIRED");
  });

  it("answers E_FORBIDDEN when the signer differs", async () => {
    const params = await wireClaim(new Date(NOW.getTime() + 60_000));
    const { respond, result } = createResponder();

    await handler({
      params: { ...params, address: addressForSecretKey(`0x${"5d".repeat(32)}`) },
      respond,
    });

    expect(result()?.payload.error).toBe("E_FORBIDDEN");
  });

  it("answers E_INVALID_ARGUMENT without echoing input for a malformed claim", async () => {
    const params = await wireClaim(new Date(NOW.getTime() + 60_000));
    const logger = { info: vi.fn(), warn: vi.fn() };
    const { respond, result } = createResponder();

    await createClaimVerifyHandler({ now: () => NOW, logger })({
      params: { ...params, address: params.address.toLowerCase() },
      respond,
    });

    expect(result()).toEqual({
      ok: false,
      payload: {
        error: "E_INVALID_ARGUMENT",
        message:
          "The request contains invalid or missing parameters. Please check your input and try again.",
      },
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
