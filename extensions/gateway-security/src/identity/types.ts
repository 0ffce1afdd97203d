/**
 * Signed-claim types: a short-lived, personally signed expiry timestamp.
 */

export type SignedMessageClaim = {
  /** 0x-prefixed checksummed address of the signer */
  address: string;
  /** Expiry instant, `YYYY-MM-DD HH:MM:SS ±ZZZZ`; also the signed payload */
  dateMessage: string;
  /** 0x-prefixed r ‖ s ‖ recovery id, 65 bytes */
  signature: string;
};

/** Shape of a claim on the wire (gateway params, CLI output). */
export type SignedMessageClaimWire = {
  address: string;
  date_message: string;
  signature: string;
};

export type ClaimRejectionReason = "expired" | "mismatch";

export function claimFromWire(wire: SignedMessageClaimWire): SignedMessageClaim {
  return {
    address: wire.address,
    dateMessage: wire.date_message,
    signature: wire.signature,
  };
}

export function claimToWire(claim: SignedMessageClaim): SignedMessageClaimWire {
  return {
    address: claim.address,
    date_message: claim.dateMessage,
    signature: claim.signature,
  };
}
