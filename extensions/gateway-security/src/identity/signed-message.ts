/**
 * Signed-claim authentication.
 *
 * A claim is the signer's address, an expiry timestamp and a recoverable
 * secp256k1 signature over the personal-message hash of that timestamp.
 * Verification succeeds while the timestamp is in the future and the address
 * recovered from the signature equals the (checksummed) claimed address.
 */

import {
  concat,
  isHex,
  keccak256,
  numberToHex,
  recoverAddress,
  stringToBytes,
  type Hex,
} from "viem";
import { privateKeyToAccount, sign } from "viem/accounts";
import {
  CryptoError,
  GatewaySecurityError,
  SignatureFormatError,
  describeError,
  redactSensitiveInfo,
} from "../errors.js";
import { LOG_PREFIX, type GatewaySecurityLogger } from "../logger.js";
import { parseValidAddress } from "./checksum.js";
import { parseDateMessage } from "./date-message.js";
import type { ClaimRejectionReason, SignedMessageClaim } from "./types.js";

export const PERSONAL_MESSAGE_PREFIX = "\x19Ethereum Signed Message:\n";

const SIGNATURE_PREFIX = "0x";
const SIGNATURE_HEX_LENGTH = 130;
const VALID_RECOVERY_BYTES: ReadonlySet<number> = new Set([0, 1, 27, 28]);

type ClaimCheck =
  | { ok: true; address: Hex }
  | { ok: false; reason: ClaimRejectionReason };

/**
 * keccak256(prefix ‖ byteLength(message) ‖ message).
 * The length token counts UTF-8 bytes, not characters.
 */
export function computeMessageHash(dateMessage: string): Hex {
  const body = stringToBytes(dateMessage);
  return keccak256(
    concat([stringToBytes(PERSONAL_MESSAGE_PREFIX), stringToBytes(String(body.length)), body]),
  );
}

function normalizeSecretKey(secretKey: string): Hex {
  const trimmed = secretKey.trim();
  const prefixed = trimmed.startsWith("0x") ? trimmed : `0x${trimmed}`;
  if (!isHex(prefixed)) {
    throw new CryptoError("secret key must be hex encoded");
  }
  return prefixed;
}

/** Checksummed address controlled by a secret key. */
export function addressForSecretKey(secretKey: string): Hex {
  const privateKey = normalizeSecretKey(secretKey);
  try {
    return privateKeyToAccount(privateKey).address;
  } catch (err) {
    throw new CryptoError(`invalid secret key: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Sign `claim.dateMessage` and store the 65-byte signature on the claim.
 * The recovery id is serialized as 0 or 1.
 */
export async function signClaim(claim: SignedMessageClaim, secretKey: string): Promise<Hex> {
  const hash = computeMessageHash(claim.dateMessage);
  const privateKey = normalizeSecretKey(secretKey);

  let signature: Hex;
  try {
    const { r, s, v, yParity } = await sign({ hash, privateKey, to: "object" });
    const recoveryId = yParity ?? (v === 28n ? 1 : 0);
    signature = concat([r, s, numberToHex(recoveryId, { size: 1 })]);
  } catch (err) {
    throw new CryptoError(`signing failed: ${describeError(err)}`, { cause: err });
  }

  claim.signature = signature;
  return signature;
}

export function parseSignature(signature: string): Hex {
  const body = signature.startsWith(SIGNATURE_PREFIX)
    ? signature.slice(SIGNATURE_PREFIX.length)
    : signature;
  if (body.length !== SIGNATURE_HEX_LENGTH || !/^[0-9a-fA-F]*$/.test(body)) {
    throw new SignatureFormatError("signature must be 65 bytes of hex");
  }
  const recoveryByte = Number.parseInt(body.slice(128), 16);
  if (!VALID_RECOVERY_BYTES.has(recoveryByte)) {
    throw new SignatureFormatError(`invalid signature recovery id: ${recoveryByte}`);
  }
  return `${SIGNATURE_PREFIX}${body}`;
}

async function checkClaim(claim: SignedMessageClaim, now: Date): Promise<ClaimCheck> {
  const validUntil = parseDateMessage(claim.dateMessage);
  if (now.getTime() > validUntil.getTime()) {
    return { ok: false, reason: "expired" };
  }

  const address = parseValidAddress(claim.address);
  const signature = parseSignature(claim.signature);
  const hash = computeMessageHash(claim.dateMessage);

  let recovered: Hex;
  try {
    recovered = await recoverAddress({ hash, signature });
  } catch (err) {
    throw new CryptoError(`signature recovery failed: ${describeError(err)}`, { cause: err });
  }

  if (recovered !== address) {
    return { ok: false, reason: "mismatch" };
  }
  return { ok: true, address };
}

/**
 * Verify a claim at `now`.
 *
 * Resolves `false` for an expired claim or a signature from another key.
 * Rejects with DateFormatError, AddressFormatError, ChecksumMismatchError,
 * SignatureFormatError or CryptoError for malformed input.
 */
export async function verifyClaim(
  claim: SignedMessageClaim,
  now: Date = new Date(),
): Promise<boolean> {
  const result = await checkClaim(claim, now);
  return result.ok;
}

export type ClaimOutcome =
  | { status: "authenticated"; address: Hex }
  | { status: "rejected"; reason: ClaimRejectionReason }
  | { status: "malformed"; error: GatewaySecurityError };

export type AuthenticateClaimOptions = {
  now?: Date;
  logger?: GatewaySecurityLogger;
};

/**
 * Verify a claim and fold the result into one of three outcomes.
 * Malformed claims are logged as anomalies; rejections are routine and are not.
 */
export async function authenticateClaim(
  claim: SignedMessageClaim,
  options: AuthenticateClaimOptions = {},
): Promise<ClaimOutcome> {
  try {
    const result = await checkClaim(claim, options.now ?? new Date());
    if (result.ok) {
      return { status: "authenticated", address: result.address };
    }
    return { status: "rejected", reason: result.reason };
  } catch (err) {
    if (!(err instanceof GatewaySecurityError)) {
      throw err;
    }
    options.logger?.warn(
      `${LOG_PREFIX} malformed signed claim (${err.name}): ${redactSensitiveInfo(err.message)}`,
    );
    return { status: "malformed", error: err };
  }
}
