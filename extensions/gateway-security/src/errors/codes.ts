/**
 * Standard error codes for the gateway security extension.
 * Gateway methods, HTTP handlers and the CLI all report these codes.
 */

/**
 * Stable error codes enum.
 * These codes are part of the public API contract and should never change.
 */
export enum ErrorCode {
  /**
   * Invalid input (400 Bad Request equivalent)
   * Examples:
   * - Address without the 0x prefix or with a bad checksum
   * - Date message not in `YYYY-MM-DD HH:MM:SS ±ZZZZ` form
   * - Signature that is not 65 bytes of hex
   * - IP status payload with an out-of-range code
   */
  E_INVALID_ARGUMENT = "E_INVALID_ARGUMENT",

  /** Signature does not belong to the claimed address (403 Forbidden equivalent) */
  E_FORBIDDEN = "E_FORBIDDEN",

  /** Signed claim is past its expiry instant */
  E_EXPIRED = "E_EXPIRED",

  /** Request body exceeds the configured limit (413 equivalent) */
  E_PAYLOAD_TOO_LARGE = "E_PAYLOAD_TOO_LARGE",

  /** Signing or recovery primitive failed */
  E_INTERNAL = "E_INTERNAL",

  /** Admission store could not be reached or rejected the command (503 equivalent) */
  E_UNAVAILABLE = "E_UNAVAILABLE",
}

/**
 * Standard error response structure.
 */
export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export const ERROR_CODE_DESCRIPTIONS: Record<ErrorCode, string> = {
  [ErrorCode.E_INVALID_ARGUMENT]:
    "The request contains invalid or missing parameters. Please check your input and try again.",
  [ErrorCode.E_FORBIDDEN]: "The signature does not match the claimed address.",
  [ErrorCode.E_EXPIRED]: "The signed message has expired. Please sign a new message.",
  [ErrorCode.E_PAYLOAD_TOO_LARGE]: "The request body is too large.",
  [ErrorCode.E_INTERNAL]:
    "An internal error occurred. Please try again later. If the problem persists, contact support.",
  [ErrorCode.E_UNAVAILABLE]: "The admission store is temporarily unavailable. Please try again later.",
};

/** HTTP status equivalent for each code. */
export const ERROR_CODE_HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.E_INVALID_ARGUMENT]: 400,
  [ErrorCode.E_FORBIDDEN]: 403,
  [ErrorCode.E_EXPIRED]: 401,
  [ErrorCode.E_PAYLOAD_TOO_LARGE]: 413,
  [ErrorCode.E_INTERNAL]: 500,
  [ErrorCode.E_UNAVAILABLE]: 503,
};
