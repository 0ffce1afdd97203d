/**
 * Operator HTTP surface for the admission list.
 *
 *   POST /ip-status  body: [{ "ip": string, "status": int8 }]  → 204, bulk upsert
 *   GET  /ip-status                                             → 200, every stored mapping
 *
 * Failures answer `{ error, message, details? }` with the status of the error code.
 */

import type { GatewaySecurityConfig } from "../config.js";
import { ErrorCode, ERROR_CODE_HTTP_STATUS } from "../errors/codes.js";
import {
  PayloadTooLargeError,
  PayloadValidationError,
  describeError,
  formatGatewaySecurityErrorResponse,
  redactSensitiveInfo,
} from "../errors.js";
import { LOG_PREFIX, silentLogger, type GatewaySecurityLogger } from "../logger.js";
import { parseIpStatusPayloads, type IpStatusPayload } from "./ip-status.js";
import type { AdmissionStore } from "./store.js";

export const IP_STATUS_PATH = "/ip-status";

/** What the handler reads from a request; node's IncomingMessage satisfies it. */
export type IpStatusRequest = AsyncIterable<Buffer | string> & {
  method?: string;
};

/** What the handler writes to a response; node's ServerResponse satisfies it. */
export type IpStatusResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
};

function sendJson(res: IpStatusResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.end(JSON.stringify(body));
}

/**
 * Error bodies share the gateway method's `{ error, message, details? }` shape;
 * the status follows the code.
 */
function sendError(
  res: IpStatusResponse,
  err: unknown,
  fallback: ErrorCode,
  details?: Record<string, unknown>,
): void {
  const body = formatGatewaySecurityErrorResponse(err, fallback, details);
  sendJson(res, ERROR_CODE_HTTP_STATUS[body.error], body);
}

function parseJsonBody(rawBody: string): unknown {
  try {
    return JSON.parse(rawBody);
  } catch {
    throw new PayloadValidationError("request body is not valid JSON");
  }
}

async function readRequestBody(req: IpStatusRequest, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    total += buffer.length;
    if (total > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export function createIpStatusHttpHandler(
  store: AdmissionStore,
  config: GatewaySecurityConfig,
  logger: GatewaySecurityLogger = silentLogger,
) {
  async function handlePost(req: IpStatusRequest, res: IpStatusResponse): Promise<void> {
    let payload: IpStatusPayload[];
    try {
      const rawBody = await readRequestBody(req, config.http.maxBodyBytes);
      payload = parseIpStatusPayloads(parseJsonBody(rawBody));
    } catch (err) {
      const details = err instanceof PayloadValidationError ? { reason: err.message } : undefined;
      sendError(res, err, ErrorCode.E_INVALID_ARGUMENT, details);
      return;
    }

    try {
      await store.bulkInsert(payload);
    } catch (err) {
      logger.warn(
        `${LOG_PREFIX} ip status bulk insert failed: ${redactSensitiveInfo(describeError(err))}`,
      );
      sendError(res, err, ErrorCode.E_INTERNAL);
      return;
    }

    logger.info(`${LOG_PREFIX} stored ${payload.length} ip status entries`);
    res.statusCode = 204;
    res.setHeader("Content-Type", "application/json");
    res.end();
  }

  async function handleGet(res: IpStatusResponse): Promise<void> {
    const entries = await store.readAll();
    const list: IpStatusPayload[] = [...entries].map(([ip, status]) => ({ ip, status }));
    sendJson(res, 200, list);
  }

  return async (req: IpStatusRequest, res: IpStatusResponse): Promise<void> => {
    switch (req.method) {
      case "POST":
        await handlePost(req, res);
        return;
      case "GET":
        await handleGet(res);
        return;
      default:
        res.statusCode = 405;
        res.setHeader("Allow", "GET, POST");
        res.end("Method Not Allowed");
    }
  };
}
