/**
 * envelope.ts — API response envelope.
 *
 * Consistent response shape for all API consumers:
 *   Success: { ok: true, data: T, meta: { requestId, timestamp, durationMs } }
 *   Error:   { ok: false, error: { code, message, detail? }, meta: ... }
 *
 * Usage in routes:
 *   import { sendOk, sendFail, ErrorCode } from "../envelope.js";
 *   sendOk(res, { farmers, count: farmers.length });
 *   sendFail(res, ErrorCode.INVALID_PARAM, "Farmer id must be a positive integer", 400);
 */

import { randomUUID, createHash } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { log } from "./logger.js";
import type { StoreResult } from "./types/store-result.js";

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ErrorCode = {
  // 503 — subsystem not ready
  STORE_NOT_AVAILABLE: "STORE_NOT_AVAILABLE",
  DATABASE_UNREACHABLE: "DATABASE_UNREACHABLE",
  // 400/404/413 — client errors
  MISSING_PARAM: "MISSING_PARAM",
  INVALID_PARAM: "INVALID_PARAM",
  NOT_FOUND: "NOT_FOUND",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  // 504 — timeout
  REQUEST_TIMEOUT: "REQUEST_TIMEOUT",
  // 500 — upstream failures
  STORE_ERROR: "STORE_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ─── Meta ───────────────────────────────────────────────────────

export interface ApiMeta {
  requestId: string;
  timestamp: string;
  durationMs: number;
}

// ─── Middleware: attach requestId + startTime ───────────────────

export function envelopeMiddleware(_req: Request, res: Response, next: NextFunction): void {
  const requestId = randomUUID();
  const startTime = Date.now();

  res.locals._requestId = requestId;
  res.locals._startTime = startTime;
  res.setHeader("X-Request-Id", requestId);

  next();
}

// ─── Helpers ────────────────────────────────────────────────────

function buildMeta(res: Response): ApiMeta {
  const requestId: unknown = res.locals._requestId;
  const startTime: unknown = res.locals._startTime;
  return {
    requestId: typeof requestId === "string" ? requestId : "unknown",
    timestamp: new Date().toISOString(),
    durationMs: typeof startTime === "number" ? Date.now() - startTime : 0,
  };
}

/** Send a success envelope. */
export function sendOk(res: Response, data: unknown, statusCode = 200): void {
  const envelope = { ok: true, data, meta: buildMeta(res) };

  // Conditional revalidation for GETs. Hash only the data portion:
  // meta.timestamp/durationMs change every request.
  if (res.req?.method === "GET" && statusCode === 200) {
    const dataJson = JSON.stringify(data);
    const hash = createHash("md5").update(dataJson).digest("base64url").slice(0, 16);
    const etag = `W/"${hash}"`;
    res.setHeader("ETag", etag);
    res.setHeader("Cache-Control", "no-cache");

    const ifNoneMatch = res.req.headers["if-none-match"];
    if (ifNoneMatch === etag) {
      res.status(304).end();
      return;
    }
  }

  res.status(statusCode).json(envelope);
}

/** Options for extended error details passed to sendFail. */
export interface FailOptions {
  detail?: unknown;
  hints?: string[];
}

/** Send an error envelope. */
export function sendFail(
  res: Response,
  code: string,
  message: string,
  statusCode = 400,
  options?: FailOptions,
): void {
  const detail = options?.detail;
  const hints = options?.hints;
  res.status(statusCode).json({
    ok: false,
    error: {
      code,
      message,
      ...(detail !== undefined ? { detail } : {}),
      ...(hints?.length ? { hints } : {}),
    },
    meta: buildMeta(res),
  });
}

/**
 * Send a store result: value → 200 (or `statusCode`), empty → 404,
 * failed → 500 with a generic message. The cause was already logged by the store.
 */
export function sendResult<T>(
  res: Response,
  result: StoreResult<T>,
  notFoundMessage: string,
  statusCode = 200,
): void {
  switch (result.status) {
    case "ok":
      sendOk(res, result.value, statusCode);
      return;
    case "empty":
      sendFail(res, ErrorCode.NOT_FOUND, notFoundMessage, 404);
      return;
    case "failed":
      sendFail(res, ErrorCode.STORE_ERROR, "Database query failed", 500, {
        hints: ["Check /api/health for database connectivity"],
      });
      return;
  }
}

// ─── Timeout Middleware ─────────────────────────────────────────

/**
 * Create a timeout middleware for a specific route.
 * If the request takes longer than `timeoutMs`, returns 504 Gateway Timeout.
 */
export function createTimeoutMiddleware(timeoutMs: number) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timer = setTimeout(() => {
      if (!res.headersSent) {
        log.http.warn({
          requestId: res.locals._requestId,
          path: req.path,
          timeoutMs,
        }, "request timeout");
        sendFail(res, ErrorCode.REQUEST_TIMEOUT, `Request timed out after ${Math.round(timeoutMs / 1000)}s`, 504);
      }
    }, timeoutMs);

    const cleanup = () => {
      clearTimeout(timer);
    };

    res.on("finish", cleanup);
    res.on("close", cleanup);

    next();
  };
}

// ─── Catch-all error handler (mount AFTER routes) ───────────────

export function errorHandler(
  err: Error & { status?: number; statusCode?: number; type?: string },
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  // Headers already sent (e.g., timeout fired first)
  if (res.headersSent) {
    return;
  }

  let statusCode = err.status || err.statusCode || 500;
  let code: ErrorCodeValue = statusCode >= 500 ? ErrorCode.INTERNAL_ERROR : ErrorCode.INVALID_PARAM;

  if (err.type === "entity.too.large") {
    statusCode = 413;
    code = ErrorCode.PAYLOAD_TOO_LARGE;
  }

  // Client code never sees internal error details (SQL, hostnames, etc.)
  const internalMessage = err.message || "Internal server error";
  log.http.error({ err: internalMessage, requestId: res.locals._requestId }, "unhandled error");
  const clientMessage = statusCode >= 500 ? "Internal server error" : internalMessage;
  sendFail(res, code, clientMessage, statusCode);
}
