/**
 * logger.ts — Structured logging for the farm CRM data layer.
 *
 * Built on pino.
 *
 * Configuration:
 *   FARMDAL_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug", test: "silent")
 *   FARMDAL_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.boot.info("server starting");
 *   log.store.error({ err, op: "getFarmer" }, "query failed");
 *
 * Subsystem loggers:
 *   log.boot, log.db, log.store, log.http
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";

/** Resolve log level from environment */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.FARMDAL_LOG_LEVEL) {
    return env.FARMDAL_LOG_LEVEL;
  }
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  const isDev = env.NODE_ENV !== "production" && !isTest;
  if (isTest) return "silent";
  if (isDev) return "debug";
  return "info";
}

/** Build pino transport configuration */
export function resolveTransport(env: NodeJS.ProcessEnv = process.env): pino.TransportSingleOptions | undefined {
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  if (isTest) return undefined;
  const isDev = env.NODE_ENV !== "production";

  const wantPretty =
    env.FARMDAL_LOG_PRETTY === "true" ||
    (env.FARMDAL_LOG_PRETTY !== "false" && isDev);

  if (wantPretty) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
    };
  }

  return undefined;
}

// ─── Root Logger ────────────────────────────────────────────────

const level = resolveLevel();
const transport = resolveTransport();

/**
 * Map pino numeric levels to GCP Cloud Logging severity strings.
 * @see https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#LogSeverity
 */
const PINO_TO_GCP_SEVERITY: Record<number, string> = {
  10: "DEBUG",    // trace
  20: "DEBUG",    // debug
  30: "INFO",     // info
  40: "WARNING",  // warn
  50: "ERROR",    // error
  60: "CRITICAL", // fatal
};

/** Whether to emit GCP-compatible JSON (production = no pino-pretty). */
const GCP_FORMAT = !IS_TEST && !transport;

export const rootLogger: Logger = pino({
  level,
  ...(transport ? { transport } : {}),
  ...(GCP_FORMAT ? { messageKey: "message" } : {}),
  base: { service: "farm-crm-dal" },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    ...(GCP_FORMAT
      ? {
          level(label: string, number: number) {
            return { severity: PINO_TO_GCP_SEVERITY[number] || label.toUpperCase(), level: number };
          },
        }
      : {}),
  },
  // Connection strings carry credentials.
  redact: {
    paths: [
      "password", "*.password",
      "connectionString", "*.connectionString",
      "authorization", "*.authorization",
      "req.headers.authorization",
      "req.headers.cookie",
    ],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

export const log = {
  /** Boot/startup sequence */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Pool and session lifecycle */
  db: rootLogger.child({ subsystem: "db" }),
  /** Farm store operations */
  store: rootLogger.child({ subsystem: "store" }),
  /** HTTP/API layer */
  http: rootLogger.child({ subsystem: "http" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

export type { Logger };
