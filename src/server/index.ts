/**
 * index.ts — Farm CRM API server (thin shell)
 *
 * App factory + boot sequence. Route handlers live in src/server/routes/*.ts.
 *
 * Endpoints:
 *   GET  /api                             — API discovery manifest
 *   GET  /api/health                      — Database connectivity
 *   GET  /api/diagnostic                  — Table row counts
 *   GET  /api/farmers                     — Farmers by farm name
 *   GET  /api/farmers/:id                 — One farmer
 *   GET  /api/farmers/:id/fields          — Fields + active planting
 *   GET  /api/farmers/:id/conversations   — Recent turns
 *   POST /api/farmers/:id/conversations   — Record a question/answer pair
 *   GET  /api/crops/:name                 — Crop lookup
 *   GET  /api/conversations/approval      — Approval queue
 *   GET  /api/conversations/:id           — Conversation detail
 */

import express from "express";
import compression from "compression";
import { pinoHttp } from "pino-http";
import { log, rootLogger } from "./logger.js";
import { createPool, createSessionFactory, redactUrl, type SessionFactory } from "./db.js";
import { createFarmStore } from "./stores/farm-store.js";
import type { AppState } from "./app-context.js";
import { bootstrapConfigSync } from "./config.js";
import { envelopeMiddleware, errorHandler, sendFail, ErrorCode } from "./envelope.js";

// Route modules
import { createCoreRoutes } from "./routes/core.js";
import { createFarmerRoutes } from "./routes/farmers.js";
import { createCropRoutes } from "./routes/crops.js";
import { createConversationRoutes } from "./routes/conversations.js";

// Re-export for test compatibility
export type { AppState };

// ─── Module-level state ─────────────────────────────────────────
const state: AppState = {
  pool: null,
  farmStore: null,
  startupComplete: false,
  config: bootstrapConfigSync(),
};

// ─── App Factory ────────────────────────────────────────────────
export function createApp(appState: AppState): express.Express {
  const app = express();

  // requestId + timing on every request; before the body parser so
  // parse errors carry a request id too
  app.use(envelopeMiddleware);

  app.use(express.json({ limit: "100kb" }));

  app.use(compression());

  // Structured HTTP request logging
  app.use(pinoHttp({ logger: rootLogger }));

  // ─── Mount route modules ──────────────────────────────────
  app.use(createCoreRoutes(appState));
  app.use(createFarmerRoutes(appState));
  app.use(createCropRoutes(appState));
  app.use(createConversationRoutes(appState));

  app.use("/api", (_req, res) => {
    sendFail(res, ErrorCode.NOT_FOUND, "Unknown endpoint", 404, { hints: ["GET /api lists every endpoint"] });
  });

  // Catch-all → envelope
  app.use(errorHandler);

  return app;
}

// ─── Startup ────────────────────────────────────────────────────

/**
 * Wire the farm store into `appState` and run the boot health check.
 * Until it resolves, /api/health answers "initializing" with Retry-After.
 */
export async function initFarmStore(appState: AppState, sessions: SessionFactory): Promise<void> {
  appState.farmStore = createFarmStore(sessions);

  if (await appState.farmStore.healthCheck()) {
    log.boot.info("farm store online");
  } else {
    // Serve anyway: /api/health reports the outage and every route degrades to STORE_ERROR
    log.boot.warn("database unreachable at boot");
  }

  appState.startupComplete = true;
}

async function boot(): Promise<void> {
  log.boot.info("farm CRM API initializing");

  const { config } = state;
  const pool = createPool(config.databaseUrl, config.pool);
  state.pool = pool;
  log.boot.info({
    url: redactUrl(config.databaseUrl),
    poolSize: config.pool.poolSize,
    maxOverflow: config.pool.maxOverflow,
    prePing: config.pool.prePing,
  }, "pool created");

  const app = createApp(state);
  app.listen(config.port, () => {
    log.boot.info({ port: config.port, url: `http://localhost:${config.port}` }, "farm CRM API listening");
  });

  await initFarmStore(state, createSessionFactory(pool, { prePing: config.pool.prePing }));
}

// ─── Graceful Shutdown ──────────────────────────────────────────
async function shutdown(): Promise<void> {
  log.boot.info("farm CRM API shutting down");
  if (state.pool) {
    await state.pool.end();
  }
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((err: unknown) => {
    log.boot.error({ err: err instanceof Error ? err.message : String(err) }, "shutdown failed");
    process.exit(1);
  });
}

// ─── Launch (guarded for test imports) ──────────────────────────
if (!state.config.isTest) {
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  boot().catch((err: unknown) => {
    log.boot.fatal({ err: err instanceof Error ? err.message : String(err) }, "fatal startup error");
    process.exit(1);
  });
}
