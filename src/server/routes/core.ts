/**
 * routes/core.ts — Core infrastructure routes.
 *
 * Health, API discovery, and diagnostic.
 */

import { Router } from "express";
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { AppState } from "../app-context.js";
import { sendOk, sendFail, sendResult, createTimeoutMiddleware, ErrorCode } from "../envelope.js";
import { getFarmStore } from "../services/route-helpers/farm-route-helpers.js";

// Read version from package.json once at module load (source tree or dist/)
const __dirname = dirname(fileURLToPath(import.meta.url));
const APP_VERSION = ((): string => {
  for (const candidate of ["../../../package.json", "../../../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, candidate), "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      // not at this depth
    }
  }
  return "unknown";
})();

export interface HealthResponse {
  status: "online" | "initializing";
  version: string;
  database: "connected" | "unreachable";
}

interface DiscoveryEndpoint {
  method: string;
  path: string;
  description: string;
  params?: Record<string, string>;
  body?: Record<string, string>;
}

// CANONICAL ROUTE LIST — update this when adding/removing routes.
export const API_ENDPOINTS: DiscoveryEndpoint[] = [
  { method: "GET", path: "/api", description: "API discovery (this endpoint)" },
  { method: "GET", path: "/api/health", description: "Database connectivity check" },
  { method: "GET", path: "/api/diagnostic", description: "Row counts for every farm table" },
  { method: "GET", path: "/api/farmers", description: "Farmers ordered by farm name", params: { limit: "1-100 (default 100)" } },
  { method: "GET", path: "/api/farmers/:id", description: "One farmer" },
  { method: "GET", path: "/api/farmers/:id/fields", description: "Fields with their active planting" },
  { method: "GET", path: "/api/farmers/:id/conversations", description: "Recent conversation turns, newest first", params: { limit: "1-100 (default 10)" } },
  { method: "POST", path: "/api/farmers/:id/conversations", description: "Record a question/answer pair", body: { question: "string (required)", answer: "string (required)", phone: "string (optional)" } },
  { method: "GET", path: "/api/crops/:name", description: "Case-insensitive crop lookup" },
  { method: "GET", path: "/api/conversations/approval", description: "Latest user message per farmer awaiting review" },
  { method: "GET", path: "/api/conversations/:id", description: "One message with its farmer" },
];

export function createCoreRoutes(appState: AppState): Router {
  const router = Router();

  // ─── Health ─────────────────────────────────────────────────

  router.get("/api/health", createTimeoutMiddleware(5000), async (_req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;

    const status = appState.startupComplete ? "online" : "initializing";
    if (!appState.startupComplete) {
      res.setHeader("Retry-After", "2");
    }

    const connected = await store.healthCheck();
    const health: HealthResponse = {
      status,
      version: APP_VERSION,
      database: connected ? "connected" : "unreachable",
    };

    if (!connected) {
      return sendFail(res, ErrorCode.DATABASE_UNREACHABLE, "Database is unreachable", 503, { detail: health });
    }
    sendOk(res, health);
  });

  // ─── API Discovery ──────────────────────────────────────────

  router.get("/api", (_req, res) => {
    sendOk(res, {
      name: "farm-crm-dal",
      version: APP_VERSION,
      endpoints: API_ENDPOINTS,
    });
  });

  // ─── Diagnostic ─────────────────────────────────────────────

  router.get("/api/diagnostic", async (_req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    sendResult(res, await store.tableCounts(), "No tables found");
  });

  return router;
}
