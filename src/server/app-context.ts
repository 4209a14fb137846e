/**
 * app-context.ts — Shared state for the server.
 *
 * Kept apart from index.ts so route modules can import the type without a
 * circular dependency on the app factory.
 */

import type { AppConfig } from "./config.js";
import type { Pool } from "./db.js";
import type { FarmStore } from "./stores/farm-store.js";

// ─── App State ──────────────────────────────────────────────────

export interface AppState {
  /** The process-wide pool. Null until boot creates it (and in route tests). */
  pool: Pool | null;
  farmStore: FarmStore | null;
  startupComplete: boolean;
  config: AppConfig;
}
