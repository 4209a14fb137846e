import type { Response } from "express";
import type { AppState } from "../../app-context.js";
import { sendFail, ErrorCode } from "../../envelope.js";
import type { FarmStore } from "../../stores/farm-store.js";

export const MAX_LIST_LIMIT = 100;
export const MAX_TEXT = 10_000;
export const MAX_PHONE = 32;

/** Store or 503. */
export function getFarmStore(appState: AppState, res: Response): FarmStore | null {
  if (!appState.farmStore) {
    sendFail(res, ErrorCode.STORE_NOT_AVAILABLE, "Farm store not available", 503);
    return null;
  }
  return appState.farmStore;
}

/** Positive integer path id, or null. */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/**
 * Optional ?limit= between 1 and MAX_LIST_LIMIT.
 * Absent → fallback; present but invalid → null.
 */
export function parseLimit(raw: unknown, fallback: number): number | null {
  if (raw === undefined) return fallback;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) return null;
  const limit = Number(raw);
  return limit >= 1 && limit <= MAX_LIST_LIMIT ? limit : null;
}
