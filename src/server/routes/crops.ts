/**
 * routes/crops.ts — Crop lookup.
 */

import { Router } from "express";
import type { AppState } from "../app-context.js";
import { sendFail, sendResult, ErrorCode } from "../envelope.js";
import { getFarmStore } from "../services/route-helpers/farm-route-helpers.js";

const MAX_CROP_NAME = 100;

export function createCropRoutes(appState: AppState): Router {
  const router = Router();

  router.get("/api/crops/:name", async (req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    const name = req.params.name.trim();
    if (!name || name.length > MAX_CROP_NAME) {
      return sendFail(res, ErrorCode.INVALID_PARAM, `Crop name must be 1-${MAX_CROP_NAME} characters`, 400);
    }
    sendResult(res, await store.getCropInfo(name), `Crop "${name}" not found`);
  });

  return router;
}
