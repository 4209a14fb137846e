/**
 * routes/conversations.ts — Approval queue and conversation detail routes.
 */

import { Router } from "express";
import type { AppState } from "../app-context.js";
import { sendFail, sendResult, ErrorCode } from "../envelope.js";
import { getFarmStore, parseId } from "../services/route-helpers/farm-route-helpers.js";

export function createConversationRoutes(appState: AppState): Router {
  const router = Router();

  // Latest user message per farmer. "approved" is always empty.
  router.get("/api/conversations/approval", async (_req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    sendResult(res, await store.listApprovalQueue(), "Approval queue unavailable");
  });

  router.get("/api/conversations/:id", async (req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    const id = parseId(req.params.id);
    if (id === null) return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid conversation ID", 400);
    sendResult(res, await store.getConversationDetails(id), `Conversation ${id} not found`);
  });

  return router;
}
