/**
 * routes/farmers.ts — Farmer, field and conversation-history routes.
 *
 * Pattern: factory function createFarmerRoutes(appState) → Router
 */

import { Router } from "express";
import type { AppState } from "../app-context.js";
import { sendFail, sendResult, ErrorCode } from "../envelope.js";
import { mapResult } from "../types/store-result.js";
import {
  getFarmStore,
  parseId,
  parseLimit,
  MAX_LIST_LIMIT,
  MAX_PHONE,
  MAX_TEXT,
} from "../services/route-helpers/farm-route-helpers.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requiredText(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 && value.length <= MAX_TEXT ? value : null;
}

export function createFarmerRoutes(appState: AppState): Router {
  const router = Router();

  // ── List farmers ──────────────────────────────────────

  router.get("/api/farmers", async (req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    const limit = parseLimit(req.query.limit, MAX_LIST_LIMIT);
    if (limit === null) {
      return sendFail(res, ErrorCode.INVALID_PARAM, `limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, 400);
    }
    sendResult(res, await store.listFarmers(limit), "No farmers found");
  });

  // ── Get farmer ────────────────────────────────────────

  router.get("/api/farmers/:id", async (req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    const id = parseId(req.params.id);
    if (id === null) return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid farmer ID", 400);
    sendResult(res, await store.getFarmer(id), `Farmer ${id} not found`);
  });

  // ── Fields with active planting ───────────────────────

  router.get("/api/farmers/:id/fields", async (req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    const id = parseId(req.params.id);
    if (id === null) return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid farmer ID", 400);
    sendResult(res, await store.listFields(id), `Farmer ${id} not found`);
  });

  // ── Recent conversation turns ─────────────────────────

  router.get("/api/farmers/:id/conversations", async (req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    const id = parseId(req.params.id);
    if (id === null) return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid farmer ID", 400);
    const limit = parseLimit(req.query.limit, 10);
    if (limit === null) {
      return sendFail(res, ErrorCode.INVALID_PARAM, `limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, 400);
    }
    sendResult(res, await store.listRecentConversations(id, limit), `Farmer ${id} not found`);
  });

  // ── Record a question/answer pair ─────────────────────

  router.post("/api/farmers/:id/conversations", async (req, res) => {
    const store = getFarmStore(appState, res);
    if (!store) return;
    const id = parseId(req.params.id);
    if (id === null) return sendFail(res, ErrorCode.INVALID_PARAM, "Invalid farmer ID", 400);

    const body: unknown = req.body;
    const fields: Record<string, unknown> = isRecord(body) ? body : {};
    const question = requiredText(fields.question);
    const answer = requiredText(fields.answer);
    if (question === null || answer === null) {
      return sendFail(res, ErrorCode.MISSING_PARAM, "question and answer are required non-empty strings", 400);
    }
    const rawPhone = fields.phone;
    let phone: string | undefined;
    if (rawPhone !== undefined) {
      if (typeof rawPhone !== "string" || rawPhone.length > MAX_PHONE) {
        return sendFail(res, ErrorCode.INVALID_PARAM, `phone must be a string of at most ${MAX_PHONE} characters`, 400);
      }
      phone = rawPhone;
    }

    const result = await store.saveConversation(id, { question, answer, phone });
    sendResult(res, mapResult(result, (messageId) => ({ id: messageId })), `Farmer ${id} not found`, 201);
  });

  return router;
}
