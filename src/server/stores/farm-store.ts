/**
 * farm-store.ts — Farmer CRM data access.
 *
 * Reads farmers, fields, crop plantings and conversation messages from the
 * existing farmer_crm database and returns normalized records. The schema is
 * owned elsewhere; this store never creates or alters tables.
 *
 * Every operation:
 *   - runs on one session from the injected SessionFactory (released on every path)
 *   - catches driver/statement errors, logs them, and returns { status: "failed" }
 *   - never throws
 */

import type { SessionClient, SessionFactory } from "../db.js";
import { log } from "../logger.js";
import {
  FARM_TABLES,
  UNMODELED,
  type ApprovalEntry,
  type ApprovalQueue,
  type ConversationDetail,
  type ConversationTurn,
  type CropInfo,
  type Farmer,
  type FarmerSummary,
  type FarmTable,
  type FieldView,
  type MessageRole,
  type NewConversation,
  type TableCounts,
} from "../types/farm-types.js";
import { empty, failed, ok, type StoreResult } from "../types/store-result.js";

// ─── SQL ────────────────────────────────────────────────────────

export const SQL = {
  getFarmer: `SELECT id, farm_name, manager_name, manager_last_name,
      city, wa_phone_number
    FROM farmers
    WHERE id = $1`,
  listFarmers: `SELECT id, farm_name, manager_name, manager_last_name,
      email, phone, city, wa_phone_number
    FROM farmers
    ORDER BY farm_name
    LIMIT $1`,
  listFields: `SELECT f.field_id, f.field_name, f.field_size, f.field_location,
      f.soil_type,
      fc.crop_name, fc.variety, fc.planting_date, fc.status
    FROM fields f
    LEFT JOIN field_crops fc ON f.field_id = fc.field_id
      AND fc.status = 'active'
    WHERE f.farmer_id = $1
    ORDER BY f.field_name`,
  recentMessages: `SELECT id, message_text, timestamp, role
    FROM incoming_messages
    WHERE farmer_id = $1
    ORDER BY timestamp DESC
    LIMIT $2`,
  insertMessage: `INSERT INTO incoming_messages (farmer_id, phone_number, message_text, role, timestamp)
    VALUES ($1, $2, $3, $4, CURRENT_TIMESTAMP)
    RETURNING id`,
  findCropType: `SELECT DISTINCT crop_type
    FROM crop_technology
    WHERE LOWER(crop_type) = LOWER($1)
    LIMIT 1`,
  approvalQueue: `WITH latest_messages AS (
      SELECT DISTINCT ON (m.farmer_id)
        m.id, m.farmer_id, m.message_text, m.timestamp,
        f.manager_name, f.manager_last_name, f.phone,
        f.city, f.farm_name
      FROM incoming_messages m
      JOIN farmers f ON m.farmer_id = f.id
      WHERE m.role = 'user'
      ORDER BY m.farmer_id, m.timestamp DESC
    )
    SELECT * FROM latest_messages
    ORDER BY timestamp DESC
    LIMIT $1`,
  conversationDetails: `SELECT m.id, m.farmer_id, m.message_text, m.timestamp, m.role,
      f.manager_name, f.manager_last_name, f.phone,
      f.city, f.farm_name
    FROM incoming_messages m
    JOIN farmers f ON m.farmer_id = f.id
    WHERE m.id = $1`,
  countFarmers: `SELECT COUNT(*) AS count FROM farmers`,
  /** Only ever called with a name from FARM_TABLES. */
  countTable: (table: FarmTable) => `SELECT COUNT(*) AS count FROM ${table}`,
};

export const APPROVAL_QUEUE_LIMIT = 100;
export const MESSAGE_PREVIEW_LENGTH = 100;
export const UNKNOWN_PHONE = "unknown";

// ─── Row Types ──────────────────────────────────────────────────

type FarmerRow = {
  id: number;
  farm_name: string | null;
  manager_name: string | null;
  manager_last_name: string | null;
  city: string | null;
  wa_phone_number: string | null;
};

type FarmerListRow = FarmerRow & {
  email: string | null;
  phone: string | null;
};

type FieldRow = {
  field_id: number;
  field_name: string | null;
  /** NUMERIC arrives as a string */
  field_size: string | number | null;
  field_location: string | null;
  soil_type: string | null;
  crop_name: string | null;
  variety: string | null;
  planting_date: Date | string | null;
  status: string | null;
};

type MessageRow = {
  id: number;
  message_text: string | null;
  timestamp: Date | string | null;
  role: string | null;
};

type MessageWithFarmerRow = {
  id: number;
  farmer_id: number;
  message_text: string | null;
  timestamp: Date | string | null;
  manager_name: string | null;
  manager_last_name: string | null;
  phone: string | null;
  city: string | null;
  farm_name: string | null;
};

type DetailRow = MessageWithFarmerRow & { role: string | null };

type CountRow = { count: string | number };

// ─── Normalization ──────────────────────────────────────────────

/** "First Last", or "Unknown" unless both parts are present. */
export function displayName(first: string | null, last: string | null): string {
  return first && last ? `${first} ${last}`.trim() : "Unknown";
}

/**
 * First 100 characters plus "..." when longer; "" for null.
 * Counts code points, so astral characters are never split.
 */
export function previewMessage(text: string | null): string {
  if (!text) return "";
  const chars = Array.from(text);
  return chars.length > MESSAGE_PREVIEW_LENGTH
    ? `${chars.slice(0, MESSAGE_PREVIEW_LENGTH).join("")}...`
    : text;
}

export function toIsoTimestamp(value: Date | string | null): string | null {
  if (value === null) return null;
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * YYYY-MM-DD for a DATE column. pg builds DATE values at local midnight,
 * so the local calendar fields are the stored ones.
 */
export function toCalendarDate(value: Date | string | null): string | null {
  if (value === null) return null;
  if (typeof value === "string") return value.slice(0, 10);
  const yyyy = String(value.getFullYear()).padStart(4, "0");
  const mm = String(value.getMonth() + 1).padStart(2, "0");
  const dd = String(value.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

/** Numeric/bigint columns come back as strings. */
export function toNumber(value: string | number | null, fallback = 0): number {
  if (value === null || value === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

/** Place message text in the slot its role selects. */
export function splitByRole(text: string | null, role: string | null): Pick<ConversationTurn, "user_input" | "ava_response"> {
  const body = text ?? "";
  return {
    user_input: role === "user" ? body : "",
    ava_response: role === "assistant" ? body : "",
  };
}

function rowToFarmer(row: FarmerRow): Farmer {
  return {
    id: row.id,
    farm_name: row.farm_name,
    manager_name: row.manager_name,
    manager_last_name: row.manager_last_name,
    city: row.city,
    wa_phone_number: row.wa_phone_number,
    total_hectares: UNMODELED.totalHectares,
    farmer_type: UNMODELED.farmerType,
  };
}

function rowToSummary(row: FarmerListRow): FarmerSummary {
  return {
    id: row.id,
    name: displayName(row.manager_name, row.manager_last_name),
    farm_name: row.farm_name || "Unknown Farm",
    phone: row.phone || row.wa_phone_number || "",
    location: row.city || "",
    farm_type: UNMODELED.farmerType,
    total_size_ha: UNMODELED.totalHectares,
  };
}

function rowToField(row: FieldRow): FieldView {
  return {
    field_id: row.field_id,
    field_name: row.field_name,
    field_size: toNumber(row.field_size),
    field_location: row.field_location,
    soil_type: row.soil_type,
    current_crop: row.crop_name,
    variety: row.variety,
    planting_date: toCalendarDate(row.planting_date),
    crop_status: row.status,
  };
}

function rowToTurn(row: MessageRow): ConversationTurn {
  return {
    id: row.id,
    ...splitByRole(row.message_text, row.role),
    timestamp: toIsoTimestamp(row.timestamp),
    message_type: UNMODELED.messageType,
    confidence_score: UNMODELED.confidenceScore,
    approved_status: UNMODELED.approvedStatus,
  };
}

function rowToApprovalEntry(row: MessageWithFarmerRow): ApprovalEntry {
  return {
    id: row.id,
    farmer_id: row.farmer_id,
    farmer_name: displayName(row.manager_name, row.manager_last_name),
    farmer_phone: row.phone || "",
    farmer_location: row.city || "",
    farmer_type: UNMODELED.farmerType,
    farmer_size: UNMODELED.farmerSizeLabel,
    last_message: previewMessage(row.message_text),
    timestamp: toIsoTimestamp(row.timestamp),
  };
}

function rowToDetail(row: DetailRow): ConversationDetail {
  return {
    id: row.id,
    farmer_id: row.farmer_id,
    farmer_name: displayName(row.manager_name, row.manager_last_name),
    farm_name: row.farm_name,
    farmer_phone: row.phone || "",
    farmer_location: row.city || "",
    ...splitByRole(row.message_text, row.role),
    timestamp: toIsoTimestamp(row.timestamp),
    approved_status: UNMODELED.approvedStatus,
  };
}

function cropInfo(cropType: string): CropInfo {
  return {
    id: UNMODELED.cropId,
    crop_name: cropType,
    localized_name: cropType,
    category: UNMODELED.cropCategory,
    planting_season: UNMODELED.plantingSeason,
    harvest_season: UNMODELED.harvestSeason,
    description: `Information about ${cropType}`,
  };
}

export const DEFAULT_FARMER_LIMIT = 100;
export const DEFAULT_CONVERSATION_LIMIT = 10;

/** Non-negative integer limit; NaN and ±Infinity fall back to `fallback`. */
export function clampLimit(limit: number, fallback: number): number {
  return Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : fallback;
}

// ─── Store Interface ────────────────────────────────────────────

export interface FarmStore {
  getFarmer(farmerId: number): Promise<StoreResult<Farmer>>;
  listFarmers(limit?: number): Promise<StoreResult<FarmerSummary[]>>;
  listFields(farmerId: number): Promise<StoreResult<FieldView[]>>;
  listRecentConversations(farmerId: number, limit?: number): Promise<StoreResult<ConversationTurn[]>>;
  /** Inserts the user/assistant pair atomically; the value is the assistant row id. */
  saveConversation(farmerId: number, conversation: NewConversation): Promise<StoreResult<number>>;
  getCropInfo(cropName: string): Promise<StoreResult<CropInfo>>;
  listApprovalQueue(): Promise<StoreResult<ApprovalQueue>>;
  getConversationDetails(messageId: number): Promise<StoreResult<ConversationDetail>>;
  /** True iff a count over farmers succeeds. Never throws. */
  healthCheck(): Promise<boolean>;
  tableCounts(): Promise<StoreResult<TableCounts>>;
}

// ─── Factory ────────────────────────────────────────────────────

export function createFarmStore(sessions: SessionFactory): FarmStore {
  /** Operation boundary: failures are logged and returned, not thrown. */
  async function guard<T>(
    op: string,
    context: Record<string, unknown>,
    fn: () => Promise<StoreResult<T>>,
  ): Promise<StoreResult<T>> {
    try {
      return await fn();
    } catch (err) {
      log.store.error({ err: err instanceof Error ? err.message : String(err), op, ...context }, "store operation failed");
      return failed(err);
    }
  }

  async function insertMessage(
    client: SessionClient,
    farmerId: number,
    phone: string,
    text: string,
    role: MessageRole,
  ): Promise<number> {
    const res = await client.query<{ id: number }>(SQL.insertMessage, [farmerId, phone, text, role]);
    const row = res.rows[0];
    if (!row) throw new Error(`insert of ${role} message returned no id`);
    return row.id;
  }

  const store: FarmStore = {
    getFarmer(farmerId) {
      return guard("getFarmer", { farmerId }, () =>
        sessions.withSession(async (client) => {
          const res = await client.query<FarmerRow>(SQL.getFarmer, [farmerId]);
          const row = res.rows[0];
          return row ? ok(rowToFarmer(row)) : empty<Farmer>();
        }),
      );
    },

    listFarmers(limit = DEFAULT_FARMER_LIMIT) {
      return guard("listFarmers", { limit }, () =>
        sessions.withSession(async (client) => {
          const res = await client.query<FarmerListRow>(SQL.listFarmers, [clampLimit(limit, DEFAULT_FARMER_LIMIT)]);
          return ok(res.rows.map(rowToSummary));
        }),
      );
    },

    listFields(farmerId) {
      return guard("listFields", { farmerId }, () =>
        sessions.withSession(async (client) => {
          const res = await client.query<FieldRow>(SQL.listFields, [farmerId]);
          return ok(res.rows.map(rowToField));
        }),
      );
    },

    listRecentConversations(farmerId, limit = DEFAULT_CONVERSATION_LIMIT) {
      return guard("listRecentConversations", { farmerId, limit }, () =>
        sessions.withSession(async (client) => {
          const res = await client.query<MessageRow>(SQL.recentMessages, [farmerId, clampLimit(limit, DEFAULT_CONVERSATION_LIMIT)]);
          return ok(res.rows.map(rowToTurn));
        }),
      );
    },

    saveConversation(farmerId, conversation) {
      return guard("saveConversation", { farmerId }, async () => {
        const phone = conversation.phone ?? UNKNOWN_PHONE;
        const assistantId = await sessions.withTransaction(async (client) => {
          await insertMessage(client, farmerId, phone, conversation.question, "user");
          return insertMessage(client, farmerId, phone, conversation.answer, "assistant");
        });
        log.store.info({ farmerId, messageId: assistantId }, "saved conversation pair");
        return ok(assistantId);
      });
    },

    getCropInfo(cropName) {
      return guard("getCropInfo", { cropName }, () =>
        sessions.withSession(async (client) => {
          const res = await client.query<{ crop_type: string }>(SQL.findCropType, [cropName]);
          const row = res.rows[0];
          return row ? ok(cropInfo(row.crop_type)) : empty<CropInfo>();
        }),
      );
    },

    listApprovalQueue() {
      return guard("listApprovalQueue", {}, () =>
        sessions.withSession(async (client) => {
          const res = await client.query<MessageWithFarmerRow>(SQL.approvalQueue, [APPROVAL_QUEUE_LIMIT]);
          return ok({ unapproved: res.rows.map(rowToApprovalEntry), approved: [] });
        }),
      );
    },

    getConversationDetails(messageId) {
      return guard("getConversationDetails", { messageId }, () =>
        sessions.withSession(async (client) => {
          const res = await client.query<DetailRow>(SQL.conversationDetails, [messageId]);
          const row = res.rows[0];
          return row ? ok(rowToDetail(row)) : empty<ConversationDetail>();
        }),
      );
    },

    async healthCheck() {
      try {
        const count = await sessions.withSession(async (client) => {
          const res = await client.query<CountRow>(SQL.countFarmers);
          return Number(res.rows[0]?.count ?? 0);
        });
        log.store.info({ farmers: count }, "database health check passed");
        return true;
      } catch (err) {
        log.store.error({ err: err instanceof Error ? err.message : String(err) }, "database health check failed");
        return false;
      }
    },

    tableCounts() {
      return guard("tableCounts", {}, () =>
        sessions.withSession(async (client) => {
          const counts: TableCounts = {
            farmers: 0,
            fields: 0,
            field_crops: 0,
            incoming_messages: 0,
            crop_technology: 0,
          };
          for (const table of FARM_TABLES) {
            const res = await client.query<CountRow>(SQL.countTable(table));
            counts[table] = Number(res.rows[0]?.count ?? 0);
          }
          return ok(counts);
        }),
      );
    },
  };

  return store;
}
