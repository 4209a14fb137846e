/**
 * farm-routes.test.ts — Farm CRM API route tests
 *
 * Drives the Express app through supertest with the farm store running on
 * an in-process PostgreSQL (PGlite).
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import request from "supertest";
import { createApp, initFarmStore } from "../src/server/index.js";
import { createSessionFactory } from "../src/server/db.js";
import { createFarmStore, SQL } from "../src/server/stores/farm-store.js";
import { API_ENDPOINTS } from "../src/server/routes/core.js";
import { makeReadyState, makeState } from "./helpers/make-state.js";
import {
  cleanDatabase,
  createPgliteSource,
  createTestDatabase,
  insertCropTypes,
  insertFarmer,
  insertField,
  insertMessage,
  listMessages,
  type PGlite,
} from "./helpers/pg-test.js";
import { TrackedSource } from "./helpers/tracked-source.js";

let pg: PGlite;
let source: TrackedSource;
let app: ReturnType<typeof createApp>;

async function seed(db: PGlite): Promise<void> {
  await insertFarmer(db, {
    id: 1,
    farm_name: "Green Acres",
    manager_name: "Jane",
    manager_last_name: "Doe",
    city: "Springfield",
    phone: "555-0100",
    wa_phone_number: "555-0100",
  });
  await insertFarmer(db, { id: 2, farm_name: "Blue Hill", manager_name: "Omar", manager_last_name: "Haddad" });
  await insertField(db, { field_id: 10, farmer_id: 1, field_name: "North", field_size: "4.25" });
  await insertCropTypes(db, "Maize");
  await insertMessage(db, { farmer_id: 1, role: "user", message_text: "Rain tomorrow?", timestamp: "2025-02-01 10:00:00" });
  await insertMessage(db, { farmer_id: 1, role: "assistant", message_text: "Light showers.", timestamp: "2025-02-01 10:00:02" });
}

beforeAll(() => {
  pg = createTestDatabase();
});

afterAll(async () => {
  await pg.close();
});

beforeEach(async () => {
  await cleanDatabase(pg);
  await seed(pg);
  source = new TrackedSource(createPgliteSource(pg));
  app = createApp(makeReadyState({ farmStore: createFarmStore(createSessionFactory(source)) }));
});

// ─── Store availability ─────────────────────────────────────────

describe("without a farm store", () => {
  it.each([
    "/api/farmers",
    "/api/farmers/1",
    "/api/crops/maize",
    "/api/conversations/approval",
    "/api/health",
  ])("GET %s returns 503", async (path) => {
    const res = await request(createApp(makeState())).get(path);
    expect(res.status).toBe(503);
    expect(res.body.ok).toBe(false);
    expect(res.body.error.code).toBe("STORE_NOT_AVAILABLE");
  });
});

// ─── Core ───────────────────────────────────────────────────────

describe("GET /api/health", () => {
  it("reports a connected database", async () => {
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body.data.status).toBe("online");
    expect(res.body.data.database).toBe("connected");
    expect(typeof res.body.data.version).toBe("string");
  });

  it("asks clients to retry while initializing", async () => {
    const initializing = createApp(makeState({ farmStore: createFarmStore(createSessionFactory(source)) }));
    const res = await request(initializing).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.headers["retry-after"]).toBe("2");
    expect(res.body.data.status).toBe("initializing");
  });

  it("returns 503 when the database is unreachable", async () => {
    source.unreachable = true;
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(503);
    expect(res.body.error.code).toBe("DATABASE_UNREACHABLE");
    expect(res.body.error.detail.database).toBe("unreachable");
  });
});

describe("initFarmStore", () => {
  it("serves the store before the boot health check finishes", async () => {
    const state = makeState();
    const booting = createApp(state);
    const pending = initFarmStore(state, createSessionFactory(source));
    expect(state.farmStore).not.toBeNull();
    expect(state.startupComplete).toBe(false);

    await pending;
    expect(state.startupComplete).toBe(true);
    const res = await request(booting).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body.data.status).toBe("online");
  });

  it("completes startup even when the database is unreachable", async () => {
    source.unreachable = true;
    const state = makeState();
    await initFarmStore(state, createSessionFactory(source));
    expect(state.startupComplete).toBe(true);
    expect(state.farmStore).not.toBeNull();
  });
});

describe("GET /api", () => {
  it("lists every endpoint", async () => {
    const res = await request(app).get("/api");
    expect(res.status).toBe(200);
    expect(res.body.data.name).toBe("farm-crm-dal");
    expect(res.body.data.endpoints).toHaveLength(API_ENDPOINTS.length);
  });

  it("answers unknown API paths with a 404 envelope", async () => {
    const res = await request(app).get("/api/tractors");
    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });
});

describe("GET /api/diagnostic", () => {
  it("returns row counts", async () => {
    const res = await request(app).get("/api/diagnostic");
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      farmers: 2,
      fields: 1,
      field_crops: 0,
      incoming_messages: 2,
      crop_technology: 1,
    });
  });
});

// ─── Envelope ───────────────────────────────────────────────────

describe("response envelope", () => {
  it("carries a request id and meta", async () => {
    const res = await request(app).get("/api/farmers/1");
    expect(res.headers["x-request-id"]).toBe(res.body.meta.requestId);
    expect(typeof res.body.meta.timestamp).toBe("string");
    expect(typeof res.body.meta.durationMs).toBe("number");
  });

  it("answers 304 when the ETag matches", async () => {
    const first = await request(app).get("/api/farmers/1");
    const etag = first.headers["etag"];
    expect(typeof etag).toBe("string");
    const second = await request(app).get("/api/farmers/1").set("If-None-Match", String(etag));
    expect(second.status).toBe(304);
  });

  it("maps store failures to 500 without leaking the cause", async () => {
    source.failOn(SQL.getFarmer);
    const res = await request(app).get("/api/farmers/1");
    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      code: "STORE_ERROR",
      message: "Database query failed",
      hints: ["Check /api/health for database connectivity"],
    });
  });

  it("rejects malformed JSON bodies", async () => {
    const res = await request(app)
      .post("/api/farmers/1/conversations")
      .set("Content-Type", "application/json")
      .send("{not json");
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("INVALID_PARAM");
  });
});

// ─── Farmers ────────────────────────────────────────────────────

describe("GET /api/farmers", () => {
  it("lists farmers by farm name", async () => {
    const res = await request(app).get("/api/farmers");
    expect(res.status).toBe(200);
    expect(res.body.data.map((f: { farm_name: string }) => f.farm_name)).toEqual(["Blue Hill", "Green Acres"]);
  });

  it("honours ?limit", async () => {
    const res = await request(app).get("/api/farmers?limit=1");
    expect(res.status).toBe(200);
    expect(res.body.data).toHaveLength(1);
  });

  it.each(["0", "101", "abc", "-1"])("rejects limit=%s", async (limit) => {
    const res = await request(app).get(`/api/farmers?limit=${limit}`);
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("limit must be an integer between 1 and 100");
  });
});

describe("GET /api/farmers/:id", () => {
  it("returns the farmer", async () => {
    const res = await request(app).get("/api/farmers/1");
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      id: 1,
      farm_name: "Green Acres",
      manager_name: "Jane",
      manager_last_name: "Doe",
      city: "Springfield",
      wa_phone_number: "555-0100",
      total_hectares: 0,
      farmer_type: "Farm",
    });
  });

  it("returns 404 for an unknown farmer", async () => {
    const res = await request(app).get("/api/farmers/42");
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe("Farmer 42 not found");
  });

  it.each(["abc", "0", "1.5"])("rejects id %s", async (id) => {
    const res = await request(app).get(`/api/farmers/${id}`);
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("Invalid farmer ID");
  });
});

describe("GET /api/farmers/:id/fields", () => {
  it("returns fields with their planting", async () => {
    const res = await request(app).get("/api/farmers/1/fields");
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual([{
      field_id: 10,
      field_name: "North",
      field_size: 4.25,
      field_location: null,
      soil_type: null,
      current_crop: null,
      variety: null,
      planting_date: null,
      crop_status: null,
    }]);
  });
});

describe("GET /api/farmers/:id/conversations", () => {
  it("returns turns newest first", async () => {
    const res = await request(app).get("/api/farmers/1/conversations");
    expect(res.status).toBe(200);
    expect(res.body.data.map((t: { id: number }) => t.id)).toEqual([2, 1]);
    expect(res.body.data[0].ava_response).toBe("Light showers.");
  });

  it("honours ?limit", async () => {
    const res = await request(app).get("/api/farmers/1/conversations?limit=1");
    expect(res.body.data).toHaveLength(1);
  });
});

describe("POST /api/farmers/:id/conversations", () => {
  it("records the pair and returns the assistant id", async () => {
    const res = await request(app)
      .post("/api/farmers/1/conversations")
      .send({ question: "Spray today?", answer: "Wait for calmer wind.", phone: "555-0100" });
    expect(res.status).toBe(201);
    expect(res.body.data).toEqual({ id: 4 });
    expect((await listMessages(pg)).slice(-2).map((m) => [m.id, m.role, m.message_text, m.phone_number])).toEqual([
      [3, "user", "Spray today?", "555-0100"],
      [4, "assistant", "Wait for calmer wind.", "555-0100"],
    ]);
  });

  it("stores an empty phone as given", async () => {
    const res = await request(app)
      .post("/api/farmers/1/conversations")
      .send({ question: "q", answer: "a", phone: "" });
    expect(res.status).toBe(201);
    expect((await listMessages(pg)).slice(-2).map((m) => m.phone_number)).toEqual(["", ""]);
  });

  it.each([
    { name: "missing answer", body: { question: "q" } },
    { name: "blank question", body: { question: "   ", answer: "a" } },
    { name: "numeric answer", body: { question: "q", answer: 5 } },
    { name: "array body", body: ["q", "a"] },
  ])("rejects $name", async ({ body }) => {
    const res = await request(app).post("/api/farmers/1/conversations").send(body);
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("MISSING_PARAM");
  });

  it("rejects a non-string phone", async () => {
    const res = await request(app)
      .post("/api/farmers/1/conversations")
      .send({ question: "q", answer: "a", phone: 5550100 });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("INVALID_PARAM");
  });

  it("returns 500 and writes nothing for an unknown farmer", async () => {
    const res = await request(app).post("/api/farmers/99/conversations").send({ question: "q", answer: "a" });
    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe("STORE_ERROR");
    expect(await listMessages(pg)).toHaveLength(2);
  });
});

// ─── Crops ──────────────────────────────────────────────────────

describe("GET /api/crops/:name", () => {
  it("finds a crop case-insensitively", async () => {
    const res = await request(app).get("/api/crops/MAIZE");
    expect(res.status).toBe(200);
    expect(res.body.data.crop_name).toBe("Maize");
  });

  it("returns 404 for an unknown crop", async () => {
    const res = await request(app).get("/api/crops/quinoa");
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe('Crop "quinoa" not found');
  });

  it("rejects a blank name", async () => {
    const res = await request(app).get("/api/crops/%20%20");
    expect(res.status).toBe(400);
  });
});

// ─── Conversations ──────────────────────────────────────────────

describe("GET /api/conversations/approval", () => {
  it("returns the queue with an empty approved bucket", async () => {
    const res = await request(app).get("/api/conversations/approval");
    expect(res.status).toBe(200);
    expect(res.body.data.approved).toEqual([]);
    expect(res.body.data.unapproved).toEqual([{
      id: 1,
      farmer_id: 1,
      farmer_name: "Jane Doe",
      farmer_phone: "555-0100",
      farmer_location: "Springfield",
      farmer_type: "Farm",
      farmer_size: "0.0",
      last_message: "Rain tomorrow?",
      timestamp: "2025-02-01T10:00:00.000Z",
    }]);
  });
});

describe("GET /api/conversations/:id", () => {
  it("returns one message with its farmer", async () => {
    const res = await request(app).get("/api/conversations/1");
    expect(res.status).toBe(200);
    expect(res.body.data.user_input).toBe("Rain tomorrow?");
    expect(res.body.data.farmer_name).toBe("Jane Doe");
  });

  it("returns 404 for an unknown message", async () => {
    const res = await request(app).get("/api/conversations/77");
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe("Conversation 77 not found");
  });

  it("rejects a non-numeric id", async () => {
    const res = await request(app).get("/api/conversations/latest");
    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("Invalid conversation ID");
  });
});
