/**
 * config.test.ts — Tests for configuration resolution
 *
 * Tests the priority chain: env var → default. Each case passes its own env
 * object, so process.env is never touched.
 */

import { describe, it, expect } from "vitest";
import {
  bootstrapConfigSync,
  resolvePoolSettings,
  DEFAULT_DATABASE_URL,
  DEFAULT_POOL_SETTINGS,
} from "../src/server/config.js";

// ─── Bootstrap Config ───────────────────────────────────────────

describe("bootstrapConfigSync", () => {
  it("uses defaults for an empty environment", () => {
    const config = bootstrapConfigSync({});
    expect(config.port).toBe(3000);
    expect(config.nodeEnv).toBe("development");
    expect(config.isDev).toBe(true);
    expect(config.isTest).toBe(false);
    expect(config.databaseUrl).toBe(DEFAULT_DATABASE_URL);
    expect(config.pool).toEqual(DEFAULT_POOL_SETTINGS);
    expect(config.logLevel).toBe("debug");
    expect(config.logPretty).toBe(true);
  });

  it("reads DATABASE_URL", () => {
    const config = bootstrapConfigSync({ DATABASE_URL: "postgresql://crm@db:5432/farmer_crm" });
    expect(config.databaseUrl).toBe("postgresql://crm@db:5432/farmer_crm");
  });

  it("prefers FARMDAL_PORT over PORT", () => {
    expect(bootstrapConfigSync({ PORT: "8080" }).port).toBe(8080);
    expect(bootstrapConfigSync({ PORT: "8080", FARMDAL_PORT: "9090" }).port).toBe(9090);
  });

  it("falls back to the default port on garbage", () => {
    expect(bootstrapConfigSync({ FARMDAL_PORT: "http" }).port).toBe(3000);
  });

  it("detects test mode from VITEST", () => {
    const config = bootstrapConfigSync({ VITEST: "true" });
    expect(config.isTest).toBe(true);
    expect(config.isDev).toBe(false);
    expect(config.logLevel).toBe("silent");
    expect(config.logPretty).toBe(false);
  });

  it("uses info level and JSON logs in production", () => {
    const config = bootstrapConfigSync({ NODE_ENV: "production" });
    expect(config.isDev).toBe(false);
    expect(config.logLevel).toBe("info");
    expect(config.logPretty).toBe(false);
  });

  it("lets FARMDAL_LOG_PRETTY force pretty logs in production", () => {
    expect(bootstrapConfigSync({ NODE_ENV: "production", FARMDAL_LOG_PRETTY: "true" }).logPretty).toBe(true);
  });

  it("lets FARMDAL_LOG_PRETTY=false turn them off in development", () => {
    expect(bootstrapConfigSync({ FARMDAL_LOG_PRETTY: "false" }).logPretty).toBe(false);
  });
});

// ─── Pool Settings ──────────────────────────────────────────────

describe("resolvePoolSettings", () => {
  it("reads every pool variable", () => {
    expect(resolvePoolSettings({
      FARMDAL_POOL_SIZE: "8",
      FARMDAL_POOL_MAX_OVERFLOW: "0",
      FARMDAL_POOL_RECYCLE: "600",
      FARMDAL_POOL_PRE_PING: "off",
      FARMDAL_DB_CONNECT_TIMEOUT_MS: "1500",
      FARMDAL_DB_STATEMENT_TIMEOUT_MS: "2000",
    })).toEqual({
      poolSize: 8,
      maxOverflow: 0,
      recycleSeconds: 600,
      prePing: false,
      connectTimeoutMs: 1500,
      statementTimeoutMs: 2000,
    });
  });

  it("ignores negative and fractional numbers", () => {
    const settings = resolvePoolSettings({ FARMDAL_POOL_SIZE: "-1", FARMDAL_POOL_RECYCLE: "1.5" });
    expect(settings.poolSize).toBe(5);
    expect(settings.recycleSeconds).toBe(3600);
  });

  it.each(["false", "0", "no", "OFF"])("treats %s as false for pre-ping", (raw) => {
    expect(resolvePoolSettings({ FARMDAL_POOL_PRE_PING: raw }).prePing).toBe(false);
  });

  it("keeps pre-ping on for other values", () => {
    expect(resolvePoolSettings({ FARMDAL_POOL_PRE_PING: "yes" }).prePing).toBe(true);
    expect(resolvePoolSettings({ FARMDAL_POOL_PRE_PING: " " }).prePing).toBe(true);
  });
});
