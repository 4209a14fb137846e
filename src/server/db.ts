/**
 * db.ts — PostgreSQL connection layer.
 *
 * One pool per process, created at boot and handed to the session factory:
 *
 *   const pool     = createPool(config.databaseUrl, config.pool);
 *   const sessions = createSessionFactory(pool, { prePing: config.pool.prePing });
 *   const store    = createFarmStore(sessions);
 *   ...
 *   await pool.end();
 *
 * Every store operation runs inside withSession/withTransaction, which
 * release the client on every path.
 */

import pg from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import { DEFAULT_POOL_SETTINGS, type PoolSettings } from "./config.js";
import { log } from "./logger.js";

const { Pool } = pg;
type Pool = pg.Pool;

export type { Pool, QueryResult, QueryResultRow };

// ─── Session contract ───────────────────────────────────────────

/**
 * The slice of a pg client the store uses. pg.PoolClient satisfies it;
 * tests supply an in-process stand-in.
 */
export interface SessionClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  /** Passing an error (or true) discards the client instead of returning it to the pool. */
  release(err?: Error | boolean): void;
}

/** Anything that hands out clients. pg.Pool satisfies it. */
export interface SessionSource {
  connect(): Promise<SessionClient>;
}

export interface SessionFactoryOptions {
  /** Validate each client with `SELECT 1` before handing it out. */
  prePing?: boolean;
}

export interface SessionFactory {
  /** Run `fn` with one client; the client is released however `fn` ends. */
  withSession<T>(fn: (client: SessionClient) => Promise<T>): Promise<T>;
  /** Like withSession, inside BEGIN/COMMIT. Rolls back and rethrows on error. */
  withTransaction<T>(fn: (client: SessionClient) => Promise<T>): Promise<T>;
}

// ─── Pool ───────────────────────────────────────────────────────

const POSTGRES_URL = /^postgres(ql)?:\/\//i;

/** Hide credentials in a connection URL before logging it. */
export function redactUrl(url: string): string {
  return url.replace(/\/\/.*@/, "//<redacted>@");
}

/** Throws unless the URL names a PostgreSQL server. */
export function assertPostgresUrl(connectionString: string): void {
  if (!POSTGRES_URL.test(connectionString)) {
    throw new Error(
      `Only PostgreSQL connections are supported (got "${redactUrl(connectionString)}")`,
    );
  }
}

/**
 * Create the connection pool.
 *
 * `max` is poolSize + maxOverflow: pg has no separate overflow tier, so the
 * ceiling is the sum and idle clients beyond it are reaped by idleTimeoutMillis.
 */
export function createPool(
  connectionString: string,
  settings: PoolSettings = DEFAULT_POOL_SETTINGS,
): Pool {
  assertPostgresUrl(connectionString);

  const pool = new Pool({
    connectionString,
    max: Math.max(1, settings.poolSize + settings.maxOverflow),
    maxLifetimeSeconds: settings.recycleSeconds,
    connectionTimeoutMillis: settings.connectTimeoutMs,
    idleTimeoutMillis: 30000,
    statement_timeout: settings.statementTimeoutMs,
  });

  // Must handle pool error events — unhandled idle-client errors crash the process
  pool.on("error", (err) => {
    log.db.error({ err: err.message }, "idle client error");
  });

  return pool;
}

// ─── Sessions ───────────────────────────────────────────────────

async function acquire(source: SessionSource, prePing: boolean): Promise<SessionClient> {
  const client = await source.connect();
  if (!prePing) return client;

  try {
    await client.query("SELECT 1");
    return client;
  } catch (err) {
    // Stale connection: drop it and take a fresh one.
    client.release(err instanceof Error ? err : true);
    log.db.warn({ err: err instanceof Error ? err.message : String(err) }, "pre-ping failed, reconnecting");
    return source.connect();
  }
}

export function createSessionFactory(
  source: SessionSource,
  options: SessionFactoryOptions = {},
): SessionFactory {
  const prePing = options.prePing ?? false;

  const factory: SessionFactory = {
    async withSession(fn) {
      const client = await acquire(source, prePing);
      try {
        return await fn(client);
      } finally {
        client.release();
      }
    },

    async withTransaction(fn) {
      return factory.withSession(async (client) => {
        await client.query("BEGIN");
        try {
          const result = await fn(client);
          await client.query("COMMIT");
          return result;
        } catch (e) {
          await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
            log.db.error(
              { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
              "rollback failed",
            );
          });
          throw e;
        }
      });
    },
  };

  return factory;
}
