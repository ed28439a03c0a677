/**
 * keyguard-libsql
 *
 * libSQL / SQLite store for keyguard. Works with local files (`file:`),
 * in-memory databases and remote Turso databases.
 */

import { createClient, type Client } from "@libsql/client";
import { guardStoreCall, KeyguardConfigError, type AsyncStore } from "keyguard";
import { createLibSqlLock } from "./libsql-lock";

export type { LibSqlLockOptions } from "./libsql-lock";

// =============================================================================
// LibSqlOptions
// =============================================================================

/**
 * Options for the libsql() shorthand function.
 */
export interface LibSqlOptions {
  /** Database URL, e.g. 'file:./cache.db' or 'libsql://my-db.turso.io'. */
  url: string;
  /** Auth token for remote databases. */
  authToken?: string;
  /** Table name for cached values. @default 'keyguard_cache' */
  table?: string;
  /** Table name for lock leases. @default 'keyguard_lock' */
  lockTable?: string;
  /** Bring your own client. It is not closed by `close()`. */
  client?: Client;
}

export interface LibSqlStore extends AsyncStore {
  /** Underlying libSQL client. */
  readonly client: Client;
}

const SAFE_TABLE_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function checkTableName(name: string): string {
  if (!SAFE_TABLE_NAME.test(name)) {
    throw new KeyguardConfigError(
      `invalid table name: ${name}. Must be alphanumeric with underscores.`
    );
  }
  return name;
}

// =============================================================================
// libsql() - One-liner Store Setup
// =============================================================================

/**
 * Create a keyguard store backed by libSQL.
 *
 * @example
 * ```typescript
 * import { createKeyguard } from 'keyguard';
 * import { libsql } from 'keyguard-libsql';
 *
 * const guard = createKeyguard({ store: libsql('file:./cache.db') });
 * ```
 *
 * @example
 * ```typescript
 * const store = libsql({
 *   url: process.env.TURSO_URL ?? 'file:./cache.db',
 *   authToken: process.env.TURSO_AUTH_TOKEN,
 * });
 * ```
 */
export function libsql(urlOrOptions: string | LibSqlOptions): LibSqlStore {
  const opts: LibSqlOptions = typeof urlOrOptions === "string" ? { url: urlOrOptions } : urlOrOptions;
  const tableName = checkTableName(opts.table ?? "keyguard_cache");
  const lockTableName = checkTableName(opts.lockTable ?? "keyguard_lock");

  const ownClient = !opts.client;
  const client = opts.client ?? createClient({ url: opts.url, authToken: opts.authToken });
  const lock = createLibSqlLock(client, { lockTableName });
  let ready: Promise<void> | null = null;

  const createTables = async (): Promise<void> => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${tableName} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at INTEGER
      )
    `);
    await lock.ensureLockTable();
  };

  const ensureTables = (): Promise<void> => {
    ready ??= createTables().catch((error: unknown) => {
      ready = null;
      throw error;
    });
    return ready;
  };

  return {
    mode: "async",
    client,

    async get(key) {
      return guardStoreCall("get", key, async () => {
        await ensureTables();
        const result = await client.execute({
          sql: `SELECT value FROM ${tableName} WHERE key = ? AND (expires_at IS NULL OR expires_at > ?)`,
          args: [key, Date.now()],
        });
        const value = result.rows[0]?.value;
        return typeof value === "string" ? value : null;
      });
    },

    async set(key, value, ttlMs) {
      await guardStoreCall("set", key, async () => {
        await ensureTables();
        await client.execute({
          sql: `INSERT INTO ${tableName} (key, value, expires_at) VALUES (?, ?, ?)
                ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`,
          args: [key, value, ttlMs === undefined ? null : Date.now() + ttlMs],
        });
      });
    },

    async delete(key) {
      await guardStoreCall("delete", key, async () => {
        await ensureTables();
        await client.execute({ sql: `DELETE FROM ${tableName} WHERE key = ?`, args: [key] });
      });
    },

    async tryAcquire(key, options) {
      return guardStoreCall("tryAcquire", key, async () => {
        await ensureTables();
        return lock.tryAcquire(key, options);
      });
    },

    async release(key, ownerToken) {
      await guardStoreCall("release", key, async () => {
        await ensureTables();
        await lock.release(key, ownerToken);
      });
    },

    async isLocked(key) {
      return guardStoreCall("isLocked", key, async () => {
        await ensureTables();
        return lock.isLocked(key);
      });
    },

    async close() {
      // Only close client if we created it
      if (ownClient) {
        client.close();
      }
    },
  };
}
