/**
 * keyguard-postgres
 *
 * PostgreSQL store for keyguard.
 * Cached values live in one table with an `expires_at` column; lock leases
 * live in a second table.
 */

import { Pool as PgPool } from "pg";
import { guardStoreCall, KeyguardConfigError, type AsyncStore } from "keyguard";
import { createPostgresLock } from "./postgres-lock";

export type { PostgresLockOptions } from "./postgres-lock";

// =============================================================================
// PostgresOptions
// =============================================================================

/**
 * Options for the postgres() shorthand function.
 */
export interface PostgresOptions {
  /** PostgreSQL connection URL. */
  url?: string;
  /** Table name for cached values. @default 'keyguard_cache' */
  table?: string;
  /** Table name for lock leases. @default 'keyguard_lock' */
  lockTable?: string;
  /** Bring your own pool. It is not ended by `close()`. */
  pool?: PgPool;
  /** Auto-create tables on first use. @default true */
  autoCreateTable?: boolean;
}

export interface PostgresStore extends AsyncStore {
  /** Create both tables if missing. Runs automatically unless autoCreateTable is false. */
  ensureTables(): Promise<void>;
}

// =============================================================================
// postgres() - One-liner Store Setup
// =============================================================================

const SAFE_TABLE_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function checkTableName(name: string): string {
  if (!SAFE_TABLE_NAME.test(name)) {
    throw new KeyguardConfigError(
      `invalid table name: ${name}. Must be alphanumeric with underscores.`
    );
  }
  return name;
}

/**
 * Create a keyguard store backed by PostgreSQL.
 *
 * @example
 * ```typescript
 * import { createKeyguard } from 'keyguard';
 * import { postgres } from 'keyguard-postgres';
 *
 * const guard = createKeyguard({ store: postgres('postgresql://localhost/mydb') });
 * ```
 *
 * @example
 * ```typescript
 * const store = postgres({
 *   pool: existingPool,
 *   table: 'app_cache',
 *   lockTable: 'app_locks',
 * });
 * ```
 */
export function postgres(urlOrOptions: string | PostgresOptions): PostgresStore {
  const opts: PostgresOptions =
    typeof urlOrOptions === "string" ? { url: urlOrOptions } : urlOrOptions;
  const tableName = checkTableName(opts.table ?? "keyguard_cache");
  const lockTableName = checkTableName(opts.lockTable ?? "keyguard_lock");
  const autoCreateTable = opts.autoCreateTable ?? true;

  if (!opts.pool && !opts.url) {
    throw new KeyguardConfigError("postgres() needs a url or a pool");
  }

  const ownPool = !opts.pool;
  const pool = opts.pool ?? new PgPool({ connectionString: opts.url });
  const lock = createPostgresLock(pool, { lockTableName, autoCreateTable });
  let tableReady: Promise<void> | null = null;

  const createTables = async (): Promise<void> => {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS ${tableName} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at TIMESTAMPTZ
      )
    `);
    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_${tableName}_expires_at
      ON ${tableName}(expires_at)
      WHERE expires_at IS NOT NULL
    `);
    await lock.ensureLockTable();
  };

  // One CREATE per store: concurrent CREATE TABLE IF NOT EXISTS can collide in pg_type.
  const ensureTables = (): Promise<void> => {
    tableReady ??= createTables().catch((error: unknown) => {
      tableReady = null;
      throw error;
    });
    return tableReady;
  };

  const ensureTable = (): Promise<void> => (autoCreateTable ? ensureTables() : Promise.resolve());

  return {
    mode: "async",

    ensureTables,

    async get(key) {
      return guardStoreCall("get", key, async () => {
        await ensureTable();
        const result = await pool.query<{ value: string }>(
          `SELECT value FROM ${tableName}
           WHERE key = $1 AND (expires_at IS NULL OR expires_at > NOW())`,
          [key]
        );
        return result.rows[0]?.value ?? null;
      });
    },

    async set(key, value, ttlMs) {
      await guardStoreCall("set", key, async () => {
        await ensureTable();
        await pool.query(
          `INSERT INTO ${tableName} (key, value, expires_at)
           VALUES ($1, $2, CASE WHEN $3::bigint IS NULL THEN NULL
                                ELSE NOW() + ($3::bigint * INTERVAL '1 millisecond') END)
           ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, expires_at = EXCLUDED.expires_at`,
          [key, value, ttlMs ?? null]
        );
      });
    },

    async delete(key) {
      await guardStoreCall("delete", key, async () => {
        await ensureTable();
        await pool.query(`DELETE FROM ${tableName} WHERE key = $1`, [key]);
      });
    },

    async tryAcquire(key, options) {
      return guardStoreCall("tryAcquire", key, () => lock.tryAcquire(key, options));
    },

    async release(key, ownerToken) {
      await guardStoreCall("release", key, () => lock.release(key, ownerToken));
    },

    async isLocked(key) {
      return guardStoreCall("isLocked", key, () => lock.isLocked(key));
    },

    async close() {
      // Only end pool if we created it
      if (ownPool) {
        await guardStoreCall("close", undefined, () => pool.end());
      }
    },
  };
}
