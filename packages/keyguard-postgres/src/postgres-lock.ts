/**
 * PostgreSQL lease lock for cross-process mutual exclusion.
 * Uses a lease (TTL) + owner token; release verifies the token.
 */

import type { Pool } from "pg";
import { randomUUID } from "node:crypto";
import type { AcquireOptions, LockLease } from "keyguard";

export interface PostgresLockOptions {
  /**
   * Table name for lock leases.
   * @default 'keyguard_lock'
   */
  lockTableName?: string;
  /**
   * Create the lock table on first use.
   * @default true
   */
  autoCreateTable?: boolean;
}

/**
 * Create lease operations over a PostgreSQL lock table.
 * Pass the pool used for the cache table so both share connections.
 */
export function createPostgresLock(
  pool: Pool,
  options: PostgresLockOptions = {}
): {
  tryAcquire(key: string, options: AcquireOptions): Promise<LockLease | null>;
  release(key: string, ownerToken: string): Promise<void>;
  isLocked(key: string): Promise<boolean>;
  ensureLockTable(): Promise<void>;
} {
  const lockTableName = options.lockTableName ?? "keyguard_lock";
  const autoCreateTable = options.autoCreateTable ?? true;
  let tableReady: Promise<void> | null = null;

  async function ensureLockTable(): Promise<void> {
    tableReady ??= pool
      .query(
        `
        CREATE TABLE IF NOT EXISTS ${lockTableName} (
          key TEXT PRIMARY KEY,
          owner_token TEXT NOT NULL,
          expires_at TIMESTAMPTZ NOT NULL
        )
      `
      )
      .then(
        () => undefined,
        (error: unknown) => {
          tableReady = null;
          throw error;
        }
      );
    return tableReady;
  }

  const ensureTable = (): Promise<void> =>
    autoCreateTable ? ensureLockTable() : Promise.resolve();

  async function tryAcquire(key: string, acquire: AcquireOptions): Promise<LockLease | null> {
    const ownerToken = randomUUID();
    await ensureTable();

    // Insert, or take over a row whose lease has run out.
    const result = await pool.query<{ owner_token: string }>(
      `
      INSERT INTO ${lockTableName} (key, owner_token, expires_at)
      VALUES ($1, $2, NOW() + ($3::bigint * INTERVAL '1 millisecond'))
      ON CONFLICT (key) DO UPDATE SET
        owner_token = EXCLUDED.owner_token,
        expires_at = EXCLUDED.expires_at
      WHERE ${lockTableName}.expires_at <= NOW()
      RETURNING owner_token
    `,
      [key, ownerToken, acquire.ttlMs]
    );

    return result.rows[0]?.owner_token === ownerToken ? { ownerToken } : null;
  }

  async function release(key: string, ownerToken: string): Promise<void> {
    await ensureTable();
    await pool.query(`DELETE FROM ${lockTableName} WHERE key = $1 AND owner_token = $2`, [
      key,
      ownerToken,
    ]);
  }

  async function isLocked(key: string): Promise<boolean> {
    await ensureTable();
    const result = await pool.query(
      `SELECT 1 FROM ${lockTableName} WHERE key = $1 AND expires_at > NOW() LIMIT 1`,
      [key]
    );
    return result.rows.length > 0;
  }

  return { tryAcquire, release, isLocked, ensureLockTable };
}
