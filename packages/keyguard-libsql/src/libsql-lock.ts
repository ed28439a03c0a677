/**
 * libSQL lease lock for cross-process mutual exclusion.
 * Uses a lease (TTL) + owner token; release verifies the token.
 *
 * Expiry is stored as epoch milliseconds and compared against the caller's
 * clock, so every process sharing the database should keep its clock in sync.
 */

import type { Client } from "@libsql/client";
import { randomUUID } from "node:crypto";
import type { AcquireOptions, LockLease } from "keyguard";

export interface LibSqlLockOptions {
  /**
   * Table name for lock leases.
   * @default 'keyguard_lock'
   */
  lockTableName?: string;
}

export function createLibSqlLock(
  client: Client,
  options: LibSqlLockOptions = {}
): {
  tryAcquire(key: string, options: AcquireOptions): Promise<LockLease | null>;
  release(key: string, ownerToken: string): Promise<void>;
  isLocked(key: string): Promise<boolean>;
  ensureLockTable(): Promise<void>;
} {
  const lockTableName = options.lockTableName ?? "keyguard_lock";

  async function ensureLockTable(): Promise<void> {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${lockTableName} (
        key TEXT PRIMARY KEY,
        owner_token TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      )
    `);
  }

  async function tryAcquire(key: string, acquire: AcquireOptions): Promise<LockLease | null> {
    const ownerToken = randomUUID();
    const now = Date.now();

    // SQLite 3.35+ / libSQL support RETURNING.
    const result = await client.execute({
      sql: `
        INSERT INTO ${lockTableName} (key, owner_token, expires_at)
        VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          owner_token = excluded.owner_token,
          expires_at = excluded.expires_at
        WHERE ${lockTableName}.expires_at <= ?
        RETURNING owner_token
      `,
      args: [key, ownerToken, now + acquire.ttlMs, now],
    });

    return result.rows[0]?.owner_token === ownerToken ? { ownerToken } : null;
  }

  async function release(key: string, ownerToken: string): Promise<void> {
    await client.execute({
      sql: `DELETE FROM ${lockTableName} WHERE key = ? AND owner_token = ?`,
      args: [key, ownerToken],
    });
  }

  async function isLocked(key: string): Promise<boolean> {
    const result = await client.execute({
      sql: `SELECT 1 FROM ${lockTableName} WHERE key = ? AND expires_at > ? LIMIT 1`,
      args: [key, Date.now()],
    });
    return result.rows.length > 0;
  }

  return { tryAcquire, release, isLocked, ensureLockTable };
}
