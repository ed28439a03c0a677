/**
 * MongoDB lease lock for cross-process mutual exclusion.
 * Uses a lease (TTL) + owner token; release verifies the token.
 */

import type { Db } from "mongodb";
import { randomUUID } from "node:crypto";
import type { AcquireOptions, LockLease } from "keyguard";

export interface MongoLockOptions {
  /**
   * Collection name for lock leases.
   * @default 'keyguard_lock'
   */
  lockCollectionName?: string;
}

interface LeaseDocument {
  _id: string;
  ownerToken: string;
  expiresAt: Date;
}

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === 11000;
}

/**
 * Create lease operations over a MongoDB collection.
 * Pass the Db used for cached values so both share one connection.
 */
export function createMongoLock(
  db: Db,
  options: MongoLockOptions = {}
): {
  tryAcquire(key: string, options: AcquireOptions): Promise<LockLease | null>;
  release(key: string, ownerToken: string): Promise<void>;
  isLocked(key: string): Promise<boolean>;
  ensureLockCollection(): Promise<void>;
} {
  const collection = db.collection<LeaseDocument>(options.lockCollectionName ?? "keyguard_lock");

  async function ensureLockCollection(): Promise<void> {
    // Lets the server reap leases nobody released.
    await collection.createIndex({ expiresAt: 1 }, { expireAfterSeconds: 0 });
  }

  async function tryAcquire(key: string, acquire: AcquireOptions): Promise<LockLease | null> {
    const ownerToken = randomUUID();
    const now = new Date();

    // Matches a missing or expired lease. A live lease makes the upsert
    // collide on _id (E11000), which means contended.
    try {
      const result = await collection.findOneAndUpdate(
        { _id: key, expiresAt: { $lte: now } },
        { $set: { ownerToken, expiresAt: new Date(now.getTime() + acquire.ttlMs) } },
        { upsert: true, returnDocument: "after" }
      );
      return result?.ownerToken === ownerToken ? { ownerToken } : null;
    } catch (error: unknown) {
      if (isDuplicateKeyError(error)) return null;
      throw error;
    }
  }

  async function release(key: string, ownerToken: string): Promise<void> {
    await collection.deleteOne({ _id: key, ownerToken });
  }

  async function isLocked(key: string): Promise<boolean> {
    const lease = await collection.findOne({ _id: key, expiresAt: { $gt: new Date() } });
    return lease !== null;
  }

  return { tryAcquire, release, isLocked, ensureLockCollection };
}
