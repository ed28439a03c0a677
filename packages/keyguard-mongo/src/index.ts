/**
 * keyguard-mongo
 *
 * MongoDB store for keyguard.
 * Cached values are documents keyed by `_id` with an `expiresAt` date; lock
 * leases live in a second collection. Both carry a TTL index so the server
 * reaps expired documents, and reads still filter on `expiresAt` because the
 * reaper runs only once a minute.
 */

import type { Db, MongoClientOptions } from "mongodb";
import { MongoClient as MongoClientImpl } from "mongodb";
import { guardStoreCall, type AsyncStore } from "keyguard";
import { createMongoLock } from "./mongo-lock";

export type { MongoLockOptions } from "./mongo-lock";

interface CacheDocument {
  _id: string;
  value: string;
  expiresAt: Date | null;
}

// =============================================================================
// MongoOptions
// =============================================================================

/**
 * Options for the mongo() shorthand function.
 */
export interface MongoOptions {
  /** MongoDB connection URL. */
  url: string;
  /** Database name. Falls back to the URL path, then 'keyguard'. */
  database?: string;
  /** Collection for cached values. @default 'keyguard_cache' */
  collection?: string;
  /** Collection for lock leases. @default 'keyguard_lock' */
  lockCollection?: string;
  /** Bring your own client. It is not closed by `close()`. */
  client?: MongoClientImpl;
  /** MongoDB client options. */
  clientOptions?: MongoClientOptions;
}

export interface MongoStore extends AsyncStore {
  /** Connect and create the TTL indexes. Runs automatically on first use. */
  connect(): Promise<Db>;
}

/**
 * Pick the database name: explicit option, then the URL path, then 'keyguard'.
 *
 * @example
 * ```typescript
 * resolveDatabaseName('mongodb://localhost:27017/orders?retryWrites=true'); // 'orders'
 * ```
 */
export function resolveDatabaseName(url: string, database?: string): string {
  if (database) return database;
  const match = url.match(/mongodb(?:\+srv)?:\/\/[^/]+\/([^?]+)/);
  return match?.[1] ?? "keyguard";
}

// =============================================================================
// mongo() - One-liner Store Setup
// =============================================================================

/**
 * Create a keyguard store backed by MongoDB.
 *
 * @example
 * ```typescript
 * import { createKeyguard } from 'keyguard';
 * import { mongo } from 'keyguard-mongo';
 *
 * const guard = createKeyguard({ store: mongo('mongodb://localhost:27017/myapp') });
 * ```
 */
export function mongo(urlOrOptions: string | MongoOptions): MongoStore {
  const opts: MongoOptions = typeof urlOrOptions === "string" ? { url: urlOrOptions } : urlOrOptions;
  const databaseName = resolveDatabaseName(opts.url, opts.database);
  const collectionName = opts.collection ?? "keyguard_cache";

  const ownClient = !opts.client;
  let client: MongoClientImpl | undefined = opts.client;
  let ready: Promise<Db> | null = null;

  const open = async (): Promise<Db> => {
    client ??= new MongoClientImpl(opts.url, {
      directConnection: !opts.url.includes("mongodb+srv://"),
      ...opts.clientOptions,
    });
    await client.connect();
    const db = client.db(databaseName);
    await db.collection<CacheDocument>(collectionName).createIndex({ expiresAt: 1 }, { expireAfterSeconds: 0 });
    await createMongoLock(db, { lockCollectionName: opts.lockCollection }).ensureLockCollection();
    return db;
  };

  const connect = (): Promise<Db> => {
    ready ??= open().catch((error: unknown) => {
      ready = null;
      throw error;
    });
    return ready;
  };

  const cache = async () => (await connect()).collection<CacheDocument>(collectionName);
  const lock = async () => createMongoLock(await connect(), { lockCollectionName: opts.lockCollection });

  return {
    mode: "async",
    connect,

    async get(key) {
      return guardStoreCall("get", key, async () => {
        const doc = await (await cache()).findOne({
          _id: key,
          $or: [{ expiresAt: null }, { expiresAt: { $gt: new Date() } }],
        });
        return doc?.value ?? null;
      });
    },

    async set(key, value, ttlMs) {
      await guardStoreCall("set", key, async () => {
        const expiresAt = ttlMs === undefined ? null : new Date(Date.now() + ttlMs);
        await (await cache()).updateOne({ _id: key }, { $set: { value, expiresAt } }, { upsert: true });
      });
    },

    async delete(key) {
      await guardStoreCall("delete", key, async () => {
        await (await cache()).deleteOne({ _id: key });
      });
    },

    async tryAcquire(key, options) {
      return guardStoreCall("tryAcquire", key, async () => (await lock()).tryAcquire(key, options));
    },

    async release(key, ownerToken) {
      await guardStoreCall("release", key, async () => (await lock()).release(key, ownerToken));
    },

    async isLocked(key) {
      return guardStoreCall("isLocked", key, async () => (await lock()).isLocked(key));
    },

    async close() {
      // Only close client if we created it
      if (ownClient && client) {
        const owned = client;
        client = undefined;
        ready = null;
        await guardStoreCall("close", undefined, () => owned.close());
      }
    },
  };
}
