/**
 * keyguard-redis
 *
 * Redis store for keyguard, built on ioredis.
 * Cached values are plain string keys with PX expiry; lock leases live under
 * a separate prefix.
 */

import { Redis, type RedisOptions as ClientOptions } from "ioredis";
import { guardStoreCall, type AsyncStore } from "keyguard";
import { createRedisLock, type RedisLockOptions } from "./redis-lock";

export type { RedisLockOptions } from "./redis-lock";

// =============================================================================
// RedisOptions
// =============================================================================

/**
 * Options for the redis() shorthand function.
 */
export interface RedisOptions extends RedisLockOptions {
  /** Redis connection URL, e.g. 'redis://localhost:6379/0'. */
  url?: string;
  /** Bring your own client. It is not closed by `close()`. */
  client?: Redis;
  /**
   * ioredis options for the client created from `url`. Defaults to
   * `lazyConnect` and `maxRetriesPerRequest: 1`, so a command against an
   * unreachable server fails after one retry rather than outliving a lock TTL.
   */
  clientOptions?: ClientOptions;
}

const DEFAULT_CLIENT_OPTIONS: ClientOptions = { lazyConnect: true, maxRetriesPerRequest: 1 };

export interface RedisStore extends AsyncStore {
  /** Underlying ioredis client. */
  readonly client: Redis;
}

// =============================================================================
// redis() - One-liner Store Setup
// =============================================================================

/**
 * Create a keyguard store backed by Redis.
 *
 * @example
 * ```typescript
 * import { createKeyguard } from 'keyguard';
 * import { redis } from 'keyguard-redis';
 *
 * const guard = createKeyguard({ store: redis('redis://localhost:6379') });
 * ```
 *
 * @example
 * ```typescript
 * // Share an existing client
 * const store = redis({ client: existingClient, lockPrefix: 'myapp:lock:' });
 * ```
 */
export function redis(urlOrOptions: string | RedisOptions = {}): RedisStore {
  const opts: RedisOptions = typeof urlOrOptions === "string" ? { url: urlOrOptions } : urlOrOptions;

  const ownClient = !opts.client;
  const client =
    opts.client ??
    (opts.url
      ? new Redis(opts.url, { ...DEFAULT_CLIENT_OPTIONS, ...opts.clientOptions })
      : new Redis({ ...DEFAULT_CLIENT_OPTIONS, ...opts.clientOptions }));

  const lock = createRedisLock(client, { lockPrefix: opts.lockPrefix });

  return {
    mode: "async",
    client,

    async get(key) {
      return guardStoreCall("get", key, () => client.get(key));
    },

    async set(key, value, ttlMs) {
      await guardStoreCall("set", key, () =>
        ttlMs === undefined ? client.set(key, value) : client.set(key, value, "PX", ttlMs)
      );
    },

    async delete(key) {
      await guardStoreCall("delete", key, () => client.del(key));
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
      // Only quit clients we created
      if (ownClient) {
        await guardStoreCall("close", undefined, () => client.quit());
      }
    },
  };
}
