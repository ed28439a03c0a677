/**
 * Redis lease lock for cross-process mutual exclusion.
 * Acquire is a single SET NX PX; release compares the owner token and deletes
 * in one Lua script so an expired holder never frees a newer lease.
 */

import type { Redis } from "ioredis";
import { randomUUID } from "node:crypto";
import type { AcquireOptions, LockLease } from "keyguard";

export interface RedisLockOptions {
  /**
   * Prepended to lease keys so they never collide with cached values.
   * @default 'lock:'
   */
  lockPrefix?: string;
}

const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export function createRedisLock(
  client: Redis,
  options: RedisLockOptions = {}
): {
  tryAcquire(key: string, options: AcquireOptions): Promise<LockLease | null>;
  release(key: string, ownerToken: string): Promise<void>;
  isLocked(key: string): Promise<boolean>;
  leaseKey(key: string): string;
} {
  const lockPrefix = options.lockPrefix ?? "lock:";
  const leaseKey = (key: string): string => lockPrefix + key;

  async function tryAcquire(key: string, acquire: AcquireOptions): Promise<LockLease | null> {
    const ownerToken = randomUUID();
    const reply = await client.set(leaseKey(key), ownerToken, "PX", acquire.ttlMs, "NX");
    return reply === "OK" ? { ownerToken } : null;
  }

  async function release(key: string, ownerToken: string): Promise<void> {
    await client.eval(RELEASE_SCRIPT, 1, leaseKey(key), ownerToken);
  }

  async function isLocked(key: string): Promise<boolean> {
    return (await client.exists(leaseKey(key))) === 1;
  }

  return { tryAcquire, release, isLocked, leaseKey };
}
