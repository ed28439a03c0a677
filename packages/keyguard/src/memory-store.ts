/**
 * In-process store.
 *
 * Implements the blocking SyncStore contract over two Maps. Values and leases
 * only live inside this process, so it suits single-process apps and tests;
 * use a remote adapter when several processes must share locks.
 */

import { randomUUID } from "node:crypto";
import type { AcquireOptions, LockLease, SyncStore } from "./store";

export interface MemoryStoreOptions {
  /**
   * Clock used for expiry checks.
   * @default Date.now
   */
  clock?: () => number;

  /**
   * Token generator for lock leases.
   * @default randomUUID
   */
  createToken?: () => string;
}

export interface MemoryStore extends SyncStore {
  /** Number of live (unexpired) cache entries. */
  readonly size: number;
  /** Remove every entry and lease. */
  clear(): void;
}

interface Entry {
  value: string;
  expiresAt?: number;
}

interface Lease {
  ownerToken: string;
  expiresAt: number;
}

/**
 * Create an in-memory SyncStore with TTL expiry and atomic lease acquisition.
 *
 * @example
 * ```typescript
 * const guard = createKeyguard({ syncStore: createMemoryStore() });
 * ```
 */
export function createMemoryStore(options: MemoryStoreOptions = {}): MemoryStore {
  const clock = options.clock ?? Date.now;
  const createToken = options.createToken ?? randomUUID;
  const entries = new Map<string, Entry>();
  const leases = new Map<string, Lease>();

  const isExpired = (expiresAt: number | undefined): boolean =>
    expiresAt !== undefined && clock() >= expiresAt;

  const liveEntry = (key: string): Entry | undefined => {
    const entry = entries.get(key);
    if (!entry) return undefined;
    if (isExpired(entry.expiresAt)) {
      entries.delete(key);
      return undefined;
    }
    return entry;
  };

  const liveLease = (key: string): Lease | undefined => {
    const lease = leases.get(key);
    if (!lease) return undefined;
    if (isExpired(lease.expiresAt)) {
      leases.delete(key);
      return undefined;
    }
    return lease;
  };

  return {
    mode: "sync",

    get(key: string): string | null {
      return liveEntry(key)?.value ?? null;
    },

    set(key: string, value: string, ttlMs?: number): void {
      entries.set(key, {
        value,
        expiresAt: ttlMs !== undefined ? clock() + ttlMs : undefined,
      });
    },

    delete(key: string): void {
      entries.delete(key);
    },

    tryAcquire(key: string, acquire: AcquireOptions): LockLease | null {
      if (liveLease(key)) return null;
      const ownerToken = createToken();
      leases.set(key, { ownerToken, expiresAt: clock() + acquire.ttlMs });
      return { ownerToken };
    },

    release(key: string, ownerToken: string): void {
      if (leases.get(key)?.ownerToken === ownerToken) {
        leases.delete(key);
      }
    },

    isLocked(key: string): boolean {
      return liveLease(key) !== undefined;
    },

    close(): void {
      entries.clear();
      leases.clear();
    },

    clear(): void {
      entries.clear();
      leases.clear();
    },

    get size(): number {
      let live = 0;
      for (const key of [...entries.keys()]) {
        if (liveEntry(key)) live++;
      }
      return live;
    },
  };
}
