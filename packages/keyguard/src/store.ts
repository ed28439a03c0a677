/**
 * keyguard/store
 *
 * Store contracts shared by the cache and lock wrappers.
 *
 * Two execution variants with the same operations:
 * - `AsyncStore` - every round trip returns a Promise (Redis, Postgres, ...)
 * - `SyncStore` - every round trip blocks the caller (in-process backends)
 *
 * Adapters report backend failures as StoreUnavailableError. A cache miss is
 * `null` from `get`; lock contention is `null` from `tryAcquire`.
 */

import { StoreUnavailableError, type StoreOperation } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * Owner token returned by a successful lock acquisition.
 */
export interface LockLease {
  ownerToken: string;
}

export interface AcquireOptions {
  /** Lease length. The store reclaims the lock after this many milliseconds. */
  ttlMs: number;
}

/**
 * Non-blocking store.
 */
export interface AsyncStore {
  readonly mode: "async";

  /** Read a value. Returns null on miss or expiry. */
  get(key: string): Promise<string | null>;

  /** Write a value. Omit ttlMs to keep it until deleted. */
  set(key: string, value: string, ttlMs?: number): Promise<void>;

  /** Delete a value. Deleting a missing key is not an error. */
  delete(key: string): Promise<void>;

  /**
   * Atomically acquire a lease (set-if-absent with expiry).
   * @returns Owner token if acquired, null if already held by another
   */
  tryAcquire(key: string, options: AcquireOptions): Promise<LockLease | null>;

  /**
   * Release the lease. Must verify owner token; no-op if the token does not
   * match (lease expired or taken by another).
   */
  release(key: string, ownerToken: string): Promise<void>;

  /** Check whether a live lease exists for the key. */
  isLocked(key: string): Promise<boolean>;

  /** Clean shutdown. */
  close(): Promise<void>;
}

/**
 * Blocking store. Same contract as AsyncStore without the Promises.
 */
export interface SyncStore {
  readonly mode: "sync";
  get(key: string): string | null;
  set(key: string, value: string, ttlMs?: number): void;
  delete(key: string): void;
  tryAcquire(key: string, options: AcquireOptions): LockLease | null;
  release(key: string, ownerToken: string): void;
  isLocked(key: string): boolean;
  close(): void;
}

export type Store = AsyncStore | SyncStore;

// =============================================================================
// Error mapping
// =============================================================================

/**
 * Run an adapter round trip, reporting any failure as StoreUnavailableError.
 *
 * @example
 * ```typescript
 * async get(key) {
 *   return guardStoreCall('get', key, () => this.client.get(key));
 * }
 * ```
 */
export async function guardStoreCall<T>(
  operation: StoreOperation,
  key: string | undefined,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof StoreUnavailableError) throw error;
    throw new StoreUnavailableError(operation, key, error);
  }
}

/**
 * Blocking counterpart of guardStoreCall.
 */
export function guardStoreCallSync<T>(
  operation: StoreOperation,
  key: string | undefined,
  call: () => T
): T {
  try {
    return call();
  } catch (error) {
    if (error instanceof StoreUnavailableError) throw error;
    throw new StoreUnavailableError(operation, key, error);
  }
}

// =============================================================================
// Lifting
// =============================================================================

/**
 * Expose a blocking store through the non-blocking contract so async
 * wrappers can share it with sync wrappers.
 */
export function toAsyncStore(store: SyncStore): AsyncStore {
  return {
    mode: "async",
    get: async (key) => guardStoreCallSync("get", key, () => store.get(key)),
    set: async (key, value, ttlMs) =>
      guardStoreCallSync("set", key, () => store.set(key, value, ttlMs)),
    delete: async (key) => guardStoreCallSync("delete", key, () => store.delete(key)),
    tryAcquire: async (key, options) =>
      guardStoreCallSync("tryAcquire", key, () => store.tryAcquire(key, options)),
    release: async (key, ownerToken) =>
      guardStoreCallSync("release", key, () => store.release(key, ownerToken)),
    isLocked: async (key) => guardStoreCallSync("isLocked", key, () => store.isLocked(key)),
    close: async () => guardStoreCallSync("close", undefined, () => store.close()),
  };
}
