/**
 * keyguard context
 *
 * Holds the store handles, key prefix and defaults for one application.
 * Wrappers can be created before the stores exist (at module load) and only
 * need them once they are called.
 *
 * @example
 * ```typescript
 * import { createKeyguard } from 'keyguard';
 * import { redis } from 'keyguard-redis';
 *
 * export const guard = createKeyguard({ prefix: 'users:' });
 *
 * export const readUser = guard.cached(
 *   'read_user-{userId}',
 *   { ttl: '5m', params: ['userId'] },
 *   async (userId: number) => db.users.find(userId)
 * );
 *
 * // at startup
 * guard.init({ store: redis(process.env.REDIS_URL) });
 * // at shutdown
 * await guard.close();
 * ```
 */

import {
  createAsyncCached,
  createSyncCached,
  type AsyncCachedFunction,
  type CachedOptions,
  type PlainCachedFunction,
  type SyncCachedFunction,
} from "./cached";
import type { WrapperContext } from "./context";
import { detectMode } from "./dispatch";
import { toTtlMs, type DurationInput } from "./duration";
import { StoreNotInitializedError } from "./errors";
import { createEventSink, type EventHandler, type EventSink, type Logger } from "./events";
import { createLock, type KeyLock, type LockOptions } from "./lock";
import {
  createAsyncOnce,
  createSyncOnce,
  type AsyncOnceFunction,
  type OnceOptions,
  type PlainOnceFunction,
  type SyncOnceFunction,
} from "./once";
import { toAsyncStore, type AsyncStore, type SyncStore } from "./store";

// =============================================================================
// Options
// =============================================================================

export interface StoreHandles {
  /** Store used by async wrappers. */
  store?: AsyncStore;
  /**
   * Store used by sync wrappers. Async wrappers fall back to it when no
   * `store` is set.
   */
  syncStore?: SyncStore;
}

export interface KeyguardOptions extends StoreHandles {
  /**
   * Prepended to every key, e.g. 'myapp:'.
   * @default ''
   */
  prefix?: string;

  /**
   * Cache TTL for wrappers that set none. Without it such entries live until
   * reset.
   */
  defaultTtl?: DurationInput;

  /**
   * Lock lease for wrappers that set none.
   * @default '30s'
   */
  defaultLockTtl?: DurationInput;

  /** Receives every cache and lock event. */
  onEvent?: EventHandler;

  /** Receives a line for every degraded path (store errors, failed releases). */
  logger?: Logger;
}

const DEFAULT_LOCK_TTL = "30s";

// =============================================================================
// Keyguard
// =============================================================================

export class Keyguard {
  private asyncHandle: AsyncStore | undefined;
  private syncHandle: SyncStore | undefined;
  private liftedSync: AsyncStore | undefined;
  private readonly context: WrapperContext;

  constructor(options: KeyguardOptions = {}) {
    const events: EventSink = createEventSink(options.onEvent, options.logger);
    this.context = {
      prefix: options.prefix ?? "",
      defaultTtlMs:
        options.defaultTtl !== undefined ? toTtlMs(options.defaultTtl, "defaultTtl") : undefined,
      defaultLockTtlMs: toTtlMs(options.defaultLockTtl ?? DEFAULT_LOCK_TTL, "defaultLockTtl"),
      events,
      asyncStore: () => this.resolveAsyncStore(),
      syncStore: () => this.resolveSyncStore(),
      availableStore: () => (this.syncHandle ? "sync" : this.asyncHandle ? "async" : undefined),
    };
    this.init(options);
  }

  get prefix(): string {
    return this.context.prefix;
  }

  /** True once at least one store handle is set. */
  get initialized(): boolean {
    return this.asyncHandle !== undefined || this.syncHandle !== undefined;
  }

  /**
   * Install store handles. Handles not passed keep their current value.
   */
  init(handles: StoreHandles): this {
    if (handles.store) this.asyncHandle = handles.store;
    if (handles.syncStore) {
      this.syncHandle = handles.syncStore;
      this.liftedSync = undefined;
    }
    return this;
  }

  /**
   * Close every store handle and return to the uninitialised state.
   */
  async close(): Promise<void> {
    const asyncHandle = this.asyncHandle;
    const syncHandle = this.syncHandle;
    this.asyncHandle = undefined;
    this.syncHandle = undefined;
    this.liftedSync = undefined;
    try {
      if (asyncHandle) await asyncHandle.close();
    } finally {
      syncHandle?.close();
    }
  }

  // ---------------------------------------------------------------------------
  // Wrappers
  // ---------------------------------------------------------------------------

  /**
   * Cache a function's results under a key rendered from its arguments.
   */
  cached<A extends unknown[], T>(
    template: string,
    options: CachedOptions<T>,
    fn: (...args: A) => Promise<T>
  ): AsyncCachedFunction<A, T>;
  cached<A extends unknown[], T>(
    template: string,
    options: CachedOptions<T>,
    fn: (...args: A) => T
  ): SyncCachedFunction<A, T>;
  cached<A extends unknown[], R>(
    template: string,
    options: CachedOptions<R> & CachedOptions<Awaited<R>>,
    fn: (...args: A) => R
  ): AsyncCachedFunction<A, Awaited<R>> | PlainCachedFunction<A, R> {
    return detectMode(fn, options.mode) === "async"
      ? createAsyncCached<A, R>(this.context, template, options, fn)
      : createSyncCached<A, R>(this.context, template, options, fn);
  }

  /**
   * Let one caller at a time run a function for a given key.
   */
  once<A extends unknown[], T, F = never>(
    template: string,
    options: OnceOptions<F>,
    fn: (...args: A) => Promise<T>
  ): AsyncOnceFunction<A, T | F>;
  once<A extends unknown[], T, F = never>(
    template: string,
    options: OnceOptions<F>,
    fn: (...args: A) => T
  ): SyncOnceFunction<A, T | F>;
  once<A extends unknown[], R, F>(
    template: string,
    options: OnceOptions<F>,
    fn: (...args: A) => R
  ): AsyncOnceFunction<A, Awaited<R> | F> | PlainOnceFunction<A, R, F> {
    return detectMode(fn, options.mode) === "async"
      ? createAsyncOnce<A, R, F>(this.context, template, options, fn)
      : createSyncOnce<A, R, F>(this.context, template, options, fn);
  }

  /**
   * A named lock for an arbitrary block of code.
   */
  lock(name: string, options?: LockOptions): KeyLock {
    return createLock(this.context, name, options);
  }

  // ---------------------------------------------------------------------------
  // Store resolution
  // ---------------------------------------------------------------------------

  private resolveAsyncStore(): AsyncStore {
    if (this.asyncHandle) return this.asyncHandle;
    if (this.syncHandle) {
      this.liftedSync ??= toAsyncStore(this.syncHandle);
      return this.liftedSync;
    }
    throw new StoreNotInitializedError("async");
  }

  private resolveSyncStore(): SyncStore {
    if (this.syncHandle) return this.syncHandle;
    throw new StoreNotInitializedError("sync");
  }
}

/**
 * Create a Keyguard context.
 */
export function createKeyguard(options?: KeyguardOptions): Keyguard {
  return new Keyguard(options);
}
