/**
 * keyguard cache wrapper
 *
 * Caches successful results in the store under a key rendered from the call
 * arguments. Hits skip the wrapped function entirely; `reset` is the only
 * invalidation path besides TTL expiry.
 *
 * @example
 * ```typescript
 * const readUser = guard.cached(
 *   'read_user-{userId}',
 *   { ttl: '5m', params: ['userId'] },
 *   async (userId: number) => db.users.find(userId)
 * );
 *
 * await readUser(1);       // miss: queries db, stores result
 * await readUser(1);       // hit: no query
 * await readUser.reset(1); // next call queries again
 * ```
 */

import { jsonCodec, type Codec } from "./codec";
import type { WrapperContext } from "./context";
import { isPromiseLike, type ExecutionMode } from "./dispatch";
import { toTtlMs, type DurationInput } from "./duration";
import { isStoreUnavailableError, type StoreOperation } from "./errors";
import { describeError } from "./events";
import { compileKeyTemplate } from "./key-template";
import type { SyncStore } from "./store";

// =============================================================================
// Types
// =============================================================================

export interface CachedOptions<T> {
  /**
   * How long a stored result stays valid.
   * Falls back to the Keyguard `defaultTtl`; without either, entries live
   * until reset.
   */
  ttl?: DurationInput;

  /**
   * Parameter names of the wrapped function, in order.
   * Named placeholders in the template must appear here.
   *
   * @example ['userId', 'page']
   */
  params?: readonly string[];

  /**
   * Serialization of stored results.
   * @default JSON
   */
  codec?: Codec<T>;

  /**
   * What a store failure does to a call.
   * - 'degrade': treat it as a miss and call through (default)
   * - 'throw': surface the StoreUnavailableError
   * @default 'degrade'
   */
  onStoreError?: "degrade" | "throw";

  /**
   * Calling convention of a function declared without `async`.
   * - 'async': always take the non-blocking variant
   * - 'sync': always block; throws StoreNotInitializedError without a sync store
   * Unset, such functions use the sync store when one is configured and the
   * async store otherwise. `async` functions always take the async variant.
   */
  mode?: ExecutionMode;
}

/**
 * Cache-wrapped synchronous function.
 */
export interface SyncCachedFunction<A extends unknown[], T> {
  (...args: A): T;
  /** Delete the entry for these arguments. Idempotent. */
  reset(...args: A): void;
  /** Store key for these arguments, prefix included. */
  key(...args: A): string;
}

/**
 * What the wrapper for a function without `async` returns before its calling
 * convention is known. Keyguard narrows it to SyncCachedFunction or
 * AsyncCachedFunction through its overloads.
 */
export interface PlainCachedFunction<A extends unknown[], T> {
  (...args: A): T | Promise<Awaited<T>>;
  reset(...args: A): void | Promise<void>;
  key(...args: A): string;
}

/**
 * Cache-wrapped async function.
 */
export interface AsyncCachedFunction<A extends unknown[], T> {
  (...args: A): Promise<T>;
  /** Delete the entry for these arguments. Idempotent. */
  reset(...args: A): Promise<void>;
  /** Store key for these arguments, prefix included. */
  key(...args: A): string;
}

// =============================================================================
// Shared decisions
// =============================================================================

type Lookup<T> = { found: true; value: T } | { found: false };

interface CachePlan<T> {
  ttlMs: number | undefined;
  key(args: readonly unknown[]): string;
  lookup(key: string, raw: string | null): Lookup<T>;
  encode(key: string, value: T): string | undefined;
  stored(key: string): void;
  reset(key: string): void;
  storeFailed(operation: StoreOperation, key: string, error: unknown): void;
}

function planCache<T>(
  ctx: WrapperContext,
  template: string,
  options: CachedOptions<T>
): CachePlan<T> {
  const render = compileKeyTemplate(template, options.params);
  const ttlMs = options.ttl !== undefined ? toTtlMs(options.ttl, "cache ttl") : ctx.defaultTtlMs;
  const codec = options.codec ?? jsonCodec<T>();
  const onStoreError = options.onStoreError ?? "degrade";
  const { events } = ctx;

  return {
    ttlMs,

    key: (args) => ctx.prefix + render(args),

    lookup(key, raw) {
      if (raw !== null) {
        try {
          const value = codec.decode(raw);
          events.emit({ type: "cache_hit", key, ts: Date.now() });
          return { found: true, value };
        } catch (error) {
          events.emit({ type: "cache_decode_error", key, ts: Date.now(), error });
          events.log(`keyguard: could not decode cached value for ${key}, recomputing`);
        }
      }
      events.emit({ type: "cache_miss", key, ts: Date.now() });
      return { found: false };
    },

    encode(key, value) {
      if (value === undefined) {
        events.emit({ type: "cache_skip", key, ts: Date.now(), reason: "undefined_result" });
        return undefined;
      }
      try {
        return codec.encode(value);
      } catch (error) {
        events.emit({ type: "cache_skip", key, ts: Date.now(), reason: "unencodable_result", error });
        events.log(`keyguard: could not encode result for ${key}, returning it uncached: ${describeError(error)}`);
        return undefined;
      }
    },

    stored(key) {
      events.emit({ type: "cache_set", key, ts: Date.now(), ttlMs });
    },

    reset(key) {
      events.emit({ type: "cache_reset", key, ts: Date.now() });
    },

    storeFailed(operation, key, error) {
      const handled = onStoreError === "degrade" && isStoreUnavailableError(error);
      events.emit({ type: "store_error", key, ts: Date.now(), operation, error, handled });
      if (!handled) throw error;
      events.log(`keyguard: cache ${operation} failed for ${key}, calling through: ${describeError(error)}`);
    },
  };
}

// =============================================================================
// Variants
// =============================================================================

/**
 * Variant for functions declared without `async`.
 *
 * With a sync store every round trip blocks the caller. A result that turns
 * out to be a promise is awaited before it is stored, and the caller gets a
 * promise. With only an async store, calls take the non-blocking variant
 * unless `mode: "sync"` was given.
 */
export function createSyncCached<A extends unknown[], T>(
  ctx: WrapperContext,
  template: string,
  options: CachedOptions<T> & CachedOptions<Awaited<T>>,
  fn: (...args: A) => T
): PlainCachedFunction<A, T> {
  const plan = planCache<T>(ctx, template, options);
  const settledPlan = planCache<Awaited<T>>(ctx, template, options);
  const nonBlocking =
    options.mode === "sync" ? undefined : createAsyncCached<A, T>(ctx, template, options, fn);
  // Set once a call returned a promise; later hits and errors are handed back as promises.
  let returnsPromise = false;

  const viaAsync = (): AsyncCachedFunction<A, Awaited<T>> | undefined =>
    ctx.availableStore() === "async" ? nonBlocking : undefined;

  const save = <V>(cache: CachePlan<V>, store: SyncStore, key: string, value: V): void => {
    const encoded = cache.encode(key, value);
    if (encoded === undefined) return;
    try {
      store.set(key, encoded, cache.ttlMs);
      cache.stored(key);
    } catch (error) {
      cache.storeFailed("set", key, error);
    }
  };

  const settle = async (store: SyncStore, key: string, pending: T): Promise<Awaited<T>> => {
    const value = await pending;
    save(settledPlan, store, key, value);
    return value;
  };

  const resolved = async (value: T): Promise<Awaited<T>> => await value;

  const blocking = (args: A): T | Promise<Awaited<T>> => {
    const key = plan.key(args);
    const store = ctx.syncStore();

    let raw: string | null = null;
    try {
      raw = store.get(key);
    } catch (error) {
      plan.storeFailed("get", key, error);
    }
    const cached = plan.lookup(key, raw);
    if (cached.found) return returnsPromise ? resolved(cached.value) : cached.value;

    const value = fn(...args);
    if (isPromiseLike(value)) {
      returnsPromise = true;
      return settle(store, key, value);
    }
    save(plan, store, key, value);
    return value;
  };

  const call = (...args: A): T | Promise<Awaited<T>> => {
    const delegate = viaAsync();
    if (delegate) return delegate(...args);
    if (!returnsPromise) return blocking(args);
    try {
      return blocking(args);
    } catch (error) {
      return Promise.reject(error);
    }
  };

  const reset = (...args: A): void | Promise<void> => {
    const delegate = viaAsync();
    if (delegate) return delegate.reset(...args);
    const key = plan.key(args);
    ctx.syncStore().delete(key);
    plan.reset(key);
    if (returnsPromise) return Promise.resolve();
  };

  return Object.assign(call, { reset, key: (...args: A) => plan.key(args) });
}

/**
 * Non-blocking variant: store round trips and the wrapped call are awaited.
 */
export function createAsyncCached<A extends unknown[], R>(
  ctx: WrapperContext,
  template: string,
  options: CachedOptions<Awaited<R>>,
  fn: (...args: A) => R
): AsyncCachedFunction<A, Awaited<R>> {
  const plan = planCache(ctx, template, options);

  const call = async (...args: A): Promise<Awaited<R>> => {
    const key = plan.key(args);
    const store = ctx.asyncStore();

    let raw: string | null = null;
    try {
      raw = await store.get(key);
    } catch (error) {
      plan.storeFailed("get", key, error);
    }
    const cached = plan.lookup(key, raw);
    if (cached.found) return cached.value;

    const value = await fn(...args);

    const encoded = plan.encode(key, value);
    if (encoded !== undefined) {
      try {
        await store.set(key, encoded, plan.ttlMs);
        plan.stored(key);
      } catch (error) {
        plan.storeFailed("set", key, error);
      }
    }
    return value;
  };

  const reset = async (...args: A): Promise<void> => {
    const key = plan.key(args);
    await ctx.asyncStore().delete(key);
    plan.reset(key);
  };

  return Object.assign(call, { reset, key: (...args: A) => plan.key(args) });
}
