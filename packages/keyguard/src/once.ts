/**
 * keyguard lock wrapper ("once")
 *
 * Lets one caller at a time run the wrapped function for a given key, across
 * every process sharing the store. Contended callers get the configured
 * fallback value or a LockContentionError; they never run unguarded.
 *
 * The lease TTL bounds how long a crashed holder blocks others. A call that
 * outlives its own TTL loses exclusivity: the store frees the key and a new
 * caller may enter. Pick a TTL longer than the slowest expected call.
 *
 * @example
 * ```typescript
 * const updateUser = guard.once(
 *   'update-user-{userId}',
 *   { ttl: '10s', params: ['userId'], onContended: 'return', fallback: { status: 'busy' } },
 *   async (userId: number, patch: Partial<User>) => db.users.update(userId, patch)
 * );
 * ```
 */

import type { WrapperContext } from "./context";
import { isPromiseLike, type ExecutionMode } from "./dispatch";
import { toTtlMs, type DurationInput } from "./duration";
import { LockContentionError, isStoreUnavailableError } from "./errors";
import { describeError } from "./events";
import { compileKeyTemplate } from "./key-template";
import type { LockLease, SyncStore } from "./store";

// =============================================================================
// Types
// =============================================================================

/**
 * What a call does when the lock is already held.
 * - 'throw': raise LockContentionError (or the error built by `error`)
 * - 'return': return `fallback` without calling the function
 */
export type ContentionPolicy<F> =
  | { onContended: "throw"; error?: (key: string) => Error }
  | { onContended: "return"; fallback: F };

export interface OnceBaseOptions {
  /**
   * Lease length. The store frees the lock after this even if the holder
   * never releases it.
   * @default the Keyguard defaultLockTtl (30s)
   */
  ttl?: DurationInput;

  /**
   * Parameter names of the wrapped function, in order.
   */
  params?: readonly string[];

  /**
   * What a store failure during acquisition does.
   * - 'fail-closed': surface the StoreUnavailableError (default)
   * - 'fail-open': run the function without the lock
   * @default 'fail-closed'
   */
  onStoreError?: "fail-closed" | "fail-open";

  /**
   * Calling convention of a function declared without `async`.
   * Unset, such functions use the sync store when one is configured and the
   * async store otherwise; see CachedOptions.mode.
   */
  mode?: ExecutionMode;
}

export type OnceOptions<F = never> = OnceBaseOptions & ContentionPolicy<F>;

/**
 * Lock-wrapped synchronous function.
 */
export interface SyncOnceFunction<A extends unknown[], T> {
  (...args: A): T;
  /** Whether a live lock exists for these arguments. */
  isLocked(...args: A): boolean;
  /** Store key for these arguments, prefix included. */
  key(...args: A): string;
}

/**
 * What the wrapper for a function without `async` returns before its calling
 * convention is known. Keyguard narrows it to SyncOnceFunction or
 * AsyncOnceFunction through its overloads.
 */
export interface PlainOnceFunction<A extends unknown[], T, F> {
  (...args: A): T | F | Promise<Awaited<T> | F>;
  isLocked(...args: A): boolean | Promise<boolean>;
  key(...args: A): string;
}

/**
 * Lock-wrapped async function.
 */
export interface AsyncOnceFunction<A extends unknown[], T> {
  (...args: A): Promise<T>;
  /** Whether a live lock exists for these arguments. */
  isLocked(...args: A): Promise<boolean>;
  /** Store key for these arguments, prefix included. */
  key(...args: A): string;
}

// =============================================================================
// Shared decisions
// =============================================================================

type Acquisition =
  | { kind: "acquired"; lease: LockLease; at: number }
  | { kind: "contended" }
  | { kind: "bypass" };

interface OncePlan<F> {
  ttlMs: number;
  key(args: readonly unknown[]): string;
  acquired(key: string, lease: LockLease | null): Acquisition;
  acquireFailed(key: string, error: unknown): Acquisition;
  contended(key: string): F;
  released(key: string, acquisition: { at: number }): void;
  releaseFailed(key: string, error: unknown): void;
}

function planOnce<F>(
  ctx: WrapperContext,
  template: string,
  options: OnceOptions<F>
): OncePlan<F> {
  const render = compileKeyTemplate(template, options.params);
  const ttlMs =
    options.ttl !== undefined ? toTtlMs(options.ttl, "lock ttl") : ctx.defaultLockTtlMs;
  const onStoreError = options.onStoreError ?? "fail-closed";
  const { events } = ctx;

  return {
    ttlMs,

    key: (args) => ctx.prefix + render(args),

    acquired(key, lease) {
      if (!lease) {
        events.emit({ type: "lock_contended", key, ts: Date.now() });
        return { kind: "contended" };
      }
      const at = Date.now();
      events.emit({ type: "lock_acquired", key, ts: at, ttlMs });
      return { kind: "acquired", lease, at };
    },

    acquireFailed(key, error) {
      const failOpen = onStoreError === "fail-open" && isStoreUnavailableError(error);
      events.emit({
        type: "store_error",
        key,
        ts: Date.now(),
        operation: "tryAcquire",
        error,
        handled: failOpen,
      });
      if (!failOpen) throw error;
      events.emit({ type: "lock_fail_open", key, ts: Date.now(), error });
      events.log(`keyguard: lock store unavailable for ${key}, running without lock: ${describeError(error)}`);
      return { kind: "bypass" };
    },

    contended(key) {
      if (options.onContended === "return") return options.fallback;
      throw options.error ? options.error(key) : new LockContentionError(key);
    },

    released(key, acquisition) {
      const ts = Date.now();
      events.emit({ type: "lock_released", key, ts, heldMs: ts - acquisition.at });
    },

    releaseFailed(key, error) {
      events.emit({ type: "lock_release_failed", key, ts: Date.now(), error });
      events.log(`keyguard: release failed for ${key}, lock expires after ${ttlMs}ms: ${describeError(error)}`);
    },
  };
}

// =============================================================================
// Variants
// =============================================================================

/**
 * Variant for functions declared without `async`.
 *
 * With a sync store acquisition and release block the caller. A result that
 * turns out to be a promise keeps the lock until it settles, and the caller
 * gets a promise. With only an async store, calls take the non-blocking
 * variant unless `mode: "sync"` was given.
 */
export function createSyncOnce<A extends unknown[], T, F>(
  ctx: WrapperContext,
  template: string,
  options: OnceOptions<F>,
  fn: (...args: A) => T
): PlainOnceFunction<A, T, F> {
  const plan = planOnce(ctx, template, options);
  const nonBlocking =
    options.mode === "sync" ? undefined : createAsyncOnce<A, T, F>(ctx, template, options, fn);
  // Set once a call returned a promise; later fallbacks and errors are handed back as promises.
  let returnsPromise = false;

  const viaAsync = (): AsyncOnceFunction<A, Awaited<T> | F> | undefined =>
    ctx.availableStore() === "async" ? nonBlocking : undefined;

  const release = (store: SyncStore, key: string, held: { lease: LockLease; at: number }): void => {
    try {
      store.release(key, held.lease.ownerToken);
      plan.released(key, held);
    } catch (error) {
      plan.releaseFailed(key, error);
    }
  };

  const releaseAfter = async (
    store: SyncStore,
    key: string,
    held: { lease: LockLease; at: number },
    pending: T
  ): Promise<Awaited<T>> => {
    try {
      return await pending;
    } finally {
      release(store, key, held);
    }
  };

  const resolved = async (fallback: F): Promise<Awaited<T> | F> => fallback;

  const blocking = (args: A): T | F | Promise<Awaited<T> | F> => {
    const key = plan.key(args);
    const store = ctx.syncStore();

    let attempt: Acquisition;
    try {
      attempt = plan.acquired(key, store.tryAcquire(key, { ttlMs: plan.ttlMs }));
    } catch (error) {
      attempt = plan.acquireFailed(key, error);
    }
    if (attempt.kind === "contended") {
      const fallback = plan.contended(key);
      return returnsPromise ? resolved(fallback) : fallback;
    }
    if (attempt.kind === "bypass") {
      const value = fn(...args);
      if (isPromiseLike(value)) returnsPromise = true;
      return value;
    }

    const held = attempt;
    let pending = false;
    try {
      const value = fn(...args);
      if (isPromiseLike(value)) {
        pending = true;
        returnsPromise = true;
        return releaseAfter(store, key, held, value);
      }
      return value;
    } finally {
      if (!pending) release(store, key, held);
    }
  };

  const call = (...args: A): T | F | Promise<Awaited<T> | F> => {
    const delegate = viaAsync();
    if (delegate) return delegate(...args);
    if (!returnsPromise) return blocking(args);
    try {
      return blocking(args);
    } catch (error) {
      return Promise.reject(error);
    }
  };

  const isLocked = (...args: A): boolean | Promise<boolean> => {
    const delegate = viaAsync();
    if (delegate) return delegate.isLocked(...args);
    const locked = ctx.syncStore().isLocked(plan.key(args));
    return returnsPromise ? Promise.resolve(locked) : locked;
  };

  return Object.assign(call, { isLocked, key: (...args: A) => plan.key(args) });
}

/**
 * Non-blocking variant. Release waits for the wrapped promise to settle.
 */
export function createAsyncOnce<A extends unknown[], R, F>(
  ctx: WrapperContext,
  template: string,
  options: OnceOptions<F>,
  fn: (...args: A) => R
): AsyncOnceFunction<A, Awaited<R> | F> {
  const plan = planOnce(ctx, template, options);

  const call = async (...args: A): Promise<Awaited<R> | F> => {
    const key = plan.key(args);
    const store = ctx.asyncStore();

    let attempt: Acquisition;
    try {
      attempt = plan.acquired(key, await store.tryAcquire(key, { ttlMs: plan.ttlMs }));
    } catch (error) {
      attempt = plan.acquireFailed(key, error);
    }
    if (attempt.kind === "contended") return plan.contended(key);
    if (attempt.kind === "bypass") return await fn(...args);

    const held = attempt;
    try {
      return await fn(...args);
    } finally {
      try {
        await store.release(key, held.lease.ownerToken);
        plan.released(key, held);
      } catch (error) {
        plan.releaseFailed(key, error);
      }
    }
  };

  return Object.assign(call, {
    isLocked: async (...args: A) => ctx.asyncStore().isLocked(plan.key(args)),
    key: (...args: A) => plan.key(args),
  });
}
