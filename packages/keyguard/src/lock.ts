/**
 * keyguard standalone lock
 *
 * A named lock around any block of code, independent of a wrapped function.
 * Uses the same store lease as `once`, so a `lock('report')` and a
 * `once('report', ...)` exclude each other.
 *
 * @example
 * ```typescript
 * const nightly = guard.lock('nightly-report', {
 *   ttl: '2m',
 *   wait: { timeout: '5s', interval: '250ms' },
 * });
 *
 * await nightly.run(async () => {
 *   await buildReport();
 * });
 * ```
 */

import type { WrapperContext } from "./context";
import { toMs, toTtlMs, type DurationInput } from "./duration";
import { KeyguardConfigError, LockContentionError } from "./errors";
import { describeError } from "./events";
import type { LockLease } from "./store";

// =============================================================================
// Types
// =============================================================================

export interface LockWaitOptions {
  /** Give up after this long. */
  timeout: DurationInput;
  /**
   * Delay between acquisition attempts.
   * @default '100ms'
   */
  interval?: DurationInput;
}

export interface LockOptions {
  /**
   * Lease length.
   * @default the Keyguard defaultLockTtl (30s)
   */
  ttl?: DurationInput;
  /** Poll until the lock frees up instead of failing on first contention. */
  wait?: LockWaitOptions;
}

export interface KeyLock {
  /** Store key, prefix included. */
  readonly key: string;
  /**
   * Run `fn` while holding the lock. Throws LockContentionError when the lock
   * stays held (immediately, or after `wait.timeout`).
   */
  run<T>(fn: () => T | Promise<T>): Promise<T>;
  /** Whether any holder owns the lock right now. */
  isLocked(): Promise<boolean>;
}

const DEFAULT_INTERVAL_MS = 100;

// =============================================================================
// Implementation
// =============================================================================

interface WaitPlan {
  timeoutMs: number;
  intervalMs: number;
}

function planWait(wait: LockWaitOptions | undefined): WaitPlan | undefined {
  if (!wait) return undefined;
  const intervalMs =
    wait.interval !== undefined ? toTtlMs(wait.interval, "lock wait interval") : DEFAULT_INTERVAL_MS;
  const timeoutMs = toMs(wait.timeout);
  if (intervalMs > timeoutMs && timeoutMs > 0) {
    throw new KeyguardConfigError(
      `lock wait interval (${intervalMs}ms) is longer than its timeout (${timeoutMs}ms)`
    );
  }
  return { timeoutMs, intervalMs };
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function createLock(
  ctx: WrapperContext,
  name: string,
  options: LockOptions = {}
): KeyLock {
  if (name.length === 0) {
    throw new KeyguardConfigError("lock name must not be empty");
  }
  const key = ctx.prefix + name;
  const ttlMs = options.ttl !== undefined ? toTtlMs(options.ttl, "lock ttl") : ctx.defaultLockTtlMs;
  const wait = planWait(options.wait);
  const { events } = ctx;

  const acquire = async (): Promise<{ lease: LockLease; at: number }> => {
    const store = ctx.asyncStore();
    const started = Date.now();
    let attempt = 0;

    for (;;) {
      const lease = await store.tryAcquire(key, { ttlMs });
      if (lease) {
        const at = Date.now();
        events.emit({ type: "lock_acquired", key, ts: at, ttlMs });
        return { lease, at };
      }
      events.emit({ type: "lock_contended", key, ts: Date.now() });
      if (!wait) throw new LockContentionError(key);

      const waited = Date.now() - started;
      if (waited >= wait.timeoutMs) throw new LockContentionError(key, waited);

      attempt++;
      const delayMs = Math.min(wait.intervalMs, wait.timeoutMs - waited);
      events.emit({ type: "lock_wait", key, ts: Date.now(), attempt, delayMs });
      await sleep(delayMs);
    }
  };

  return {
    key,

    async run<T>(fn: () => T | Promise<T>): Promise<T> {
      const { lease, at } = await acquire();
      try {
        return await fn();
      } finally {
        try {
          await ctx.asyncStore().release(key, lease.ownerToken);
          const ts = Date.now();
          events.emit({ type: "lock_released", key, ts, heldMs: ts - at });
        } catch (error) {
          events.emit({ type: "lock_release_failed", key, ts: Date.now(), error });
          events.log(`keyguard: release failed for ${key}, lock expires after ${ttlMs}ms: ${describeError(error)}`);
        }
      }
    },

    isLocked: async () => ctx.asyncStore().isLocked(key),
  };
}
