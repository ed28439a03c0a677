/**
 * keyguard
 *
 * Cache and lock wrappers for functions, keyed by templates over the call
 * arguments and backed by a shared key-value store.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createKeyguard, createMemoryStore } from 'keyguard';
 *
 * const guard = createKeyguard({ syncStore: createMemoryStore() });
 *
 * const readUser = guard.cached(
 *   'read_user-{userId}',
 *   { ttl: '5m', params: ['userId'] },
 *   async (userId: number) => db.users.find(userId)
 * );
 *
 * const updateUser = guard.once(
 *   'update-user-{userId}',
 *   { params: ['userId'], onContended: 'return', fallback: null },
 *   async (userId: number, patch: Partial<User>) => {
 *     const user = await db.users.update(userId, patch);
 *     await readUser.reset(userId);
 *     return user;
 *   }
 * );
 * ```
 *
 * ## Entry Points
 *
 * - `keyguard` - context, wrappers, stores, errors
 * - `keyguard/errors` - error classes and type guards only
 * - `keyguard/duration` - duration helpers
 * - `keyguard/testing` - test clock, event recorder, failing stores
 *
 * Store adapters live in `keyguard-redis`, `keyguard-postgres`,
 * `keyguard-mongo` and `keyguard-libsql`.
 */

// Context
export {
  Keyguard,
  createKeyguard,
  type KeyguardOptions,
  type StoreHandles,
} from "./keyguard";

// Wrappers
export {
  type CachedOptions,
  type SyncCachedFunction,
  type AsyncCachedFunction,
} from "./cached";
export {
  type OnceOptions,
  type OnceBaseOptions,
  type ContentionPolicy,
  type SyncOnceFunction,
  type AsyncOnceFunction,
} from "./once";
export { type KeyLock, type LockOptions, type LockWaitOptions } from "./lock";
export { detectMode, isAsyncFunction, type ExecutionMode } from "./dispatch";

// Keys
export {
  parseKeyTemplate,
  bindArguments,
  assertTemplateParams,
  resolveKey,
  compileKeyTemplate,
  renderValue,
  type KeyTemplate,
  type TemplateSegment,
  type FieldRoot,
  type PathStep,
  type BoundArguments,
} from "./key-template";

// Stores
export {
  guardStoreCall,
  guardStoreCallSync,
  toAsyncStore,
  type AsyncStore,
  type SyncStore,
  type Store,
  type LockLease,
  type AcquireOptions,
} from "./store";
export { createMemoryStore, type MemoryStore, type MemoryStoreOptions } from "./memory-store";
export { jsonCodec, type Codec } from "./codec";

// Events
export {
  type KeyguardEvent,
  type KeyguardEventType,
  type EventHandler,
  type Logger,
} from "./events";

// Durations
export { Duration, toMs, type DurationInput } from "./duration";

// Errors
export {
  KeyResolutionError,
  StoreUnavailableError,
  StoreNotInitializedError,
  LockContentionError,
  KeyguardConfigError,
  isKeyResolutionError,
  isStoreUnavailableError,
  isStoreNotInitializedError,
  isLockContentionError,
  isKeyguardConfigError,
  isKeyguardError,
  type KeyguardError,
  type KeyResolutionReason,
  type StoreOperation,
} from "./errors";
