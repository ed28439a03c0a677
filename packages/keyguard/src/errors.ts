/**
 * keyguard/errors
 *
 * Error types raised by keyguard wrappers and store adapters.
 *
 * - `KeyResolutionError` - template and arguments do not fit (caller bug)
 * - `StoreUnavailableError` - the backing store failed a round trip
 * - `LockContentionError` - another holder owns the lock (expected outcome)
 * - `StoreNotInitializedError` - a wrapper ran before its store handle was set
 * - `KeyguardConfigError` - invalid options passed at decoration time
 *
 * @example
 * ```typescript
 * import { isLockContentionError } from 'keyguard';
 *
 * try {
 *   await updateUser(7, patch);
 * } catch (error) {
 *   if (isLockContentionError(error)) return respond(409);
 *   throw error;
 * }
 * ```
 */

// =============================================================================
// Key resolution
// =============================================================================

export type KeyResolutionReason =
  | "malformed_template"
  | "unknown_parameter"
  | "missing_positional"
  | "unresolved_path"
  | "unrenderable_value";

/**
 * Error thrown when a key template cannot be rendered from call arguments.
 */
export class KeyResolutionError extends Error {
  readonly type = "KEY_RESOLUTION" as const;

  constructor(
    message: string,
    public readonly template: string,
    public readonly reason: KeyResolutionReason,
    public readonly field?: string
  ) {
    super(message);
    this.name = "KeyResolutionError";
  }
}

// =============================================================================
// Store failures
// =============================================================================

export type StoreOperation =
  | "get"
  | "set"
  | "delete"
  | "tryAcquire"
  | "release"
  | "isLocked"
  | "close";

/**
 * Error thrown when the backing store cannot complete an operation.
 * Distinct from a cache miss (`null` from get) and from lock contention
 * (`null` from tryAcquire).
 */
export class StoreUnavailableError extends Error {
  readonly type = "STORE_UNAVAILABLE" as const;

  constructor(
    public readonly operation: StoreOperation,
    public readonly key: string | undefined,
    public readonly cause?: unknown
  ) {
    super(
      key === undefined
        ? `StoreUnavailableError: ${operation} failed`
        : `StoreUnavailableError: ${operation} failed for key ${key}`
    );
    this.name = "StoreUnavailableError";
  }
}

/**
 * Error thrown when a wrapper is invoked before its store handle exists.
 */
export class StoreNotInitializedError extends Error {
  readonly type = "STORE_NOT_INITIALIZED" as const;

  constructor(public readonly mode: "sync" | "async") {
    super(
      mode === "sync"
        ? "StoreNotInitializedError: no synchronous store configured; call init({ syncStore }) first"
        : "StoreNotInitializedError: no store configured; call init({ store }) first"
    );
    this.name = "StoreNotInitializedError";
  }
}

// =============================================================================
// Locking
// =============================================================================

/**
 * Error thrown when a lock is held by someone else.
 */
export class LockContentionError extends Error {
  readonly type = "LOCK_CONTENTION" as const;

  constructor(
    public readonly key: string,
    public readonly waitedMs?: number
  ) {
    super(
      waitedMs === undefined
        ? `LockContentionError: ${key} is locked`
        : `LockContentionError: ${key} is still locked after ${waitedMs}ms`
    );
    this.name = "LockContentionError";
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Error thrown for invalid wrapper or adapter configuration.
 */
export class KeyguardConfigError extends Error {
  readonly type = "CONFIG" as const;

  constructor(message: string) {
    super(`KeyguardConfigError: ${message}`);
    this.name = "KeyguardConfigError";
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export type KeyguardError =
  | KeyResolutionError
  | StoreUnavailableError
  | StoreNotInitializedError
  | LockContentionError
  | KeyguardConfigError;

export function isKeyResolutionError(error: unknown): error is KeyResolutionError {
  return error instanceof KeyResolutionError;
}

export function isStoreUnavailableError(error: unknown): error is StoreUnavailableError {
  return error instanceof StoreUnavailableError;
}

export function isStoreNotInitializedError(
  error: unknown
): error is StoreNotInitializedError {
  return error instanceof StoreNotInitializedError;
}

export function isLockContentionError(error: unknown): error is LockContentionError {
  return error instanceof LockContentionError;
}

export function isKeyguardConfigError(error: unknown): error is KeyguardConfigError {
  return error instanceof KeyguardConfigError;
}

/**
 * Check if an error is any keyguard error.
 */
export function isKeyguardError(error: unknown): error is KeyguardError {
  return (
    isKeyResolutionError(error) ||
    isStoreUnavailableError(error) ||
    isStoreNotInitializedError(error) ||
    isLockContentionError(error) ||
    isKeyguardConfigError(error)
  );
}
