/**
 * Calling-convention detection.
 *
 * Every wrapper comes in a sync and an async variant. `async` functions get
 * the async variant when they are wrapped. Functions without the keyword get
 * the sync variant, which follows the configured store and finishes any
 * promise they return on the async path.
 */

export type ExecutionMode = "sync" | "async";

/**
 * True for functions declared with `async`.
 */
export function isAsyncFunction(fn: (...args: never) => unknown): boolean {
  return Object.prototype.toString.call(fn) === "[object AsyncFunction]";
}

/**
 * Pick the wrapper variant for a function.
 * `async` functions always get the async variant; `hint` lets plain functions
 * that return promises opt in.
 */
export function detectMode(
  fn: (...args: never) => unknown,
  hint?: ExecutionMode
): ExecutionMode {
  if (isAsyncFunction(fn)) return "async";
  return hint ?? "sync";
}

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
