/**
 * keyguard/errors entry point
 */
export {
  KeyResolutionError,
  StoreUnavailableError,
  StoreNotInitializedError,
  LockContentionError,
  KeyguardConfigError,
  // Union type
  type KeyguardError,
  type KeyResolutionReason,
  type StoreOperation,
  // Type guards
  isKeyResolutionError,
  isStoreUnavailableError,
  isStoreNotInitializedError,
  isLockContentionError,
  isKeyguardConfigError,
  isKeyguardError,
} from "./errors";
