/**
 * Shared state handed to every wrapper by a Keyguard instance.
 * @internal
 */

import type { ExecutionMode } from "./dispatch";
import type { EventSink } from "./events";
import type { AsyncStore, SyncStore } from "./store";

export interface WrapperContext {
  /** Prepended to every resolved key */
  readonly prefix: string;
  /** Cache TTL when a wrapper gives none; undefined keeps entries until reset */
  readonly defaultTtlMs: number | undefined;
  /** Lock lease when a wrapper gives none */
  readonly defaultLockTtlMs: number;
  readonly events: EventSink;
  /** Store for async wrappers. Throws StoreNotInitializedError when missing. */
  asyncStore(): AsyncStore;
  /** Store for sync wrappers. Throws StoreNotInitializedError when missing. */
  syncStore(): SyncStore;
  /** "sync" when a sync store is set, "async" when only an async one is. */
  availableStore(): ExecutionMode | undefined;
}
