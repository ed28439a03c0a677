/**
 * keyguard/testing
 *
 * @example
 * ```typescript
 * import { createEventRecorder, createFaultyAsyncStore } from 'keyguard/testing';
 *
 * const store = createFaultyAsyncStore(redis({ client }));
 * store.faults.fail('get');
 * ```
 */
export {
  createTestClock,
  createEventRecorder,
  createFaultySyncStore,
  createFaultyAsyncStore,
  type EventRecorder,
  type FaultControl,
} from "./testing";
