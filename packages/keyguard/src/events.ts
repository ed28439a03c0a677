/**
 * Events emitted by keyguard wrappers.
 *
 * Pass `onEvent` to createKeyguard to forward them to metrics or tracing,
 * and `logger` to receive a line for every degraded path.
 */

import type { StoreOperation } from "./errors";

export type KeyguardEvent =
  | { type: "cache_hit"; key: string; ts: number }
  | { type: "cache_miss"; key: string; ts: number }
  | { type: "cache_set"; key: string; ts: number; ttlMs?: number }
  | { type: "cache_skip"; key: string; ts: number; reason: "undefined_result" }
  | { type: "cache_skip"; key: string; ts: number; reason: "unencodable_result"; error: unknown }
  | { type: "cache_reset"; key: string; ts: number }
  | { type: "cache_decode_error"; key: string; ts: number; error: unknown }
  | { type: "store_error"; key: string; ts: number; operation: StoreOperation; error: unknown; handled: boolean }
  | { type: "lock_acquired"; key: string; ts: number; ttlMs: number }
  | { type: "lock_contended"; key: string; ts: number }
  | { type: "lock_released"; key: string; ts: number; heldMs: number }
  | { type: "lock_release_failed"; key: string; ts: number; error: unknown }
  | { type: "lock_fail_open"; key: string; ts: number; error: unknown }
  | { type: "lock_wait"; key: string; ts: number; attempt: number; delayMs: number };

export type KeyguardEventType = KeyguardEvent["type"];

export type EventHandler = (event: KeyguardEvent) => void;

export type Logger = (message: string) => void;

/**
 * Sink used by the wrappers. Handler errors are reported to the logger and
 * never reach the wrapped call.
 */
export interface EventSink {
  emit(event: KeyguardEvent): void;
  log(message: string): void;
}

/**
 * Message text of an error for log lines.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createEventSink(onEvent?: EventHandler, logger: Logger = () => {}): EventSink {
  return {
    emit(event) {
      if (!onEvent) return;
      try {
        onEvent(event);
      } catch (error) {
        logger(`keyguard: onEvent handler failed for ${event.type}: ${describeError(error)}`);
      }
    },
    log: logger,
  };
}
