/**
 * Tests for lock.ts - standalone lock
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createKeyguard } from "./keyguard";
import { createMemoryStore } from "./memory-store";
import { KeyguardConfigError, LockContentionError } from "./errors";
import { createEventRecorder } from "./testing";

function setup(prefix?: string) {
  const memory = createMemoryStore({ clock: () => Date.now() });
  const recorder = createEventRecorder();
  const guard = createKeyguard({ syncStore: memory, prefix, onEvent: recorder.handler });
  return { memory, recorder, guard };
}

describe("lock", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should hold the lock while the block runs", async () => {
    const { guard, recorder } = setup();
    const lock = guard.lock("job");

    const result = await lock.run(async () => {
      expect(await lock.isLocked()).toBe(true);
      return "ran";
    });

    expect(result).toBe("ran");
    expect(await lock.isLocked()).toBe(false);
    expect(recorder.types()).toEqual(["lock_acquired", "lock_released"]);
  });

  it("should accept synchronous blocks", async () => {
    const { guard } = setup();
    expect(await guard.lock("job").run(() => 42)).toBe(42);
  });

  it("should fail immediately when contended without wait", async () => {
    const { guard, memory } = setup();
    memory.tryAcquire("job", { ttlMs: 10_000 });
    const block = vi.fn();

    await expect(guard.lock("job").run(block)).rejects.toThrow("LockContentionError: job is locked");
    expect(block).not.toHaveBeenCalled();
  });

  it("should poll until the holder's lease runs out", async () => {
    const { guard, memory, recorder } = setup();
    memory.tryAcquire("job", { ttlMs: 250 });
    const lock = guard.lock("job", { wait: { timeout: "1s", interval: "100ms" } });

    const pending = lock.run(async () => "ran");
    await vi.advanceTimersByTimeAsync(300);

    expect(await pending).toBe("ran");
    expect(recorder.ofType("lock_wait").map((event) => [event.attempt, event.delayMs])).toEqual([
      [1, 100],
      [2, 100],
      [3, 100],
    ]);
  });

  it("should give up after the wait timeout", async () => {
    const { guard, memory } = setup();
    memory.tryAcquire("job", { ttlMs: 10_000 });
    const lock = guard.lock("job", { wait: { timeout: "300ms" } });
    const block = vi.fn();

    const pending = lock.run(block);
    const assertion = expect(pending).rejects.toThrow("LockContentionError: job is still locked after 300ms");
    await vi.advanceTimersByTimeAsync(300);
    await assertion;
    expect(block).not.toHaveBeenCalled();
  });

  it("should report the waited time on the error", async () => {
    const { guard, memory } = setup();
    memory.tryAcquire("job", { ttlMs: 10_000 });
    const pending = guard.lock("job", { wait: { timeout: "150ms", interval: "100ms" } }).run(() => 1);
    const caught = pending.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(150);
    const error = await caught;
    expect(error).toBeInstanceOf(LockContentionError);
    expect(error instanceof LockContentionError ? error.waitedMs : undefined).toBe(150);
  });

  it("should release when the block throws", async () => {
    const { guard } = setup();
    const lock = guard.lock("job");

    await expect(
      lock.run(async () => {
        throw new Error("block failed");
      })
    ).rejects.toThrow("block failed");
    expect(await lock.isLocked()).toBe(false);
  });

  it("should exclude a once wrapper on the same key", async () => {
    const { guard } = setup();
    const job = guard.once("job", { onContended: "return", fallback: "busy" }, async () => "ran");

    const inside = await guard.lock("job").run(async () => job());

    expect(inside).toBe("busy");
    expect(await job()).toBe("ran");
  });

  it("should prefix the key", () => {
    const { guard } = setup("app:");
    expect(guard.lock("job").key).toBe("app:job");
  });

  it("should reject invalid options", () => {
    const { guard } = setup();
    expect(() => guard.lock("")).toThrow(KeyguardConfigError);
    expect(() => guard.lock("job", { wait: { timeout: "50ms", interval: "100ms" } })).toThrow(
      "KeyguardConfigError: lock wait interval (100ms) is longer than its timeout (50ms)"
    );
    expect(() => guard.lock("job", { ttl: "0ms" })).toThrow(KeyguardConfigError);
  });
});
