/**
 * Tests for memory-store.ts
 */
import { describe, it, expect } from "vitest";
import { createMemoryStore } from "./memory-store";
import { toAsyncStore } from "./store";
import { createTestClock } from "./testing";

describe("createMemoryStore", () => {
  it("should return null for missing keys", () => {
    const store = createMemoryStore();
    expect(store.get("missing")).toBeNull();
  });

  it("should store and overwrite values", () => {
    const store = createMemoryStore();
    store.set("k", "1");
    store.set("k", "2");
    expect(store.get("k")).toBe("2");
    expect(store.size).toBe(1);
  });

  it("should expire values after their TTL", () => {
    const clock = createTestClock(1000);
    const store = createMemoryStore({ clock: clock.now });

    store.set("k", "v", 500);
    clock.advance(499);
    expect(store.get("k")).toBe("v");
    clock.advance(1);
    expect(store.get("k")).toBeNull();
    expect(store.size).toBe(0);
  });

  it("should keep values without a TTL", () => {
    const clock = createTestClock();
    const store = createMemoryStore({ clock: clock.now });

    store.set("k", "v");
    clock.advance(365 * 86_400_000);
    expect(store.get("k")).toBe("v");
  });

  it("should treat deleting a missing key as a no-op", () => {
    const store = createMemoryStore();
    expect(() => store.delete("missing")).not.toThrow();
  });

  describe("locks", () => {
    it("should grant a lease to one holder at a time", () => {
      let n = 0;
      const store = createMemoryStore({ createToken: () => `token-${++n}` });

      expect(store.tryAcquire("job", { ttlMs: 1000 })).toEqual({ ownerToken: "token-1" });
      expect(store.tryAcquire("job", { ttlMs: 1000 })).toBeNull();
      expect(store.isLocked("job")).toBe(true);
      expect(store.tryAcquire("other", { ttlMs: 1000 })).toEqual({ ownerToken: "token-2" });
    });

    it("should only release with the owner token", () => {
      const store = createMemoryStore({ createToken: () => "mine" });
      store.tryAcquire("job", { ttlMs: 1000 });

      store.release("job", "someone-else");
      expect(store.isLocked("job")).toBe(true);

      store.release("job", "mine");
      expect(store.isLocked("job")).toBe(false);
    });

    it("should reclaim an expired lease", () => {
      const clock = createTestClock();
      let n = 0;
      const store = createMemoryStore({ clock: clock.now, createToken: () => `t${++n}` });

      store.tryAcquire("job", { ttlMs: 100 });
      clock.advance(100);
      expect(store.isLocked("job")).toBe(false);
      expect(store.tryAcquire("job", { ttlMs: 100 })).toEqual({ ownerToken: "t2" });

      // the first holder's late release must not free the new lease
      store.release("job", "t1");
      expect(store.isLocked("job")).toBe(true);
    });

    it("should keep leases and values apart", () => {
      const store = createMemoryStore();
      store.set("k", "v");
      expect(store.isLocked("k")).toBe(false);
      store.tryAcquire("k", { ttlMs: 1000 });
      expect(store.get("k")).toBe("v");
    });
  });

  it("should clear everything on close", () => {
    const store = createMemoryStore();
    store.set("k", "v");
    store.tryAcquire("job", { ttlMs: 1000 });
    store.close();
    expect(store.get("k")).toBeNull();
    expect(store.isLocked("job")).toBe(false);
  });

  it("should work through the async contract", async () => {
    const store = toAsyncStore(createMemoryStore({ createToken: () => "t" }));

    await store.set("k", "v", 1000);
    expect(await store.get("k")).toBe("v");
    expect(await store.tryAcquire("job", { ttlMs: 1000 })).toEqual({ ownerToken: "t" });
    expect(await store.isLocked("job")).toBe(true);
    await store.release("job", "t");
    expect(await store.isLocked("job")).toBe(false);
  });
});
