import { describe, it, expect, beforeEach, vi } from "vitest";
import RedisMock from "ioredis-mock";
import { createKeyguard, StoreUnavailableError } from "keyguard";
import { redis } from "./index";

describe("redis store", () => {
  const client = new RedisMock();
  let store: ReturnType<typeof redis>;

  beforeEach(async () => {
    await client.flushall();
    store = redis({ client });
  });

  it("returns null for missing keys", async () => {
    expect(await store.get("missing")).toBeNull();
  });

  it("stores and retrieves values", async () => {
    await store.set("user-1", '{"id":1}');
    expect(await store.get("user-1")).toBe('{"id":1}');
  });

  it("sets a millisecond expiry when a TTL is given", async () => {
    await store.set("ttl-key", "v", 5000);
    const pttl = await client.pttl("ttl-key");
    expect(pttl).toBeGreaterThan(0);
    expect(pttl).toBeLessThanOrEqual(5000);
  });

  it("keeps values without a TTL", async () => {
    await store.set("forever", "v");
    expect(await client.pttl("forever")).toBe(-1);
  });

  it("deletes keys and ignores missing ones", async () => {
    await store.set("k", "v");
    await store.delete("k");
    expect(await store.get("k")).toBeNull();
    await expect(store.delete("k")).resolves.toBeUndefined();
  });

  describe("locks", () => {
    it("grants one lease at a time", async () => {
      const lease = await store.tryAcquire("job", { ttlMs: 10_000 });
      expect(lease).not.toBeNull();
      expect(await store.tryAcquire("job", { ttlMs: 10_000 })).toBeNull();
      expect(await store.isLocked("job")).toBe(true);
    });

    it("stores leases under the lock prefix", async () => {
      const lease = await store.tryAcquire("job", { ttlMs: 10_000 });
      expect(await client.get("lock:job")).toBe(lease?.ownerToken);
      expect(await store.get("job")).toBeNull();
    });

    it("releases only with the owner token", async () => {
      const lease = await store.tryAcquire("job", { ttlMs: 10_000 });

      await store.release("job", "not-the-owner");
      expect(await store.isLocked("job")).toBe(true);

      await store.release("job", lease?.ownerToken ?? "");
      expect(await store.isLocked("job")).toBe(false);
    });

    it("honours a custom lock prefix", async () => {
      const custom = redis({ client, lockPrefix: "app:lease:" });
      await custom.tryAcquire("job", { ttlMs: 10_000 });
      expect(await client.exists("app:lease:job")).toBe(1);
    });
  });

  it("reports client failures as StoreUnavailableError", async () => {
    const failing = new RedisMock();
    vi.spyOn(failing, "get").mockRejectedValue(new Error("ECONNREFUSED"));
    const failingStore = redis({ client: failing });

    const error = await failingStore.get("k").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error instanceof StoreUnavailableError ? error.cause : undefined).toEqual(new Error("ECONNREFUSED"));
  });

  it("leaves a shared client open on close", async () => {
    const quit = vi.spyOn(client, "quit");
    await store.close();
    expect(quit).not.toHaveBeenCalled();
  });

  it("bounds retries on the clients it creates", () => {
    const created = redis("redis://localhost:6379");
    const tuned = redis({ url: "redis://localhost:6379", clientOptions: { maxRetriesPerRequest: 5 } });
    try {
      expect(created.client.options.maxRetriesPerRequest).toBe(1);
      expect(created.client.options.lazyConnect).toBe(true);
      expect(tuned.client.options.maxRetriesPerRequest).toBe(5);
    } finally {
      created.client.disconnect();
      tuned.client.disconnect();
    }
  });

  describe("with keyguard", () => {
    it("caches results and guards concurrent calls", async () => {
      const guard = createKeyguard({ store, prefix: "svc:" });
      let reads = 0;
      const readUser = guard.cached("user-{id}", { ttl: "1m", params: ["id"] }, async (id: number) => {
        reads++;
        return { id };
      });

      expect(await readUser(1)).toEqual({ id: 1 });
      expect(await readUser(1)).toEqual({ id: 1 });
      expect(reads).toBe(1);
      expect(await client.get("svc:user-1")).toBe('{"id":1}');

      await readUser.reset(1);
      expect(await client.get("svc:user-1")).toBeNull();
    });

    it("returns the fallback while another caller holds the lock", async () => {
      const guard = createKeyguard({ store });
      const update = guard.once("update-{id}", { params: ["id"], onContended: "return", fallback: "busy" }, async (id: number) => `updated ${id}`);

      await client.set("lock:update-1", "someone-else", "PX", 10_000);
      expect(await update(1)).toBe("busy");

      await client.del("lock:update-1");
      expect(await update(1)).toBe("updated 1");
      expect(await client.exists("lock:update-1")).toBe(0);
    });
  });
});
