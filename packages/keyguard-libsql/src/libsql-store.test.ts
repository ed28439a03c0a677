import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import { createKeyguard, KeyguardConfigError } from "keyguard";
import { libsql, type LibSqlStore } from "./index";

const DB_PATH = "./.tmp-keyguard-libsql-test.db";

describe("libsql store", () => {
  let store: LibSqlStore;

  beforeEach(async () => {
    await fs.rm(DB_PATH, { force: true });
    store = libsql({ url: `file:${DB_PATH}` });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await store.close();
    await fs.rm(DB_PATH, { force: true });
  });

  it("returns null for missing keys", async () => {
    expect(await store.get("missing")).toBeNull();
  });

  it("stores, overwrites and deletes values", async () => {
    await store.set("k", "1");
    await store.set("k", "2");
    expect(await store.get("k")).toBe("2");
    await store.delete("k");
    expect(await store.get("k")).toBeNull();
    await expect(store.delete("k")).resolves.toBeUndefined();
  });

  it("expires values after their TTL", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));

    await store.set("ttl-key", "short-lived", 1000);
    expect(await store.get("ttl-key")).toBe("short-lived");

    vi.setSystemTime(new Date("2026-01-01T00:00:00.999Z"));
    expect(await store.get("ttl-key")).toBe("short-lived");

    vi.setSystemTime(new Date("2026-01-01T00:00:01Z"));
    expect(await store.get("ttl-key")).toBeNull();
  });

  it("stores epoch milliseconds in expires_at", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));

    await store.set("k", "v", 5000);
    await store.set("forever", "v");

    const result = await store.client.execute(
      "SELECT key, expires_at FROM keyguard_cache ORDER BY key"
    );
    expect(result.rows.map((row) => [row.key, row.expires_at])).toEqual([
      ["forever", null],
      ["k", Date.UTC(2026, 0, 1, 0, 0, 5)],
    ]);
  });

  describe("locks", () => {
    it("grants one lease at a time and verifies the owner on release", async () => {
      const lease = await store.tryAcquire("job", { ttlMs: 10_000 });
      expect(lease).not.toBeNull();
      expect(await store.tryAcquire("job", { ttlMs: 10_000 })).toBeNull();

      await store.release("job", "not-the-owner");
      expect(await store.isLocked("job")).toBe(true);

      await store.release("job", lease?.ownerToken ?? "");
      expect(await store.isLocked("job")).toBe(false);
    });

    it("keeps leases apart from cached values", async () => {
      await store.tryAcquire("job", { ttlMs: 10_000 });
      expect(await store.get("job")).toBeNull();
    });

    it("takes over an expired lease", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
      const first = await store.tryAcquire("job", { ttlMs: 1000 });

      vi.setSystemTime(new Date("2026-01-01T00:00:01Z"));
      expect(await store.isLocked("job")).toBe(false);
      const second = await store.tryAcquire("job", { ttlMs: 1000 });

      expect(second).not.toBeNull();
      expect(second?.ownerToken).not.toBe(first?.ownerToken);

      // The first holder's late release must not free the new lease.
      await store.release("job", first?.ownerToken ?? "");
      expect(await store.isLocked("job")).toBe(true);
    });
  });

  it("rejects unsafe table names", () => {
    expect(() => libsql({ url: `file:${DB_PATH}`, table: "cache-v2" })).toThrow(
      new KeyguardConfigError("invalid table name: cache-v2. Must be alphanumeric with underscores.")
    );
  });

  it("caches and guards through keyguard", async () => {
    const guard = createKeyguard({ store, prefix: "app:" });
    let computed = 0;
    const total = guard.cached("total-{a}-{b}", { params: ["a", "b"] }, async (a: number, b: number) => {
      computed++;
      return a + b;
    });

    expect(await total(1, 2)).toBe(3);
    expect(await total(1, 2)).toBe(3);
    expect(computed).toBe(1);
    expect(await store.get("app:total-1-2")).toBe("3");

    const job = guard.once("nightly", { onContended: "return", fallback: "skipped" }, async () => "done");
    await store.tryAcquire("app:nightly", { ttlMs: 10_000 });
    expect(await job()).toBe("skipped");
  });
});
