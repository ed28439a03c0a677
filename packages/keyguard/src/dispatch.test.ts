/**
 * Tests for dispatch.ts
 */
import { describe, it, expect } from "vitest";
import { detectMode, isAsyncFunction, isPromiseLike } from "./dispatch";

describe("dispatch", () => {
  it("should detect async functions", () => {
    expect(isAsyncFunction(async () => 1)).toBe(true);
    expect(isAsyncFunction(async function named() {})).toBe(true);
    expect(isAsyncFunction(() => 1)).toBe(false);
    expect(isAsyncFunction(() => Promise.resolve(1))).toBe(false);
  });

  it("should pick the async variant for async functions regardless of hint", () => {
    expect(detectMode(async () => 1)).toBe("async");
    expect(detectMode(async () => 1, "sync")).toBe("async");
  });

  it("should default plain functions to sync unless hinted", () => {
    expect(detectMode(() => 1)).toBe("sync");
    expect(detectMode(() => Promise.resolve(1), "async")).toBe("async");
  });

  it("should recognise thenables", () => {
    expect(isPromiseLike(Promise.resolve(1))).toBe(true);
    expect(isPromiseLike({ then: () => undefined })).toBe(true);
    expect(isPromiseLike({ then: 1 })).toBe(false);
    expect(isPromiseLike(null)).toBe(false);
    expect(isPromiseLike("then")).toBe(false);
  });
});
