/**
 * Tests for duration.ts
 */
import { describe, it, expect } from "vitest";
import { Duration, format, parse, toMs, toTtlMs } from "./duration";
import { KeyguardConfigError } from "./errors";

describe("Duration", () => {
  describe("constructors", () => {
    it("should store everything in milliseconds", () => {
      expect(Duration.millis(250).millis).toBe(250);
      expect(Duration.seconds(2).millis).toBe(2000);
      expect(Duration.minutes(5).millis).toBe(300_000);
      expect(Duration.hours(1).millis).toBe(3_600_000);
      expect(Duration.days(1).millis).toBe(86_400_000);
      expect(Duration.toSeconds(Duration.minutes(1))).toBe(60);
    });

    it("should recognise Duration values", () => {
      expect(Duration.isDuration(Duration.seconds(1))).toBe(true);
      expect(Duration.isDuration({ millis: 5 })).toBe(false);
      expect(Duration.isDuration("5s")).toBe(false);
    });
  });

  describe("parse()", () => {
    it("should parse single-unit shorthand", () => {
      expect(parse("300ms")?.millis).toBe(300);
      expect(parse("30s")?.millis).toBe(30_000);
      expect(parse("5m")?.millis).toBe(300_000);
      expect(parse("2h")?.millis).toBe(7_200_000);
      expect(parse("1d")?.millis).toBe(86_400_000);
    });

    it("should parse compound and fractional shorthand", () => {
      expect(parse("1h30m")?.millis).toBe(5_400_000);
      expect(parse("1m30s500ms")?.millis).toBe(90_500);
      expect(parse("1.5s")?.millis).toBe(1500);
    });

    it("should return undefined for invalid input", () => {
      expect(parse("")).toBeUndefined();
      expect(parse("soon")).toBeUndefined();
      expect(parse("5")).toBeUndefined();
      expect(parse("5m later")).toBeUndefined();
      expect(parse("-5s")).toBeUndefined();
    });
  });

  describe("format()", () => {
    it("should format as compact shorthand", () => {
      expect(format(Duration.millis(5_400_000))).toBe("1h30m");
      expect(format(Duration.millis(250))).toBe("250ms");
      expect(format(Duration.millis(0))).toBe("0ms");
      expect(format(Duration.days(2))).toBe("2d");
    });
  });

  describe("toMs()", () => {
    it("should accept strings and Duration values", () => {
      expect(toMs("5m")).toBe(300_000);
      expect(toMs(Duration.seconds(3))).toBe(3000);
      expect(toMs("0s")).toBe(0);
    });

    it("should reject invalid strings", () => {
      expect(() => toMs("later")).toThrow(KeyguardConfigError);
      expect(() => toMs("later")).toThrow("KeyguardConfigError: invalid duration string: later");
    });

    it("should reject negative and non-finite values", () => {
      expect(() => toMs(Duration.millis(-1))).toThrow(
        "duration must be finite and non-negative, got -1ms"
      );
      expect(() => toMs(Duration.millis(Infinity))).toThrow(KeyguardConfigError);
      expect(() => toMs(Duration.millis(NaN))).toThrow(KeyguardConfigError);
    });
  });

  describe("toTtlMs()", () => {
    it("should reject a zero TTL", () => {
      expect(() => toTtlMs("0s", "cache ttl")).toThrow(
        "KeyguardConfigError: cache ttl must be greater than zero"
      );
      expect(toTtlMs("1s", "cache ttl")).toBe(1000);
    });

    it("should round fractional milliseconds up to a whole number", () => {
      expect(toTtlMs("1.5ms", "cache ttl")).toBe(2);
      expect(toTtlMs("0.2ms", "lock ttl")).toBe(1);
      expect(toTtlMs(Duration.seconds(0.0015), "lock ttl")).toBe(2);
      expect(toTtlMs("1.5s", "cache ttl")).toBe(1500);
    });
  });
});
