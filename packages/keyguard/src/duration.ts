/**
 * keyguard/duration
 *
 * Type-safe time durations for cache and lock TTLs.
 *
 * @example
 * ```typescript
 * import { Duration, toMs } from 'keyguard/duration';
 *
 * toMs(Duration.minutes(5)); // 300000
 * toMs('1h30m'); // 5400000
 * ```
 */

import { KeyguardConfigError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * A span of time, always stored in milliseconds.
 */
export interface Duration {
  readonly _tag: "Duration";
  readonly millis: number;
}

/**
 * Duration input type - supports Duration objects or string shorthand
 * such as "300ms", "30s", "5m", "1h", "2d" or "1h30m".
 */
export type DurationInput = Duration | string;

// =============================================================================
// Constructors
// =============================================================================

const MS_PER_UNIT = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
} as const;

type Unit = keyof typeof MS_PER_UNIT;

function isUnit(value: string): value is Unit {
  return Object.prototype.hasOwnProperty.call(MS_PER_UNIT, value);
}

export function millis(ms: number): Duration {
  return { _tag: "Duration", millis: ms };
}

export function seconds(s: number): Duration {
  return millis(s * MS_PER_UNIT.s);
}

export function minutes(m: number): Duration {
  return millis(m * MS_PER_UNIT.m);
}

export function hours(h: number): Duration {
  return millis(h * MS_PER_UNIT.h);
}

export function days(d: number): Duration {
  return millis(d * MS_PER_UNIT.d);
}

// =============================================================================
// Conversions
// =============================================================================

export function toMillis(duration: Duration): number {
  return duration.millis;
}

export function toSeconds(duration: Duration): number {
  return duration.millis / MS_PER_UNIT.s;
}

export function isDuration(value: unknown): value is Duration {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Duration" &&
    "millis" in value &&
    typeof value.millis === "number"
  );
}

const SHORTHAND = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)/;

/**
 * Parse string shorthand into a Duration.
 * Returns undefined when the string is not valid shorthand.
 *
 * @example
 * ```typescript
 * parse('5m');     // { _tag: 'Duration', millis: 300000 }
 * parse('1h30m');  // { _tag: 'Duration', millis: 5400000 }
 * parse('soon');   // undefined
 * ```
 */
export function parse(input: string): Duration | undefined {
  let rest = input.trim();
  if (rest.length === 0) return undefined;

  let total = 0;
  while (rest.length > 0) {
    const match = SHORTHAND.exec(rest);
    if (!match) return undefined;
    const [whole, amount, unit] = match;
    if (!isUnit(unit)) return undefined;
    total += Number(amount) * MS_PER_UNIT[unit];
    rest = rest.slice(whole.length);
  }
  return millis(total);
}

/**
 * Format a Duration as compact shorthand ("1h30m", "250ms").
 */
export function format(duration: Duration): string {
  let remaining = Math.round(duration.millis);
  if (remaining === 0) return "0ms";

  const parts: string[] = [];
  for (const unit of ["d", "h", "m", "s", "ms"] as const) {
    const size = MS_PER_UNIT[unit];
    const count = Math.floor(remaining / size);
    if (count > 0) {
      parts.push(`${count}${unit}`);
      remaining -= count * size;
    }
  }
  return parts.join("");
}

/**
 * Convert DurationInput to milliseconds.
 * Throws when the input is not a valid, finite, non-negative duration.
 */
export function toMs(input: DurationInput): number {
  const duration = typeof input === "string" ? parse(input) : input;
  if (!duration) {
    throw new KeyguardConfigError(`invalid duration string: ${String(input)}`);
  }
  if (!Number.isFinite(duration.millis) || duration.millis < 0) {
    throw new KeyguardConfigError(
      `duration must be finite and non-negative, got ${duration.millis}ms`
    );
  }
  return duration.millis;
}

/**
 * Convert a TTL to whole milliseconds, rejecting zero.
 * Fractions round up: stores take integer expiries (Redis PX, bigint columns).
 */
export function toTtlMs(input: DurationInput, label: string): number {
  const ms = toMs(input);
  if (ms <= 0) {
    throw new KeyguardConfigError(`${label} must be greater than zero`);
  }
  return Math.ceil(ms);
}

// =============================================================================
// Namespace
// =============================================================================

export const Duration = {
  millis,
  seconds,
  minutes,
  hours,
  days,
  toMillis,
  toSeconds,
  isDuration,
  parse,
  format,
} as const;
