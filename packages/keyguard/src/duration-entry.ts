/**
 * keyguard/duration entry point
 */
export {
  Duration,
  type DurationInput,
  millis,
  seconds,
  minutes,
  hours,
  days,
  parse,
  format,
  toMs,
  toTtlMs,
} from "./duration";
