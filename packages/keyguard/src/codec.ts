/**
 * Serialization of cached values.
 */

export interface Codec<T> {
  encode(value: T): string;
  decode(raw: string): T;
}

/**
 * Default codec. Values round-trip through JSON, so Dates come back as
 * strings and class instances as plain objects; pass a custom codec when
 * that matters.
 */
export function jsonCodec<T>(): Codec<T> {
  return {
    encode: (value) => JSON.stringify(value),
    decode: (raw) => JSON.parse(raw),
  };
}
