/**
 * Timestamp values and their wire encodings.
 *
 * A timestamp is either a `Date` (millisecond precision) or a `bigint` holding
 * nanoseconds since the Unix epoch, for clocks built on `process.hrtime.bigint()`.
 */

export type Timestamp = Date | bigint;

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

/** Largest distance from the epoch a `Date` can represent, in nanoseconds */
const MAX_EPOCH_NANOS = 8_640_000_000_000_000n * NANOS_PER_MILLI;

/**
 * True when the timestamp can be encoded. An invalid `Date` cannot, and
 * neither can a bigint outside the `Date` range.
 */
export function isValidTimestamp(t: Timestamp): boolean {
  if (typeof t === 'bigint') {
    return t >= -MAX_EPOCH_NANOS && t <= MAX_EPOCH_NANOS;
  }
  return !Number.isNaN(t.getTime());
}

/** Milliseconds since the epoch, floored */
export function epochMillis(t: Timestamp): number {
  if (typeof t !== 'bigint') {
    return t.getTime();
  }
  return Number(floorDiv(t, NANOS_PER_MILLI));
}

/** Nanoseconds since the epoch */
export function epochNanos(t: Timestamp): bigint {
  if (typeof t === 'bigint') {
    return t;
  }
  return BigInt(t.getTime()) * NANOS_PER_MILLI;
}

/**
 * RFC 3339 in UTC with up to nine fractional digits, trailing zeros removed:
 * `2025-01-01T00:00:00Z`, `2024-12-31T23:59:59.123456789Z`.
 *
 * @throws {RangeError} for a timestamp `Date` cannot hold; check {@link isValidTimestamp} first
 */
export function formatRFC3339Nano(t: Timestamp): string {
  if (typeof t !== 'bigint') {
    const iso = t.toISOString();
    const dot = iso.lastIndexOf('.');
    const millis = iso.slice(dot + 1, iso.length - 1).replace(/0+$/, '');
    return millis.length > 0 ? `${iso.slice(0, dot)}.${millis}Z` : `${iso.slice(0, dot)}Z`;
  }

  const seconds = floorDiv(t, NANOS_PER_SECOND);
  const nanos = t - seconds * NANOS_PER_SECOND;
  const base = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  if (nanos === 0n) {
    return `${base}Z`;
  }
  const digits = nanos.toString().padStart(9, '0').replace(/0+$/, '');
  return `${base}.${digits}Z`;
}

function floorDiv(value: bigint, divisor: bigint): bigint {
  const quotient = value / divisor;
  return value < 0n && quotient * divisor !== value ? quotient - 1n : quotient;
}
