/**
 * Duration values measured in nanoseconds.
 *
 * JavaScript has no native duration type, so elapsed times travel through the
 * pipeline as nanosecond counts. `Duration` wraps such a count so that opaque
 * (`any`) field values can still be recognised as durations by the renderers.
 *
 * @example
 * ```typescript
 * import { Duration, formatDuration } from 'emberlog';
 *
 * const boot = Duration.ms(125);
 * formatDuration(boot.nanoseconds); // "125ms"
 * formatDuration(Duration.seconds(3723.5).nanoseconds); // "1h2m3.5s"
 * ```
 */

export const Nanosecond = 1;
export const Microsecond = 1_000 * Nanosecond;
export const Millisecond = 1_000 * Microsecond;
export const Second = 1_000 * Millisecond;
export const Minute = 60 * Second;
export const Hour = 60 * Minute;

/**
 * Immutable elapsed time with nanosecond resolution
 */
export class Duration {
  readonly nanoseconds: number;

  constructor(nanoseconds: number) {
    this.nanoseconds = Math.trunc(nanoseconds);
  }

  static ns(value: number): Duration {
    return new Duration(value);
  }

  static us(value: number): Duration {
    return new Duration(value * Microsecond);
  }

  static ms(value: number): Duration {
    return new Duration(value * Millisecond);
  }

  static seconds(value: number): Duration {
    return new Duration(value * Second);
  }

  /** Elapsed time between two `performance.now()` readings */
  static between(startMs: number, endMs: number): Duration {
    return new Duration((endMs - startMs) * Millisecond);
  }

  /** Whole milliseconds, truncated toward zero */
  get milliseconds(): number {
    return Math.trunc(this.nanoseconds / Millisecond);
  }

  toString(): string {
    return formatDuration(this.nanoseconds);
  }
}

/**
 * Formats a nanosecond count as hours, minutes and fractional seconds, or as
 * a single sub-second unit:
 * `0s`, `12ns`, `1.5µs`, `250ms`, `3.2s`, `1h2m3.5s`.
 */
export function formatDuration(nanoseconds: number): string {
  if (!Number.isFinite(nanoseconds)) {
    return String(nanoseconds);
  }
  const ns = Math.trunc(nanoseconds);
  if (ns === 0) {
    return '0s';
  }

  const sign = ns < 0 ? '-' : '';
  const abs = Math.abs(ns);

  if (abs < Microsecond) {
    return `${sign}${abs}ns`;
  }
  if (abs < Millisecond) {
    return `${sign}${fraction(abs, 3)}µs`;
  }
  if (abs < Second) {
    return `${sign}${fraction(abs, 6)}ms`;
  }

  const hours = Math.floor(abs / Hour);
  const minutes = Math.floor((abs % Hour) / Minute);
  const seconds = fraction(abs % Minute, 9);

  if (hours > 0) {
    return `${sign}${hours}h${minutes}m${seconds}s`;
  }
  if (minutes > 0) {
    return `${sign}${minutes}m${seconds}s`;
  }
  return `${sign}${seconds}s`;
}

/** `value / 10^precision` printed with trailing fractional zeros removed */
function fraction(value: number, precision: number): string {
  const scale = 10 ** precision;
  const whole = Math.floor(value / scale);
  const rest = value % scale;
  if (rest === 0) {
    return String(whole);
  }
  const digits = String(rest).padStart(precision, '0').replace(/0+$/, '');
  return `${whole}.${digits}`;
}
