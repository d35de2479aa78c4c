/**
 * Write metrics observer.
 *
 * Called after every attempted write, successful or not. Installing anything
 * other than {@link NoopMetricsObserver} also turns on duration measurement,
 * which otherwise costs nothing on the hot path.
 */

export interface MetricsObserver {
  loggedMessage(level: number, durationMs: number, bytesWritten: number, error?: Error): void;
}

export class NoopMetricsObserver implements MetricsObserver {
  loggedMessage(): void {
    // nothing to record
  }
}

export function isNoopObserver(observer: MetricsObserver): boolean {
  return observer instanceof NoopMetricsObserver;
}

/**
 * Running totals per level, handy for health endpoints and tests
 */
export class CountingMetricsObserver implements MetricsObserver {
  private readonly perLevel = new Map<number, { count: number; bytes: number; errors: number; totalMs: number }>();

  loggedMessage(level: number, durationMs: number, bytesWritten: number, error?: Error): void {
    const entry = this.perLevel.get(level) ?? { count: 0, bytes: 0, errors: 0, totalMs: 0 };
    entry.count++;
    entry.bytes += bytesWritten;
    entry.totalMs += durationMs;
    if (error !== undefined) {
      entry.errors++;
    }
    this.perLevel.set(level, entry);
  }

  count(level: number): number {
    return this.perLevel.get(level)?.count ?? 0;
  }

  bytes(level: number): number {
    return this.perLevel.get(level)?.bytes ?? 0;
  }

  errors(level: number): number {
    return this.perLevel.get(level)?.errors ?? 0;
  }

  averageMs(level: number): number {
    const entry = this.perLevel.get(level);
    return entry && entry.count > 0 ? entry.totalMs / entry.count : 0;
  }
}
