/**
 * Process-lifetime delivery counters shared by an engine and its children.
 * Reset only happens when asked for.
 */

export interface StatsSnapshot {
  /** Records lost to queue overflow, write failures or render faults */
  readonly loggedErrors: number;
  /** Records discarded by the overflow policy */
  readonly dropped: number;
}

export class DeliveryStats {
  private errors = 0;
  private drops = 0;

  recordError(): void {
    this.errors++;
  }

  recordDrop(): void {
    this.drops++;
    this.errors++;
  }

  snapshot(): StatsSnapshot {
    return { loggedErrors: this.errors, dropped: this.drops };
  }

  reset(): void {
    this.errors = 0;
    this.drops = 0;
  }
}
