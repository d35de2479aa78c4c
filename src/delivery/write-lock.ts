/**
 * Serializes writes to one engine's transports.
 *
 * A write starts only after the previous one settled. While nothing is in
 * flight a write runs immediately on the caller's stack, so synchronous
 * transports never pay for a promise.
 */

export type WriteTask = () => void | Promise<void>;

export type WriteOutcome = { readonly failed: false } | { readonly failed: true; readonly error: unknown };

/** Called exactly once per task */
export type WriteSettled = (outcome: WriteOutcome) => void;

const SUCCEEDED: WriteOutcome = Object.freeze({ failed: false });

export class WriteLock {
  private pending: Promise<void> | null = null;

  /**
   * @param onFault - receives errors thrown by a `settled` callback
   */
  constructor(private readonly onFault: (error: unknown) => void) {}

  get busy(): boolean {
    return this.pending !== null;
  }

  /**
   * Runs `task` once every earlier task settled.
   *
   * @returns undefined when the task ran and settled synchronously, otherwise
   * a promise that resolves after `settled` was called; it never rejects
   */
  run(task: WriteTask, settled: WriteSettled): Promise<void> | undefined {
    if (this.pending === null) {
      const inFlight = invoke(task, settled);
      return inFlight === undefined ? undefined : this.track(inFlight);
    }
    return this.track(this.pending.then(() => invoke(task, settled)));
  }

  /** Resolves once no write is in flight */
  async idle(): Promise<void> {
    while (this.pending !== null) {
      await this.pending;
    }
  }

  private track(inFlight: Promise<void>): Promise<void> {
    const tail: Promise<void> = inFlight.then(
      () => {
        if (this.pending === tail) {
          this.pending = null;
        }
      },
      (error: unknown) => {
        if (this.pending === tail) {
          this.pending = null;
        }
        this.onFault(error);
      }
    );
    this.pending = tail;
    return tail;
  }
}

function invoke(task: WriteTask, settled: WriteSettled): Promise<void> | undefined {
  let result: void | Promise<void>;
  try {
    result = task();
  } catch (error: unknown) {
    settled({ failed: true, error });
    return undefined;
  }
  if (result instanceof Promise) {
    return result.then(
      () => settled(SUCCEEDED),
      (error: unknown) => settled({ failed: true, error })
    );
  }
  settled(SUCCEEDED);
  return undefined;
}
