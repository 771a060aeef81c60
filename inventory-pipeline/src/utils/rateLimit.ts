import { performance } from 'node:perf_hooks';

export type SleepFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const monotonicNow: ClockFn = () => performance.now();

/**
 * Spaces calls at least `minIntervalMs` apart, measured from the last
 * `markCall()`. No bursts, no token accounting.
 */
export class MinIntervalGate {
  private lastCallAt: number | null = null;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: ClockFn = monotonicNow,
    private readonly sleepFn: SleepFn = sleep
  ) {}

  /** Milliseconds still to wait before the next call is allowed. */
  remainingMs(): number {
    if (this.lastCallAt === null) return 0;
    const elapsed = this.now() - this.lastCallAt;
    return Math.max(0, this.minIntervalMs - elapsed);
  }

  async waitTurn(): Promise<void> {
    const waitMs = this.remainingMs();
    if (waitMs > 0) {
      await this.sleepFn(waitMs);
    }
  }

  markCall(): void {
    this.lastCallAt = this.now();
  }
}
