/**
 * Run-level error-rate breaker. Opens once the failure ratio exceeds
 * `maxErrorRate` after `minAttempts`; the run then starts no further symbols.
 *
 * Unlike the per-symbol suspension kept on each watermark, this breaker lives
 * for one run only and never closes again on its own.
 */

export type BreakerState = 'CLOSED' | 'OPEN';

export interface ErrorRateBreakerOptions {
  /** Failure ratio in [0, 1] that must be exceeded to open. Default 0.5. */
  maxErrorRate?: number;
  /** Attempts required before the ratio is considered. Default 10. */
  minAttempts?: number;
  /** Called once when the breaker opens. */
  onTrip?: (info: ErrorRateBreakerInfo) => void;
}

export interface ErrorRateBreakerInfo {
  state: BreakerState;
  attempts: number;
  failures: number;
  errorRate: number;
}

export class ErrorRateBreaker {
  private state: BreakerState = 'CLOSED';
  private attempts = 0;
  private failures = 0;
  private readonly maxErrorRate: number;
  private readonly minAttempts: number;
  private readonly onTrip: ((info: ErrorRateBreakerInfo) => void) | null;

  constructor(options: ErrorRateBreakerOptions = {}) {
    this.maxErrorRate = Math.min(1, Math.max(0, options.maxErrorRate ?? 0.5));
    this.minAttempts = Math.max(1, Math.floor(options.minAttempts ?? 10));
    this.onTrip = options.onTrip ?? null;
  }

  get isOpen(): boolean {
    return this.state === 'OPEN';
  }

  getInfo(): ErrorRateBreakerInfo {
    return {
      state: this.state,
      attempts: this.attempts,
      failures: this.failures,
      errorRate: this.attempts > 0 ? this.failures / this.attempts : 0,
    };
  }

  recordSuccess(): void {
    this.attempts++;
  }

  recordFailure(): void {
    this.attempts++;
    this.failures++;
    if (this.state === 'OPEN' || this.attempts < this.minAttempts) return;
    if (this.failures / this.attempts > this.maxErrorRate) {
      this.state = 'OPEN';
      this.onTrip?.(this.getInfo());
    }
  }
}
