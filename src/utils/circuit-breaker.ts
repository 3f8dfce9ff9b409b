export interface CircuitBreakerOptions {
  /** Number of most recent attempts considered. */
  window: number;
  /** Attempts required before the breaker may trip. */
  minSamples: number;
  /** Failure rate in [0, 1] that must be exceeded to trip. */
  threshold: number;
  name: string;
}

export interface CircuitBreakerState {
  state: 'CLOSED' | 'OPEN';
  samples: number;
  failures: number;
  failureRate: number;
}

/**
 * Failure-rate breaker over a sliding window of attempts. Once open it stays open;
 * the owner decides what tripping means (for a crawl job, a terminal failure).
 */
export class CircuitBreaker {
  private readonly outcomes: boolean[] = [];
  private state: 'CLOSED' | 'OPEN' = 'CLOSED';

  constructor(private readonly options: CircuitBreakerOptions) {}

  /** Records one attempt and returns true when this attempt opened the circuit. */
  record(success: boolean): boolean {
    this.outcomes.push(success);
    if (this.outcomes.length > this.options.window) {
      this.outcomes.shift();
    }

    if (this.state === 'OPEN') {
      return false;
    }

    const { samples, failureRate } = this.getState();
    if (samples >= Math.min(this.options.minSamples, this.options.window) && failureRate > this.options.threshold) {
      this.state = 'OPEN';
      return true;
    }
    return false;
  }

  isOpen(): boolean {
    return this.state === 'OPEN';
  }

  getState(): CircuitBreakerState {
    const samples = this.outcomes.length;
    const failures = this.outcomes.filter((success) => !success).length;
    return {
      state: this.state,
      samples,
      failures,
      failureRate: samples === 0 ? 0 : failures / samples,
    };
  }
}
