// Backoff - Exponential reconnect delay with a floor and a cap

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  factor?: number;
}

export class Backoff {
  private options: Required<BackoffOptions>;
  private nextDelay: number;
  private failures = 0;

  constructor(options: BackoffOptions) {
    this.options = { factor: 2, ...options };
    this.nextDelay = options.initialDelayMs;
  }

  /** Delay the next call to `next()` will return. */
  get current(): number {
    return this.nextDelay;
  }

  get attempts(): number {
    return this.failures;
  }

  /** Returns the delay to wait now and grows the following one. */
  next(): number {
    const delay = this.nextDelay;
    this.failures++;
    this.nextDelay = Math.min(this.nextDelay * this.options.factor, this.options.maxDelayMs);
    return delay;
  }

  reset(): void {
    this.nextDelay = this.options.initialDelayMs;
    this.failures = 0;
  }
}
