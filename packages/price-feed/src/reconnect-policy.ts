export interface ReconnectPolicyOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

const DEFAULT_OPTIONS: ReconnectPolicyOptions = {
  initialDelayMs: 5000,
  maxDelayMs: 60000,
  factor: 2,
};

/**
 * Capped exponential backoff with an explicit attempt counter.
 * The counter only goes back to zero on `reset()`, which callers invoke
 * once a connection has actually opened.
 */
export class ReconnectPolicy {
  private readonly options: ReconnectPolicyOptions;
  private attempt = 0;

  constructor(options: Partial<ReconnectPolicyOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  nextDelay(): number {
    const { initialDelayMs, maxDelayMs, factor } = this.options;
    const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(factor, this.attempt));
    this.attempt++;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
  }

  getAttempts(): number {
    return this.attempt;
  }
}
