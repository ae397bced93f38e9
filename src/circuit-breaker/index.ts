export class CircuitOpenError extends Error {
  constructor(serviceName: string, retryInMs: number) {
    super(`Circuit is OPEN for "${serviceName}" — skipping call, next probe in ${Math.ceil(retryInMs / 1000)}s`);
    this.name = 'CircuitOpenError';
  }
}

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  serviceName: string;
  /** Consecutive failures before tripping OPEN */
  failureThreshold: number;
  /** Milliseconds to wait in OPEN before probing (HALF_OPEN) */
  resetTimeoutMs: number;
  /** Consecutive successes in HALF_OPEN before returning to CLOSED */
  successThreshold: number;
  /** Millisecond clock, defaults to Date.now */
  now?: () => number;
}

/**
 * Guards one external service (quote API, Slack). A scheduled fire that hits
 * an OPEN circuit fails fast and the cycle is skipped like any other fetch or
 * publish failure.
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private openedAt = 0;
  private readonly now: () => number;

  constructor(private readonly config: CircuitBreakerConfig) {
    this.now = config.now ?? Date.now;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = this.now() - this.openedAt;
      if (elapsed < this.config.resetTimeoutMs) {
        throw new CircuitOpenError(this.config.serviceName, this.config.resetTimeoutMs - elapsed);
      }
      this.transition('HALF_OPEN');
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  private recordSuccess(): void {
    this.failureCount = 0;
    if (this.state !== 'HALF_OPEN') return;

    this.successCount++;
    if (this.successCount >= this.config.successThreshold) {
      this.transition('CLOSED');
    }
  }

  private recordFailure(): void {
    if (this.state === 'HALF_OPEN') {
      this.trip();
      return;
    }

    this.failureCount++;
    if (this.failureCount >= this.config.failureThreshold) {
      this.trip();
    }
  }

  private trip(): void {
    this.openedAt = this.now();
    this.transition('OPEN');
  }

  private transition(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.successCount = 0;
    if (next !== 'OPEN') this.failureCount = 0;
    console.log(`[CircuitBreaker] ${this.config.serviceName}: ${previous} → ${next}`);
  }
}
