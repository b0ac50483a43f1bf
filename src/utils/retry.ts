/**
 * Retry and Circuit Breaker patterns for calls to the video provider
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** 1 gives a fixed interval */
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  /** Errors for which this returns false are rethrown at once. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Executes a function with retry. Delays grow by `multiplier` up to `maxDelayMs`.
 * When attempts run out the last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { shouldRetry = () => true, onLog, sleep = defaultSleep } = options;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn(attempt);
      onLog?.({ timestamp: new Date(), attempt, delay: 0, success: true });
      return result;
    } catch (error) {
      const willRetry = attempt < config.maxAttempts && shouldRetry(error);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: willRetry ? lastDelay : undefined,
      });

      if (!willRetry) {
        throw error;
      }

      await sleep(lastDelay);
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitStats {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: Date | null;
}

/**
 * Thrown without calling through while the circuit is open
 */
export class CircuitOpenError extends Error {
  constructor(public readonly retryInMs: number) {
    super(`Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${retryInMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Circuit Breaker Pattern
 * Stops calling the provider after repeated failures until `resetTimeout` passes
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';

  /**
   * @param countsAsFailure - errors that trip the breaker; others pass through
   *   without affecting its state
   */
  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private countsAsFailure: (error: unknown) => boolean = () => true,
    private now: () => number = Date.now
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = this.now();
      const sinceFailure = now - (this.lastFailureTime ?? now);
      if (sinceFailure > this.resetTimeout) {
        this.state = 'half-open';
        this.successCount = 0;
      } else {
        throw new CircuitOpenError(this.resetTimeout - sinceFailure);
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          this.state = 'closed';
          this.failureCount = 0;
        }
      } else {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (this.countsAsFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime !== null ? new Date(this.lastFailureTime) : null,
    };
  }
}
