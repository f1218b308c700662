import { DEFAULT_RETRY } from './constants';
import { TransportError } from './errors';

export interface RetryPolicyOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  factor?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded retry with exponential backoff. Only retryable TransportErrors are
 * attempted again; anything else is rethrown straight away.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly factor: number;
  readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY.maxAttempts);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs;
    this.factor = options.factor ?? DEFAULT_RETRY.factor;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs;
    this.sleep = options.sleep ?? sleep;
  }

  static none(): RetryPolicy {
    return new RetryPolicy({ maxAttempts: 1 });
  }

  delayFor(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(this.factor, attempt));
  }

  shouldRetry(error: unknown): boolean {
    return error instanceof TransportError && error.retryable;
  }

  async run<T>(label: string, task: (attempt: number) => Promise<T>): Promise<T> {
    let attempt = 0;
    for (;;) {
      try {
        return await task(attempt);
      } catch (err) {
        if (!this.shouldRetry(err) || attempt + 1 >= this.maxAttempts) throw err;
        const delay = this.delayFor(attempt);
        const message = err instanceof Error ? err.message : String(err);
        console.warn(
          `Retrying ${label} in ${delay}ms (attempt ${attempt + 2}/${this.maxAttempts}):`,
          message
        );
        await this.sleep(delay);
        attempt++;
      }
    }
  }
}
