import { ProviderUnavailableError, RateLimitError } from "../../domain/errors.js";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of each delay (0..1) that may be randomly shaved off. */
  jitter?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RetryAttempt {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 5,
  baseDelayMs: 4_000,
  maxDelayMs: 60_000,
} as const;

/**
 * Exponential backoff: the wait after failed attempt n is
 * min(maxDelayMs, baseDelayMs * 2^(n-1)), stretched to a rate limit's retry-after
 * hint within the same cap. Exhaustion raises ProviderUnavailableError.
 */
export class RetryPolicy {
  readonly maxAttempts: number;

  readonly baseDelayMs: number;

  readonly maxDelayMs: number;

  private readonly jitter: number;

  private readonly shouldRetry: (error: unknown) => boolean;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly random: () => number;

  constructor(options: Partial<RetryPolicyOptions> = {}) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts;
    const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
    const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
    this.maxAttempts = Math.max(1, Math.floor(maxAttempts));
    this.baseDelayMs = Math.max(0, baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, maxDelayMs);
    this.jitter = Math.min(Math.max(options.jitter ?? 0, 0), 1);
    this.shouldRetry = options.shouldRetry ?? (() => true);
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * 2 ** Math.max(0, attempt - 1);
    const capped = Math.min(this.maxDelayMs, exponential);
    if (this.jitter === 0) {
      return capped;
    }
    return Math.round(capped - capped * this.jitter * this.random());
  }

  delayAfter(attempt: number, error: unknown): number {
    const computed = this.delayFor(attempt);
    if (!(error instanceof RateLimitError) || error.retryAfterSeconds === null) {
      return computed;
    }
    return Math.min(this.maxDelayMs, Math.max(computed, error.retryAfterSeconds * 1000));
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    onRetry?: (info: RetryAttempt) => void,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error;
        if (!this.shouldRetry(error)) {
          throw error;
        }
        if (attempt === this.maxAttempts) {
          break;
        }
        const delayMs = this.delayAfter(attempt, error);
        onRetry?.({ attempt, delayMs, error });
        await this.sleep(delayMs);
      }
    }

    throw new ProviderUnavailableError(this.maxAttempts, lastError);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
