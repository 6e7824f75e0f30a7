import type { AppConfig } from "../config";

export type BackoffStrategy = (attempt: number) => number;

export function fixedBackoff(delayMs: number): BackoffStrategy {
  return () => delayMs;
}

export function exponentialBackoff(baseMs: number, maxMs = 30_000): BackoffStrategy {
  return (attempt) => Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export interface RetryHooks {
  isRetryable?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoff: BackoffStrategy;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly backoff: BackoffStrategy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.backoff = options.backoff;
    this.sleep = options.sleep ?? sleep;
  }

  /** Runs `operation` until it resolves or the attempts run out. Never rejects. */
  async execute<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<RetryOutcome<T>> {
    let lastError: Error = new Error("operation was not attempted");

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        const value = await operation(attempt);
        return { ok: true, value, attempts: attempt };
      } catch (error) {
        lastError = toError(error);
        const retryable = hooks.isRetryable ? hooks.isRetryable(lastError) : true;
        if (!retryable || attempt >= this.maxAttempts) {
          return { ok: false, error: lastError, attempts: attempt };
        }

        const delayMs = this.backoff(attempt);
        hooks.onRetry?.(lastError, attempt, delayMs);
        await this.sleep(delayMs);
      }
    }

    return { ok: false, error: lastError, attempts: this.maxAttempts };
  }
}

export function createRetryPolicy(config: Pick<AppConfig, "maxExtractAttempts" | "retryBackoffMs" | "retryBackoffMode">): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: config.maxExtractAttempts,
    backoff:
      config.retryBackoffMode === "exponential"
        ? exponentialBackoff(config.retryBackoffMs)
        : fixedBackoff(config.retryBackoffMs),
  });
}
