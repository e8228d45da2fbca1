import type { Logger } from "./logger";
import { nullLogger } from "./logger";

/** Sleep that can be interrupted; tests replace it to avoid real delays. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export interface RetryOptions {
  /** Decides whether a failure is worth another attempt. */
  shouldRetry: (err: unknown) => boolean;
  /** Called before the delay that precedes retry number `retry` (1-based). */
  onRetry?: (err: unknown, retry: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: Sleep;
  logger?: Logger;
  /** Label used in log lines. */
  label?: string;
}

/** Thrown when every attempt failed; the last failure is the cause. */
export class RetriesExhaustedError extends Error {
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`All ${attempts} attempts exhausted`, { cause });
    this.name = "RetriesExhaustedError";
    this.attempts = attempts;
  }
}

/**
 * Exponential backoff: the delay before retry n (1-based) is
 * `min(baseDelayMs * 2^(n-1), maxDelayMs)`.
 */
export class RetryPolicy {
  constructor(
    public readonly attempts: number,
    public readonly baseDelayMs: number,
    public readonly maxDelayMs: number
  ) {
    if (!Number.isInteger(attempts) || attempts < 1) {
      throw new RangeError("attempts must be a positive integer");
    }
    if (baseDelayMs < 0 || maxDelayMs < 0) {
      throw new RangeError("retry delays must not be negative");
    }
  }

  delayFor(retry: number): number {
    return Math.min(this.baseDelayMs * 2 ** (retry - 1), this.maxDelayMs);
  }

  /**
   * Run `operation` until it succeeds, a failure is not retryable, or the
   * attempts run out. A non-retryable failure is rethrown as is; running
   * out throws {@link RetriesExhaustedError}.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
  ): Promise<T> {
    const log = options.logger ?? nullLogger;
    const wait = options.sleep ?? sleep;
    const label = options.label ?? "operation";

    for (let attempt = 1; ; attempt++) {
      options.signal?.throwIfAborted();
      try {
        return await operation(attempt);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (options.signal?.aborted || !options.shouldRetry(err)) {
          throw err;
        }
        log.warn(`${label}: attempt #${attempt} failed: ${message}`);
        if (attempt >= this.attempts) {
          log.error(`${label}: all ${this.attempts} attempts exhausted`);
          throw new RetriesExhaustedError(attempt, err);
        }
        const delay = this.delayFor(attempt);
        options.onRetry?.(err, attempt, delay);
        log.debug(`${label}: retrying after delay ${delay}ms`);
        await wait(delay, options.signal);
      }
    }
  }
}
