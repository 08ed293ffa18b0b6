/**
 * Fixed-delay retry executor.
 * Fully testable with dependency injection for delays.
 */

export interface RetryOptions {
  /** Total number of attempts, including the first one */
  attempts: number;
  /** Delay in ms between two attempts (none after the last) */
  delayMs: number;
  /** Callback for each failed attempt that will be retried */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: unknown; attempts: number };

export interface DelayProvider {
  delay(ms: number): Promise<void>;
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Mock delay provider for testing (instant delays).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}

/**
 * Execute an operation up to `attempts` times.
 *
 * @example
 * const result = await executeWithRetry(
 *   () => cache.write(key, value),
 *   { attempts: 3, delayMs: 5000 }
 * );
 * if (!result.success) {
 *   log.cache.error({ attempts: result.attempts }, "cache write failed");
 * }
 */
export async function executeWithRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  delayProvider: DelayProvider = new TimeoutDelayProvider()
): Promise<RetryResult<T>> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await operation();
      return { success: true, value, attempts: attempt };
    } catch (error) {
      lastError = error;

      if (attempt < attempts) {
        options.onRetry?.(attempt, error, options.delayMs);
        await delayProvider.delay(options.delayMs);
      }
    }
  }

  return { success: false, error: lastError, attempts };
}

