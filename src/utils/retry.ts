/**
 * Retry with exponential backoff for calls into external stores
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 4000,
  multiplier: 2,
  timeoutMs: 30000,
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
  onLog?: (log: RetryLog) => void;
  // Errors for which this returns false are rethrown without further attempts
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const { onLog, shouldRetry = () => true } = options;
  let lastError: Error | null = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await withTimeout(fn, config.timeoutMs);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const retryable = shouldRetry(error);
      const willRetry = retryable && attempt < config.maxAttempts;

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: lastError.message,
        nextRetryInMs: willRetry ? lastDelay : undefined,
      });

      if (!retryable) {
        throw lastError;
      }
      if (!willRetry) {
        break;
      }

      await sleep(lastDelay);

      // Calculate next delay (exponential backoff)
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }

  throw new Error(
    `Failed after ${config.maxAttempts} attempts. Last error: ${lastError?.message}`,
    { cause: lastError }
  );
}

/**
 * Race a call against a timer, clearing the timer either way
 */
async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sleep utility function
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if an error is transient and worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  const code = error instanceof Error && 'code' in error ? String(error.code).toLowerCase() : '';

  // Retryable errors
  const retryablePatterns = [
    'timeout',
    'database is locked',
    'sqlite_busy',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern) || code.includes(pattern));
}
