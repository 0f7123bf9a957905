/**
 * RPC Utilities
 *
 * Retry with backoff and timeouts for Solana RPC reads.
 * Transfers are never retried here: a resend could move funds twice.
 */

// ============================================================================
// Configuration
// ============================================================================

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

/** 30s for most RPC calls */
export const DEFAULT_TIMEOUT_MS = 30_000;

// ============================================================================
// Error Types
// ============================================================================

export class RpcError extends Error {
  constructor(
    message: string,
    public readonly isTimeout: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RpcError';
  }
}

// ============================================================================
// Retry Logic
// ============================================================================

/**
 * Transient RPC/network failure worth another attempt
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof RpcError && error.isTimeout) {
    return true;
  }

  const message = error.message.toLowerCase();

  // Rate limit errors (429)
  if (message.includes('429') || message.includes('rate limit') || message.includes('too many requests')) {
    return true;
  }

  // Network errors
  if (message.includes('econnreset') || message.includes('enotfound') || message.includes('etimedout') || message.includes('fetch failed')) {
    return true;
  }

  // Server errors (5xx)
  return message.includes('503') || message.includes('502') || message.includes('500');
}

/**
 * Execute a function with exponential backoff retry
 * @param onRetry - Called before each wait
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs, backoffMultiplier } = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryableError(lastError) || attempt > maxRetries) {
        break;
      }

      const exponentialDelay = baseDelayMs * Math.pow(backoffMultiplier, attempt - 1);
      const jitter = Math.random() * 0.3 * exponentialDelay;
      const delayMs = Math.min(exponentialDelay + jitter, maxDelayMs);

      onRetry?.(attempt, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  if (lastError && !isRetryableError(lastError)) {
    throw lastError;
  }
  throw new RpcError(`Failed after ${maxRetries} retries: ${lastError?.message}`, false, { cause: lastError });
}

// ============================================================================
// Timeout Logic
// ============================================================================

export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new RpcError(`Operation timed out after ${timeoutMs}ms`, true));
    }, timeoutMs);

    fn()
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

export async function withRetryAndTimeout<T>(
  fn: () => Promise<T>,
  retryConfig: Partial<RetryConfig> = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
): Promise<T> {
  return withRetry(() => withTimeout(fn, timeoutMs), retryConfig, onRetry);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
