import { isVersionCompareError } from "../errors";
import { logger } from "./logger";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors?: number[]; // Error codes to retry
  signal?: AbortSignal;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Execute a function with exponential backoff retry.
 * Stops early (rethrowing the last error) once `signal` is aborted.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  operationName: string = "operation"
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      const isRetryable = shouldRetry(error, cfg.retryableErrors);

      if (!isRetryable || attempt === cfg.maxAttempts || cfg.signal?.aborted) {
        logger.debug(`${operationName} failed after ${attempt} attempt(s)`, {
          attempt,
          maxAttempts: cfg.maxAttempts,
          retryable: isRetryable,
        });
        throw error;
      }

      logger.warn(`${operationName} failed, retrying in ${delay}ms`, {
        attempt,
        maxAttempts: cfg.maxAttempts,
        delay,
      }, error);

      await sleep(delay, cfg.signal);
      if (cfg.signal?.aborted) throw error;
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  // Unreachable: the loop either returns or throws on the last attempt
  throw lastError ?? new Error(`${operationName} failed`);
}

/**
 * Determine if an error should be retried.
 */
function shouldRetry(error: unknown, retryableCodes?: number[]): boolean {
  if (isVersionCompareError(error)) {
    if (error.isRetryable) return true;
    if (retryableCodes && retryableCodes.includes(error.code)) return true;
    return false;
  }

  // Generic error - retry on common transient patterns
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up") ||
      message.includes("network") ||
      message.includes("temporarily unavailable")
    );
  }

  return false;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Retry configuration presets.
 */
export const RetryPresets = {
  /** Quick retry for fast operations */
  quick: {
    maxAttempts: 2,
    initialDelayMs: 500,
    maxDelayMs: 2000,
    backoffMultiplier: 2,
  } satisfies RetryConfig,

  /** Object store reads */
  storage: {
    maxAttempts: 3,
    initialDelayMs: 250,
    maxDelayMs: 4000,
    backoffMultiplier: 2,
  } satisfies RetryConfig,

  /** Catalog listings */
  listing: {
    maxAttempts: 3,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
  } satisfies RetryConfig,
};
