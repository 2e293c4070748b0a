/**
 * Retry Utility with Exponential Backoff
 * 
 * Provides a centralized retry mechanism with exponential backoff for transient failures.
 * Supports configurable retry attempts, delays, jitter and retryable error detection.
 */

import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Draw the actual delay uniformly from [0, backoff] (default: false) */
  jitter?: boolean;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Default retry configuration
 */
const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable'>> = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
  jitter: false,
};

function getStatusCode(error: unknown): number | undefined {
  if (error && typeof error === 'object') {
    if ('response' in error) {
      const response = (error as { response?: { status?: number } }).response;
      if (response?.status) {
        return response.status;
      }
    }
    if ('statusCode' in error) {
      const status = (error as { statusCode?: number }).statusCode;
      if (typeof status === 'number') {
        return status;
      }
    }
  }
  return undefined;
}

/**
 * Default retryable error detection
 * Retries on transient errors: 429, 5xx, ECONNRESET, ETIMEDOUT, ECONNREFUSED, ECONNABORTED
 */
function defaultIsRetryable(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status !== undefined) {
    // Retry on rate limit (429) and server errors (5xx), never on other 4xx / 3xx
    return status === 429 || (status >= 500 && status < 600);
  }

  // Check for network error codes
  if (error && typeof error === 'object' && 'code' in error) {
    const code = (error as { code?: string }).code;
    if (
      code === 'ECONNRESET' ||
      code === 'ETIMEDOUT' ||
      code === 'ECONNREFUSED' ||
      code === 'ECONNABORTED'
    ) {
      return true;
    }
  }

  // Check for error messages
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('etimedout')
    ) {
      return true;
    }
  }

  // Check for axios errors without response (network errors)
  if (error && typeof error === 'object' && 'isAxiosError' in error) {
    const axiosError = error as { response?: unknown };
    if (!axiosError.response) {
      return true;
    }
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 * 
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Retry an operation with exponential backoff
 * 
 * @param operation - The operation to retry (async function)
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, URL)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    jitter = DEFAULT_RETRY_CONFIG.jitter,
    isRetryable = defaultIsRetryable,
  } = config;

  const contextStr = context ? ` (${context})` : '';

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();

      if (attempt > 0) {
        logger.info(
          { attempt: attempt + 1, maxAttempts: maxRetries + 1, context },
          `Operation succeeded after ${attempt} retry attempts${contextStr}`
        );
      }

      return result;
    } catch (error) {
      if (!isRetryable(error)) {
        logger.debug(
          {
            attempt: attempt + 1,
            maxAttempts: maxRetries + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Non-retryable error encountered${contextStr}`
        );
        throw error;
      }

      if (attempt >= maxRetries) {
        logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: maxRetries + 1,
            error: error instanceof Error ? error.message : String(error),
            context,
          },
          `Operation failed after ${maxRetries + 1} attempts${contextStr}`
        );
        throw error;
      }

      const backoff = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);
      const delay = jitter ? Math.floor(Math.random() * backoff) : backoff;

      logger.warn(
        {
          attempt: attempt + 1,
          maxAttempts: maxRetries + 1,
          delay,
          error: error instanceof Error ? error.message : String(error),
          context,
        },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${maxRetries + 1})`
      );

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

/**
 * Check if an error is retryable using default logic
 */
export function isRetryableError(error: unknown): boolean {
  return defaultIsRetryable(error);
}
