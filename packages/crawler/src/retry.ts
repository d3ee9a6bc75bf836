import { FetchError, errorMessage } from "./errors.js";
import { log } from "./logger.js";

/**
 * Determine if a fetch failure is transient and worth retrying.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof FetchError)) return false;
  switch (error.kind) {
    case "timeout":
    case "connection_refused":
    case "network":
      return true;
    case "http":
      return error.status === 429 || (error.status !== undefined && error.status >= 500);
    default:
      return false;
  }
}

/**
 * Retry a function with exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  baseDelayMs: number,
  label: string,
  shouldAbortFn?: () => boolean | Promise<boolean>
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Don't retry non-transient errors
      if (!isTransientError(error) || attempt === maxRetries) {
        throw error;
      }

      // Check if we should abort before retrying
      if (shouldAbortFn && (await shouldAbortFn())) {
        throw error;
      }

      const delay = baseDelayMs * Math.pow(2, attempt);
      log.warn(`Retrying ${label} (attempt ${attempt + 2}/${maxRetries + 1}) after ${delay}ms: ${errorMessage(error)}`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw lastError;
}
