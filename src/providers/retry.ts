/**
 * Retry Logic for Provider Operations
 *
 * Exponential backoff for transient backend failures. Never retries an
 * authentication failure, a malformed response, or a cancelled call.
 */

import { createLogger } from "../core/logger";
import type { BackendErrorKind, EngineId } from "../core/types";
import { BackendError, RetrievalCancelledError } from "../core/types";

const log = createLogger("Retry");

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Total attempts, including the first one */
  maxAttempts?: number;

  /** Initial delay between retries in milliseconds */
  initialDelayMs?: number;

  /** Multiplier for exponential backoff */
  backoffMultiplier?: number;

  /** Maximum delay between retries in milliseconds */
  maxDelayMs?: number;

  /** Error kinds worth another attempt */
  retryableErrors?: BackendErrorKind[];

  /** Stops retrying (and waiting) once aborted */
  signal?: AbortSignal;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, "signal">> = {
  maxAttempts: 1,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 5000,
  retryableErrors: ["timeout", "rate_limited", "unreachable"],
};

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetrievalCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RetrievalCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with retry logic and exponential backoff
 *
 * The first retry waits `initialDelayMs`; each later one multiplies the delay
 * by `backoffMultiplier`, capped at `maxDelayMs`.
 *
 * @throws the last error when attempts run out or the error is not retryable
 */
export async function withRetry<T>(
  engineId: EngineId,
  fn: () => Promise<T>,
  config: RetryConfig = {},
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelayMs = DEFAULT_RETRY_CONFIG.initialDelayMs,
    backoffMultiplier = DEFAULT_RETRY_CONFIG.backoffMultiplier,
    maxDelayMs = DEFAULT_RETRY_CONFIG.maxDelayMs,
    retryableErrors = DEFAULT_RETRY_CONFIG.retryableErrors,
    signal,
  } = config;

  let delay = Math.min(initialDelayMs, maxDelayMs);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof BackendError)) {
        throw error;
      }

      const shouldRetry = retryableErrors.includes(error.kind) && !signal?.aborted;
      if (!shouldRetry || attempt >= maxAttempts) {
        throw error;
      }

      log.warn(
        `[${engineId}] Attempt ${attempt}/${maxAttempts} failed (${error.kind}): ${error.message}. Retrying in ${delay}ms...`,
      );

      await sleep(delay, signal);
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}
