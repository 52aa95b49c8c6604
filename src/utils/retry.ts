import { emit, TelemetryEvents } from "./telemetry.js";

/**
 * Retry configuration options
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitterPercent: number;
}

/**
 * Default retry configuration
 * - 3 attempts total (1 initial + 2 retries)
 * - Exponential backoff: 250ms, 500ms, 1000ms (with jitter)
 * - ±20% jitter to prevent thundering herd
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

const RETRYABLE_ERROR_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /socket hang up/i,
  /rate.?limit/i,
  /too many requests/i,
  /overloaded/i,
  /service unavailable/i,
  /temporarily unavailable/i,
];

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

function readStatus(error: object): number | undefined {
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  if (typeof error === "object") {
    const status = readStatus(error);
    if (status !== undefined) {
      return RETRYABLE_STATUS_CODES.has(status);
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  const jitterRange = (cappedDelay * config.jitterPercent) / 100;
  const jitter = Math.random() * jitterRange * 2 - jitterRange;

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with automatic retries
 *
 * @param fn Function to execute (should throw on error)
 * @param context Context for telemetry (provider, model, operation)
 * @throws Last error if all attempts fail or the error is not retryable
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  context: { provider: string; model: string; operation: string },
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error) || attempt >= config.maxAttempts) {
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, config);
      const errorMessage = error instanceof Error ? error.message : String(error);

      emit(TelemetryEvents.RetryAttempt, {
        provider: context.provider,
        model: context.model,
        operation: context.operation,
        attempt,
        max_attempts: config.maxAttempts,
        delay_ms: delay,
        reason: errorMessage.substring(0, 100),
      });

      await sleep(delay);
    }
  }

  throw lastError;
}
