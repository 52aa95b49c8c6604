/**
 * Shared error types for upstream (OpenAI) failures
 */

/**
 * Upstream timeout error - thrown when an API call is aborted by our timeout
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - thrown when the API returns a non-2xx status
 *
 * Captures the status, provider error code and request ID for
 * cross-referencing with provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}
