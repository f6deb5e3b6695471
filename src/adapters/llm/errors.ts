/**
 * Error types for external-model adapter failures
 */

/**
 * Upstream timeout error - thrown when the model call times out or is
 * cancelled by the caller.
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly timeoutPhase: "pre_aborted" | "body",
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
 * Upstream HTTP error - thrown when the provider returns a non-2xx status
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

/**
 * The reply arrived but could not be turned into the expected shape.
 */
export class ModelReplyParseError extends Error {
  readonly name = "ModelReplyParseError";

  constructor(
    message: string,
    public readonly stage: "extract" | "schema",
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelReplyParseError);
    }
  }
}
