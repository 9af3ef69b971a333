/**
 * Error types raised by the fetch pipeline.
 *
 * "Nothing matched" is not an error: resolution and fetch return `null`
 * for a well-formed request that found no sprint.
 */

/**
 * Base error class for all delivery-metrics errors.
 *
 * `code` is a machine-readable identifier for programmatic handling.
 */
export class MetricsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MetricsError";
  }
}

/**
 * The caller supplied a contradictory or incomplete request, e.g. a
 * specific sprint id without a team. Raised before any tracker call.
 */
export class InvalidParametersError extends MetricsError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETERS");
    this.name = "InvalidParametersError";
  }
}

/**
 * A tracker call failed or returned a payload that does not match the
 * expected shape. The original failure is kept as `cause`.
 */
export class SourceUnavailableError extends MetricsError {
  constructor(message: string, cause?: unknown) {
    super(message, "SOURCE_UNAVAILABLE", cause === undefined ? undefined : { cause });
    this.name = "SourceUnavailableError";
  }
}

/** Extract a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
