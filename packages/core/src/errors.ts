/**
 * packages/core/src/errors.ts — Error surface for arcflow.
 */

/**
 * Deterministic error codes for invalid configuration, plans and persisted state.
 * These are surfaced as RingError instances.
 */
export type RingErrorCode = "RING_INVALID_CONFIG" | "RING_INVALID_PLAN" | "RING_INVALID_STATE";

/**
 * Error class for all deterministic arcflow violations.
 * The `code` property identifies the specific violation.
 */
export class RingError extends Error {
  override readonly name = "RingError";
  readonly code: RingErrorCode;

  constructor(code: RingErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RingError);
    }
  }
}
