/**
 * packages/core/src/errors.ts: Error type shared by every ls-live package.
 *
 * Aggregation failures are never raised: they surface as -1 sentinels on the
 * entry. Everything that does throw carries one of the codes below.
 */

export type LsLiveErrorCode =
  | "LSL_INVALID_CONFIG"
  | "LSL_INVALID_ARGUMENT"
  | "LSL_SESSION_CLOSED"
  | "LSL_ENUMERATION_FAILED";

/**
 * Error class for configuration, usage and lifecycle violations.
 * The `code` property identifies the specific violation.
 */
export class LsLiveError extends Error {
  override readonly name = "LsLiveError";
  readonly code: LsLiveErrorCode;

  constructor(code: LsLiveErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LsLiveError);
    }
  }
}

export function isLsLiveError(value: unknown, code?: LsLiveErrorCode): value is LsLiveError {
  if (!(value instanceof LsLiveError)) return false;
  return code === undefined || value.code === code;
}
