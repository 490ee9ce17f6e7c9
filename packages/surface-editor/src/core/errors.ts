/** Error codes used by {@link SurfaceError} to classify misuse of a surface. */
export type SurfaceErrorCode = 'SURFACE_DESTROYED' | 'INVALID_POSITION';

/**
 * Structured error thrown when a surface or one of its collaborators is used incorrectly.
 *
 * Eligibility checks during context menu deployment never throw; this error is reserved
 * for calls that cannot be honored at all.
 *
 * @param code - Machine-readable error classification.
 * @param message - Human-readable description.
 * @param details - Optional payload with additional context.
 */
export class SurfaceError extends Error {
  readonly code: SurfaceErrorCode;
  readonly details?: unknown;

  constructor(code: SurfaceErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'SurfaceError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, SurfaceError.prototype);
  }
}

/**
 * Type guard that narrows an unknown value to {@link SurfaceError}.
 */
export function isSurfaceError(error: unknown): error is SurfaceError {
  return error instanceof SurfaceError;
}
