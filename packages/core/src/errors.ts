export type AnimationErrorCode =
  | 'InvalidDuration'
  | 'UnknownEasingName'
  | 'UnsupportedProperty'
  | 'InvalidColor'
  | 'InvalidConfig';

/**
 * Error raised while building an animation (never while stepping one).
 * The `code` identifies the violation.
 */
export class AnimationError extends Error {
  override readonly name = 'AnimationError';
  readonly code: AnimationErrorCode;

  constructor(code: AnimationErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnimationError);
    }
  }
}

export function isAnimationError(
  err: unknown,
  code?: AnimationErrorCode
): err is AnimationError {
  if (!(err instanceof AnimationError)) return false;
  return code === undefined || err.code === code;
}

/** Durations are seconds; negative, NaN and infinite values are rejected. */
export function assertDuration(duration: number, operation: string): void {
  if (!Number.isFinite(duration) || duration < 0) {
    throw new AnimationError(
      'InvalidDuration',
      `${operation}: duration must be a finite number >= 0 (got ${duration})`
    );
  }
}
