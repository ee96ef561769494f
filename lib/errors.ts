import type { InterpolationErrorCode } from '@/types';

/**
 * Typed failure raised by interpolators.
 * Callers branch on `code`; `details` carries the offending values for logging.
 */
export class InterpolationError extends Error {
  readonly code: InterpolationErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: InterpolationErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'InterpolationError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Narrow an unknown thrown value, optionally to a specific code
 */
export function isInterpolationError(
  error: unknown,
  code?: InterpolationErrorCode
): error is InterpolationError {
  if (!(error instanceof InterpolationError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
