// Error types for terminal graphics

export type TermGraphicsErrorCode =
  | 'TERM_GRAPHICS_NOT_AVAILABLE'
  | 'NON_TTY'
  | 'TERM_RESPONSE_TIMED_OUT'
  | 'UNKNOWN_TERM_TYPE';

const ERROR_MESSAGES: Record<TermGraphicsErrorCode, string> = {
  TERM_GRAPHICS_NOT_AVAILABLE: 'term graphics not available',
  NON_TTY: 'non tty',
  TERM_RESPONSE_TIMED_OUT: 'term response timed out',
  UNKNOWN_TERM_TYPE: 'unknown term type',
};

/**
 * Error raised by protocol selection and capability detection.
 *
 * `NON_TTY` and `TERM_RESPONSE_TIMED_OUT` never leave an encoder's
 * `available()`; they are reported as "not available" there.
 */
export class TermGraphicsError extends Error {
  constructor(public readonly code: TermGraphicsErrorCode) {
    super(ERROR_MESSAGES[code]);
    this.name = 'TermGraphicsError';
  }
}

export function isTermGraphicsError(error: unknown, code?: TermGraphicsErrorCode): error is TermGraphicsError {
  return error instanceof TermGraphicsError && (code === undefined || error.code === code);
}

/**
 * Ensure a value is an Error instance.
 * Converts non-Error values to Error with String representation.
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
