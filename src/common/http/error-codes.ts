/**
 * Machine-readable error codes returned in every error body.
 */
export const ERROR_CODES = {
  /** Missing, malformed or expired token, or bad credentials */
  UNAUTHENTICATED: 'UNAUTHENTICATED',

  /** Valid token, insufficient role */
  FORBIDDEN: 'FORBIDDEN',

  NOT_FOUND: 'NOT_FOUND',

  /** Unique constraint violated (e.g. username taken) */
  CONFLICT: 'CONFLICT',

  /** Request body, query or path parameter failed validation */
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  /** Any other 4xx (405, 413, 429, ...) */
  BAD_REQUEST: 'BAD_REQUEST',

  INTERNAL: 'INTERNAL'
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
