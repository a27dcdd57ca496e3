import { UnauthorizedException } from '@nestjs/common';

export type TokenFailureReason = 'INVALID_SIGNATURE' | 'EXPIRED' | 'MALFORMED';

const TOKEN_MESSAGES: Record<TokenFailureReason, string> = {
  INVALID_SIGNATURE: 'Invalid token signature',
  EXPIRED: 'Token expired',
  MALFORMED: 'Malformed token'
};

/** Token could not be verified. Surfaces as 401. */
export class InvalidTokenException extends UnauthorizedException {
  constructor(readonly reason: TokenFailureReason) {
    super(TOKEN_MESSAGES[reason]);
  }
}

export type CredentialsFailureReason = 'UNKNOWN_USER' | 'WRONG_PASSWORD';

/**
 * Login failed. The reason is kept for logs and tests; clients get the same
 * message for both cases.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor(readonly reason: CredentialsFailureReason) {
    super('Incorrect username or password');
  }
}
