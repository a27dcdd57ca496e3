import type { Role } from '../enums/role.enum';

/** Verified claims of an access token. Times are epoch seconds. */
export interface TokenClaims {
  readonly username: string;
  readonly role: Role;
  readonly issuedAt: number;
  readonly expiresAt: number;
}
