/**
 * Closed set of roles. Stored as-is in users.role and in the `role` token claim.
 */
export enum Role {
  ADMIN = 'admin',
  USER = 'user'
}

export const ROLES: readonly Role[] = [Role.ADMIN, Role.USER];

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export type AuthorizationDecision = 'ALLOW' | 'DENY';

function assertNever(value: never): never {
  throw new Error(`Unhandled role requirement: ${String(value)}`);
}

/**
 * Authorization gate. Any authenticated role meets a `user` requirement;
 * only `admin` meets an `admin` requirement.
 */
export function authorize(claims: { readonly role: Role }, required: Role): AuthorizationDecision {
  switch (required) {
    case Role.USER:
      return 'ALLOW';
    case Role.ADMIN:
      return claims.role === Role.ADMIN ? 'ALLOW' : 'DENY';
    default:
      return assertNever(required);
  }
}
