import { SetMetadata } from '@nestjs/common';
import type { Role } from '../enums/role.enum';

export const REQUIRED_ROLE_KEY = 'auth:requiredRole';

/**
 * Declares the role a handler (or every handler of a controller) needs.
 * Routes without it only need a valid token.
 *
 * Usage:
 *   @RequireRole(Role.ADMIN)
 */
export function RequireRole(role: Role) {
  return SetMetadata(REQUIRED_ROLE_KEY, role);
}
