import { CanActivate, ExecutionContext, ForbiddenException, Injectable, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { REQUIRED_ROLE_KEY } from './decorators/require-role.decorator';
import { authorize, Role } from './enums/role.enum';
import type { AuthenticatedRequest } from './interfaces/authenticated-request';

/**
 * Runs after JwtAuthGuard and applies the authorization gate to the role declared
 * with @RequireRole(). Routes without a declaration only need authentication.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<Role | undefined>(REQUIRED_ROLE_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    if (!required) {
      return true;
    }

    const { user } = context.switchToHttp().getRequest<AuthenticatedRequest>();

    // A role requirement never admits anonymous callers.
    if (!user) {
      throw new UnauthorizedException('Unauthorized');
    }

    if (authorize(user, required) === 'DENY') {
      throw new ForbiddenException(required === Role.ADMIN ? 'Admin privileges required' : 'Forbidden');
    }

    return true;
  }
}
