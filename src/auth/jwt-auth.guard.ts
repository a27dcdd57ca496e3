import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { JsonLogger } from '../logging/json-logger.service';
import { InvalidTokenException } from './auth.errors';
import { OPEN_READ_KEY } from './decorators/open-read.decorator';
import { IS_PUBLIC_KEY } from './decorators/public.decorator';
import type { AuthenticatedRequest } from './interfaces/authenticated-request';
import { TokenService } from './token.service';

// Registered as the first APP_GUARD. Verifies `Authorization: Bearer <token>`
// and attaches the claims to request.user for RolesGuard and the handlers.
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly tokens: TokenService,
    private readonly config: ConfigService,
    private readonly logger: JsonLogger
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass()
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractToken(request);

    if (!token) {
      if (this.allowsAnonymousRead(context)) {
        return true;
      }
      this.logger.warn('Missing JWT', { requestId: request.requestId });
      throw new UnauthorizedException('Authorization header missing or malformed');
    }

    try {
      request.user = await this.tokens.verify(token);
      return true;
    } catch (error) {
      if (error instanceof InvalidTokenException) {
        this.logger.warn('JWT validation failed', { requestId: request.requestId, reason: error.reason });
      }
      throw error;
    }
  }

  private allowsAnonymousRead(context: ExecutionContext): boolean {
    const openRead = this.reflector.getAllAndOverride<boolean | undefined>(OPEN_READ_KEY, [
      context.getHandler(),
      context.getClass()
    ]);
    return openRead === true && this.config.get<boolean>('PRODUCT_READS_PUBLIC') === true;
  }

  private extractToken(request: AuthenticatedRequest): string | undefined {
    const authHeader = request.headers['authorization'];
    if (!authHeader) return undefined;
    const [scheme, token, ...rest] = authHeader.trim().split(/\s+/);
    return scheme.toLowerCase() === 'bearer' && token && rest.length === 0 ? token : undefined;
  }
}
