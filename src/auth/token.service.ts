import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errors, JWTPayload, jwtVerify, SignJWT } from 'jose';
import { JsonLogger } from '../logging/json-logger.service';
import { InvalidTokenException } from './auth.errors';
import { isRole, Role } from './enums/role.enum';
import type { TokenClaims } from './interfaces/token-claims';

export interface IssuedToken {
  token: string;
  /** Epoch seconds. */
  expiresAt: number;
  /** Lifetime in seconds. */
  expiresIn: number;
}

const ALGORITHM = 'HS256';

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Issues and verifies HS256 access tokens carrying `sub` (username), `role`, `iat` and `exp`.
 * Stateless: nothing is stored, a token is valid while the signature matches and `now < exp`.
 */
@Injectable()
export class TokenService {
  private readonly secret: Uint8Array;
  private readonly ttlSeconds: number;

  constructor(private readonly config: ConfigService, private readonly logger: JsonLogger) {
    const secret = this.config.get<string>('JWT_SECRET');
    if (!secret) {
      // Env validation rejects this at startup; fail closed if it was bypassed.
      throw new Error('JWT_SECRET is not configured');
    }
    this.secret = new TextEncoder().encode(secret);
    this.ttlSeconds = Number(this.config.get<number>('JWT_TTL_MINUTES') ?? 60) * 60;
  }

  async issue(username: string, role: Role, issuedAt: Date = new Date()): Promise<IssuedToken> {
    const iat = toEpochSeconds(issuedAt);
    const exp = iat + this.ttlSeconds;

    const token = await new SignJWT({ role })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(username)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(this.secret);

    return { token, expiresAt: exp, expiresIn: this.ttlSeconds };
  }

  async verify(token: string, at: Date = new Date()): Promise<TokenClaims> {
    const payload = await this.decode(token, at);
    const { sub, iat, exp } = payload;
    const role: unknown = payload.role;

    if (!sub || !isRole(role) || typeof iat !== 'number' || typeof exp !== 'number') {
      throw new InvalidTokenException('MALFORMED');
    }

    return { username: sub, role, issuedAt: iat, expiresAt: exp };
  }

  // Maps jose failures onto the three token failure reasons; anything else propagates.
  private async decode(token: string, at: Date): Promise<JWTPayload> {
    try {
      const { payload } = await jwtVerify(token, this.secret, {
        algorithms: [ALGORITHM],
        currentDate: at,
        requiredClaims: ['sub', 'iat', 'exp']
      });
      return payload;
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        throw new InvalidTokenException('EXPIRED');
      }
      if (error instanceof errors.JWSSignatureVerificationFailed) {
        throw new InvalidTokenException('INVALID_SIGNATURE');
      }
      if (error instanceof errors.JOSEError) {
        this.logger.debug('Token rejected', { code: error.code });
        throw new InvalidTokenException('MALFORMED');
      }
      throw error;
    }
  }
}
