import type { Request } from 'express';
import type { TokenClaims } from './token-claims';

/**
 * Express request as seen after the global middleware and guards ran.
 * `user` is undefined for public routes and anonymous open reads.
 */
export type AuthenticatedRequest = Request & {
  requestId?: string;
  user?: TokenClaims;
};
