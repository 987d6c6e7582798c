import type { FastifyReply, FastifyRequest } from 'fastify';
import type { UserRole } from '../domain/user';
import { ApiError } from '../errors';
import type { AuthService, TokenClaims } from '../services/authService';

export type AuthUser = TokenClaims;

declare module 'fastify' {
  interface FastifyRequest {
    user: AuthUser | null;
  }
}

const BEARER_PREFIX = 'Bearer ';

export const createAuthMiddleware =
  (authService: AuthService) => async (request: FastifyRequest, _reply: FastifyReply) => {
    const authHeader = request.headers.authorization;
    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      throw new ApiError('unauthorized', 'Missing or invalid Authorization header');
    }

    const token = authHeader.slice(BEARER_PREFIX.length).trim();
    if (!token) {
      throw new ApiError('unauthorized', 'Missing or invalid Authorization header');
    }

    request.user = authService.verifyToken(token);
  };

/** Must run after the auth middleware. */
export const requireRole =
  (role: UserRole, message: string) => async (request: FastifyRequest, _reply: FastifyReply) => {
    const user = requireUser(request);
    if (user.role !== role) {
      throw new ApiError('forbidden', message);
    }
  };

export function requireUser(request: FastifyRequest): AuthUser {
  if (!request.user) {
    throw new ApiError('unauthorized', 'Missing or invalid Authorization header');
  }
  return request.user;
}
