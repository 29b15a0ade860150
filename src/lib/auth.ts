import type { MiddlewareHandler } from 'hono';
import { verify } from 'hono/jwt';
import { CartUser } from '../models/types.js';
import { ForbiddenError, TokenError, toErrorResponse, toErrorStatus } from './errors.js';

/**
 * Turns a credential into an authenticated user
 */
export interface Authenticator {
  resolveUser(credential: string): Promise<CartUser>;
}

export interface AuthVariables {
  user: CartUser;
}

export type AuthEnv = { Variables: AuthVariables };

/**
 * Strip the `ROLE_` prefix some issuers add and lower-case the rest
 */
export function normalizeRole(role: string): string {
  return role.replace(/^ROLE_/i, '').toLowerCase();
}

/**
 * HS256 bearer tokens: `sub` carries the user id, `role` the user's role
 */
export class JwtAuthenticator implements Authenticator {
  constructor(private readonly secret: string) {}

  async resolveUser(credential: string): Promise<CartUser> {
    let payload: Awaited<ReturnType<typeof verify>>;
    try {
      payload = await verify(credential, this.secret, 'HS256');
    } catch (error) {
      if (error instanceof Error && error.name === 'JwtTokenExpired') {
        throw new TokenError('Token has expired');
      }
      throw new TokenError('Invalid token');
    }

    const { sub, role } = payload;
    if (typeof sub !== 'string' || sub.trim().length === 0) {
      throw new TokenError('Token has no subject');
    }

    return {
      userId: sub,
      role: typeof role === 'string' ? normalizeRole(role) : '',
    };
  }
}

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : null;
}

/**
 * Resolve the bearer token on every request and expose the user as `c.get('user')`
 */
export function createAuthMiddleware(authenticator: Authenticator): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const token = extractBearerToken(c.req.header('Authorization'));
    if (!token) {
      const error = new TokenError('Authentication token required');
      return c.json(toErrorResponse(error), toErrorStatus(error));
    }

    try {
      c.set('user', await authenticator.resolveUser(token));
    } catch (error) {
      return c.json(toErrorResponse(error), toErrorStatus(error));
    }

    await next();
  };
}

export function requireRole(...roles: string[]): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const user = c.get('user');
    if (!roles.includes(user.role)) {
      const error = new ForbiddenError();
      return c.json(toErrorResponse(error), toErrorStatus(error));
    }
    await next();
  };
}
