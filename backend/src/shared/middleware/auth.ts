import type { Request } from 'express';
import { anonymousCaller, type SessionCapable, type User } from '@shared/db/entities/User.js';
import { getServices } from '@shared/services/index.js';
import { asyncHandler, Errors } from './errorHandler.js';

/**
 * Authentication middleware
 * Resolves the access token to an identity and records its last activity
 */

declare global {
  namespace Express {
    interface Request {
      /** Set by requireAuth, and by optionalAuth when a valid token is present */
      identity?: User;
      caller?: SessionCapable;
    }
  }
}

export const ACCESS_TOKEN_COOKIE = 'accessToken';

/**
 * Bearer header first, then the session cookie
 */
export function extractToken(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.substring(7);
  }
  const fromCookie: unknown = req.cookies?.[ACCESS_TOKEN_COOKIE];
  return typeof fromCookie === 'string' && fromCookie.length > 0 ? fromCookie : undefined;
}

async function resolveIdentity(token: string): Promise<User | null> {
  const { credentials, identity } = getServices();
  const subjectId = credentials.verifyAccessToken(token);
  if (subjectId === null) return null;
  return identity.findById(subjectId);
}

async function attach(req: Request, user: User): Promise<void> {
  await getServices().identity.touchLastSeen(user);
  req.identity = user;
  req.caller = user;
}

export const requireAuth = asyncHandler(async (req, _res, next) => {
  const token = extractToken(req);
  if (!token) {
    throw Errors.unauthorized('No token provided');
  }

  const user = await resolveIdentity(token);
  if (!user) {
    throw Errors.unauthorized('Invalid or expired token');
  }

  await attach(req, user);
  next();
});

/**
 * Attaches the identity when a valid token is present; anonymous otherwise
 */
export const optionalAuth = asyncHandler(async (req, _res, next) => {
  req.caller = anonymousCaller;
  const token = extractToken(req);
  const user = token ? await resolveIdentity(token) : null;
  if (user) {
    await attach(req, user);
  }
  next();
});

/**
 * The authenticated identity. Only valid behind requireAuth.
 */
export function currentIdentity(req: Request): User {
  if (!req.identity) {
    throw Errors.unauthorized();
  }
  return req.identity;
}
