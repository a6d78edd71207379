/**
 * Rate Limiting Middleware
 * Throttles the API as a whole and the credential endpoints more tightly
 */

import type { Request } from 'express';
import rateLimit from 'express-rate-limit';

const isProduction = process.env.NODE_ENV === 'production';

/**
 * Session key of an authenticated caller, otherwise the client address.
 * Only resolves to a user behind requireAuth or optionalAuth.
 */
export function getClientIdentifier(req: Request): string {
  if (req.caller?.isAuthenticated) {
    return `user:${req.caller.sessionKey}`;
  }
  return `ip:${req.ip ?? req.socket.remoteAddress ?? 'unknown'}`;
}

function isAuthRequest(req: Request): boolean {
  return req.originalUrl.startsWith('/api/auth');
}

/**
 * General API rate limiter, mounted ahead of authentication
 * Production: 1000 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: isProduction ? 1000 : 100000,
  message: { error: 'RateLimited', message: 'Too many requests, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false,
  // Auth endpoints have their own limiters
  skip: isAuthRequest,
});

/**
 * Login and registration
 * Production: 20 failed attempts per 15 minutes per IP
 */
export const authLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: isProduction ? 20 : 100000,
  skipSuccessfulRequests: true,
  message: { error: 'RateLimited', message: 'Too many login attempts, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Password reset requests and token checks
 * 30 per hour per IP
 */
export const passwordResetLimiter = rateLimit({
  windowMs: 60 * 60 * 1000,
  max: isProduction ? 30 : 100000,
  message: { error: 'RateLimited', message: 'Too many password reset attempts, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Posting
 * 60 posts per 10 minutes per user
 */
export const postCreateLimiter = rateLimit({
  windowMs: 10 * 60 * 1000,
  max: isProduction ? 60 : 100000,
  message: { error: 'RateLimited', message: 'Too many posts, please slow down.' },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientIdentifier,
});
