import { Router, type CookieOptions } from 'express';
import type { LoginResponse } from '@microblog/contracts';
import { asyncHandler, Errors } from '@shared/middleware/errorHandler.js';
import { authLimiter } from '@shared/middleware/rateLimiter.js';
import { ACCESS_TOKEN_COOKIE } from '@shared/middleware/auth.js';
import { parseBody } from '@shared/middleware/validate.js';
import { loginBodySchema } from '@shared/schemas/common.js';
import { getServices } from '@shared/services/index.js';
import { toCurrentUserDTO } from '@shared/services/dto.js';
import { logger } from '@shared/utils/logger.js';

const router = Router();

export function sessionCookieOptions(production: boolean): CookieOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure: production,
    path: '/',
  };
}

/**
 * POST /api/auth/login
 * Verify username and password, issue an access token in the body and a cookie.
 * With rememberMe the cookie outlives the browser session.
 */
router.post('/api/auth/login', authLimiter, asyncHandler(async (req, res) => {
  const { username, password, rememberMe } = parseBody(req, loginBodySchema);
  const { identity, credentials, config } = getServices();

  const user = await identity.findByUsername(username);
  if (!user || !(await credentials.checkPassword(user, password))) {
    logger.info(`Failed login for "${username}"`);
    throw Errors.unauthorized('Invalid username or password');
  }

  const accessToken = credentials.issueAccessToken(user);
  const cookie = sessionCookieOptions(config.nodeEnv === 'production');
  res.cookie(
    ACCESS_TOKEN_COOKIE,
    accessToken,
    rememberMe ? { ...cookie, maxAge: credentials.accessTokenLifetime * 1000 } : cookie
  );

  const response: LoginResponse = {
    user: toCurrentUserDTO(user),
    accessToken,
    expiresIn: credentials.accessTokenLifetime,
  };
  res.json(response);
}));

export default router;
