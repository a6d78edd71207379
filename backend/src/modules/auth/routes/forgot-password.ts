/**
 * Forgot Password Routes
 * Reset request by email, token check, and token-based password reset.
 * Reset tokens are signed and self-expiring; nothing is stored for them.
 */

import { Router } from 'express';
import type { MessageResponse, VerifyResetTokenResponse } from '@microblog/contracts';
import { asyncHandler, Errors } from '@shared/middleware/errorHandler.js';
import { passwordResetLimiter } from '@shared/middleware/rateLimiter.js';
import { parseBody, parseParams, parseQuery } from '@shared/middleware/validate.js';
import {
  emailBodySchema,
  resetPasswordBodySchema,
  tokenParamSchema,
  verifyTokenQuerySchema,
} from '@shared/schemas/common.js';
import { getServices } from '@shared/services/index.js';
import { sendPasswordResetEmail } from '@shared/services/email/index.js';
import { logger } from '@shared/utils/logger.js';

const router = Router();

const RESET_REQUESTED: MessageResponse = {
  message: 'Check your email for the instructions to reset your password',
};

/**
 * POST /api/auth/reset-password-request
 * Same response whether or not the address is registered
 */
router.post('/api/auth/reset-password-request', passwordResetLimiter, asyncHandler(async (req, res) => {
  const { email } = parseBody(req, emailBodySchema);
  const { identity, credentials, notifications, config } = getServices();

  const user = await identity.findByEmail(email);
  if (user) {
    sendPasswordResetEmail(notifications, {
      identity: user,
      token: credentials.issueResetToken(user),
      frontendUrl: config.frontendUrl,
      expiresInSeconds: config.resetTokenExpires,
    });
    logger.info(`Password reset requested for ${user.username} (${user.id})`);
  }

  res.json(RESET_REQUESTED);
}));

/**
 * GET /api/auth/verify-reset-token?token=
 */
router.get('/api/auth/verify-reset-token', passwordResetLimiter, asyncHandler(async (req, res) => {
  const { token } = parseQuery(req, verifyTokenQuerySchema);
  const user = await getServices().identity.resolveResetToken(token);

  const response: VerifyResetTokenResponse = { valid: user !== null };
  res.json(response);
}));

/**
 * POST /api/auth/reset-password/:token
 */
router.post('/api/auth/reset-password/:token', passwordResetLimiter, asyncHandler(async (req, res) => {
  const { token } = parseParams(req, tokenParamSchema);
  const { identity } = getServices();

  const user = await identity.resolveResetToken(token);
  if (!user) {
    throw Errors.tokenInvalid();
  }

  const { password } = parseBody(req, resetPasswordBodySchema);
  await identity.setPasswordFor(user, password);

  const response: MessageResponse = { message: 'Your password has been reset.' };
  res.json(response);
}));

export default router;
