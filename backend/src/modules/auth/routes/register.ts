import { Router } from 'express';
import type { RegisterResponse } from '@microblog/contracts';
import { asyncHandler } from '@shared/middleware/errorHandler.js';
import { authLimiter } from '@shared/middleware/rateLimiter.js';
import { parseBody } from '@shared/middleware/validate.js';
import { registerBodySchema } from '@shared/schemas/common.js';
import { getServices } from '@shared/services/index.js';
import { toCurrentUserDTO } from '@shared/services/dto.js';

const router = Router();

/**
 * POST /api/auth/register
 * Create an identity. 409 when the username or email is taken.
 */
router.post('/api/auth/register', authLimiter, asyncHandler(async (req, res) => {
  const { username, email, password } = parseBody(req, registerBodySchema);
  const user = await getServices().identity.create(username, email, password);

  const response: RegisterResponse = { user: toCurrentUserDTO(user) };
  res.status(201).json(response);
}));

export default router;
