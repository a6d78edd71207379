import { Router } from 'express';
import { asyncHandler } from '@shared/middleware/errorHandler.js';
import { postCreateLimiter } from '@shared/middleware/rateLimiter.js';
import { requireAuth, currentIdentity } from '@shared/middleware/auth.js';
import { parseBody } from '@shared/middleware/validate.js';
import { createPostBodySchema } from '@shared/schemas/common.js';
import { getServices } from '@shared/services/index.js';
import { toPostDTO } from '@shared/services/dto.js';

const router = Router();

/**
 * POST /api/posts
 * 400 InvalidBody unless the trimmed body is 1 to 140 characters
 */
router.post('/api/posts', requireAuth, postCreateLimiter, asyncHandler(async (req, res) => {
  const { body } = parseBody(req, createPostBodySchema);
  const post = await getServices().content.createPost(currentIdentity(req), body);
  res.status(201).json(toPostDTO(post));
}));

export default router;
