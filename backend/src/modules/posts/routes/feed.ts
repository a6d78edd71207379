import { Router } from 'express';
import { asyncHandler } from '@shared/middleware/errorHandler.js';
import { requireAuth, currentIdentity } from '@shared/middleware/auth.js';
import { parseQuery } from '@shared/middleware/validate.js';
import { pageQuerySchema } from '@shared/schemas/common.js';
import { getServices } from '@shared/services/index.js';
import { toPageDTO, toPostDTO } from '@shared/services/dto.js';

const router = Router();

/**
 * GET /api/feed?page=
 * The caller's posts and those of everyone they follow.
 * Page size is the configured postsPerPage.
 */
router.get('/api/feed', requireAuth, asyncHandler(async (req, res) => {
  const { page } = parseQuery(req, pageQuerySchema);
  const result = await getServices().feed.feedFor(currentIdentity(req), page);
  res.json(toPageDTO(result, toPostDTO));
}));

/**
 * GET /api/explore?page=
 * Every post, newest first. Requires sign-in like the feed.
 */
router.get('/api/explore', requireAuth, asyncHandler(async (req, res) => {
  const { page } = parseQuery(req, pageQuerySchema);
  const result = await getServices().feed.explore(page);
  res.json(toPageDTO(result, toPostDTO));
}));

export default router;
