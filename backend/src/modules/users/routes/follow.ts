import { Router } from 'express';
import type { FollowResponse } from '@microblog/contracts';
import { asyncHandler, Errors } from '@shared/middleware/errorHandler.js';
import { requireAuth, currentIdentity } from '@shared/middleware/auth.js';
import { parseParams } from '@shared/middleware/validate.js';
import { usernameParamSchema } from '@shared/schemas/common.js';
import { getServices } from '@shared/services/index.js';
import { findUserOr404 } from './users.js';

const router = Router();

/**
 * POST /api/users/:username/follow
 * 404 for an unknown user, 400 SelfFollow for yourself
 */
router.post('/api/users/:username/follow', requireAuth, asyncHandler(async (req, res) => {
  const { username } = parseParams(req, usernameParamSchema);
  const me = currentIdentity(req);
  const target = await findUserOr404(username);
  if (target.id === me.id) {
    throw Errors.selfFollow('follow');
  }

  await getServices().graph.follow(me, target);
  const response: FollowResponse = { following: true, message: `You are following ${target.username}!` };
  res.json(response);
}));

/**
 * POST /api/users/:username/unfollow
 */
router.post('/api/users/:username/unfollow', requireAuth, asyncHandler(async (req, res) => {
  const { username } = parseParams(req, usernameParamSchema);
  const me = currentIdentity(req);
  const target = await findUserOr404(username);
  if (target.id === me.id) {
    throw Errors.selfFollow('unfollow');
  }

  await getServices().graph.unfollow(me, target);
  const response: FollowResponse = { following: false, message: `You are not following ${target.username}.` };
  res.json(response);
}));

export default router;
