import { Router } from 'express';
import type { Profile, UserList } from '@microblog/contracts';
import { asyncHandler, Errors } from '@shared/middleware/errorHandler.js';
import { requireAuth, optionalAuth, currentIdentity } from '@shared/middleware/auth.js';
import { parseBody, parseParams, parseQuery } from '@shared/middleware/validate.js';
import { pageQuerySchema, updateProfileBodySchema, usernameParamSchema } from '@shared/schemas/common.js';
import { getServices } from '@shared/services/index.js';
import { collect } from '@shared/services/store.js';
import { toAuthorDTO, toCurrentUserDTO, toPageDTO, toPostDTO, toUserDTO } from '@shared/services/dto.js';
import { anonymousCaller, type User } from '@shared/db/entities/User.js';

const router = Router();

export async function findUserOr404(username: string): Promise<User> {
  const user = await getServices().identity.findByUsername(username);
  if (!user) {
    throw Errors.identityNotFound(username);
  }
  return user;
}

/**
 * PATCH /api/users/me
 * Edit the caller's username and about-me
 */
router.patch('/api/users/me', requireAuth, asyncHandler(async (req, res) => {
  const changes = parseBody(req, updateProfileBodySchema);
  const updated = await getServices().identity.updateProfile(currentIdentity(req), changes);
  res.json(toCurrentUserDTO(updated));
}));

/**
 * GET /api/users/:username
 * Profile with follower counts and the user's posts, newest first
 */
router.get('/api/users/:username', optionalAuth, asyncHandler(async (req, res) => {
  const { username } = parseParams(req, usernameParamSchema);
  const { page } = parseQuery(req, pageQuerySchema);
  const { graph, content, config } = getServices();

  const user = await findUserOr404(username);
  const caller = req.caller ?? anonymousCaller;
  const viewer = caller.isAuthenticated ? currentIdentity(req) : null;

  const [followers, following, isFollowing, posts] = await Promise.all([
    graph.followerCount(user),
    graph.followedCount(user),
    viewer ? graph.isFollowing(viewer, user) : Promise.resolve(false),
    content.pageOfPostsBy(user, page, config.postsPerPage),
  ]);

  const profile: Profile = {
    ...toUserDTO(user),
    followers,
    following,
    isFollowing,
    isSelf: caller.sessionKey === String(user.id),
    posts: toPageDTO(posts, toPostDTO),
  };
  res.json(profile);
}));

/**
 * GET /api/users/:username/followers
 */
router.get('/api/users/:username/followers', asyncHandler(async (req, res) => {
  const { username } = parseParams(req, usernameParamSchema);
  const user = await findUserOr404(username);

  const followers = await collect(getServices().graph.followersOf(user));
  const response: UserList = { items: followers.map((follower) => toAuthorDTO(follower)) };
  res.json(response);
}));

/**
 * GET /api/users/:username/following
 */
router.get('/api/users/:username/following', asyncHandler(async (req, res) => {
  const { username } = parseParams(req, usernameParamSchema);
  const user = await findUserOr404(username);

  const followed = await collect(getServices().graph.followedBy(user));
  const response: UserList = { items: followed.map((member) => toAuthorDTO(member)) };
  res.json(response);
}));

export default router;
