import type {
  CurrentUser,
  Page as PageDTO,
  Post as PostDTO,
  PostAuthor,
  User as UserDTO,
} from '@microblog/contracts';
import type { User } from '@shared/db/entities/User.js';
import type { Post } from '@shared/db/entities/Post.js';
import type { Page } from './pagination.js';
import { avatarUrl } from './identity/avatar.js';

export const PROFILE_AVATAR_SIZE = 128;
export const POST_AVATAR_SIZE = 36;

export function toUserDTO(user: User): UserDTO {
  return {
    id: user.id,
    username: user.username,
    aboutMe: user.aboutMe,
    lastSeen: new Date(user.lastSeen).toISOString(),
    avatar: avatarUrl(user.email, PROFILE_AVATAR_SIZE),
  };
}

export function toCurrentUserDTO(user: User): CurrentUser {
  return { ...toUserDTO(user), email: user.email };
}

export function toAuthorDTO(user: User, size = POST_AVATAR_SIZE): PostAuthor {
  return { id: user.id, username: user.username, avatar: avatarUrl(user.email, size) };
}

export function toPostDTO(post: Post): PostDTO {
  return {
    id: post.id,
    body: post.body,
    timestamp: new Date(post.timestamp).toISOString(),
    author: toAuthorDTO(post.author),
  };
}

export function toPageDTO<T, R>(page: Page<T>, map: (item: T) => R): PageDTO<R> {
  return { ...page, items: page.items.map(map) };
}
