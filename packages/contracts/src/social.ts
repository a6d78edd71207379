import type { User } from './auth.js';

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface PostAuthor {
  id: number;
  username: string;
  avatar: string;
}

export interface Post {
  id: number;
  body: string;
  /** ISO-8601 */
  timestamp: string;
  author: PostAuthor;
}

export interface Profile extends User {
  followers: number;
  following: number;
  /** Whether the caller follows this user; false for anonymous callers */
  isFollowing: boolean;
  isSelf: boolean;
  posts: Page<Post>;
}

export interface UpdateProfileRequest {
  username?: string;
  aboutMe?: string | null;
}

export interface CreatePostRequest {
  body: string;
}

export interface FollowResponse {
  following: boolean;
  message: string;
}

export interface UserList {
  items: PostAuthor[];
}
