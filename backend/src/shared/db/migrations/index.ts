import { CreateUsersAndPosts1700000000000 } from './1700000000000-create-users-and-posts.js';
import { CreateFollowers1700000000001 } from './1700000000001-create-followers.js';

// Applied in order
export const migrations = [
  CreateUsersAndPosts1700000000000,
  CreateFollowers1700000000001,
];
