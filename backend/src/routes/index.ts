import type { Express } from 'express';

import {
  registerRoute,
  loginRoute,
  logoutRoute,
  meRoute,
  forgotPasswordRoute,
} from '@modules/auth/index.js';
import { usersRoute, followRoute } from '@modules/users/index.js';
import { postsRoute, feedRoute } from '@modules/posts/index.js';

/**
 * Register all application routes
 */
export function registerRoutes(app: Express): void {
  // Authentication
  app.use(registerRoute);
  app.use(loginRoute);
  app.use(logoutRoute);
  app.use(meRoute);
  app.use(forgotPasswordRoute);

  // Profiles and the social graph
  app.use(usersRoute);
  app.use(followRoute);

  // Posting and timelines
  app.use(postsRoute);
  app.use(feedRoute);
}
