import { Router } from 'express';
import { ACCESS_TOKEN_COOKIE } from '@shared/middleware/auth.js';

const router = Router();

/**
 * POST /api/auth/logout
 * Access tokens are stateless; logging out clears the session cookie
 */
router.post('/api/auth/logout', (_req, res) => {
  res.clearCookie(ACCESS_TOKEN_COOKIE, { path: '/' });
  res.json({ message: 'Logged out successfully' });
});

export default router;
