import { Router } from 'express';
import { requireAuth, currentIdentity } from '@shared/middleware/auth.js';
import { toCurrentUserDTO } from '@shared/services/dto.js';

const router = Router();

/**
 * GET /api/auth/me
 */
router.get('/api/auth/me', requireAuth, (req, res) => {
  res.json(toCurrentUserDTO(currentIdentity(req)));
});

export default router;
