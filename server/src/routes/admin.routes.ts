import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { requireAdmin, requireJwt } from '../middleware/jwtAuth.middleware';
import { CacheStore } from '../services/CacheStore';

export function createAdminRouter(store: CacheStore): Router {
  const router = Router();

  /**
   * GET /update_cache
   * Rebuilds the cache synchronously. Admin JWT required.
   */
  router.get(
    '/update_cache',
    requireJwt,
    requireAdmin,
    asyncHandler(async (_req, res) => {
      try {
        res.json(await store.refresh());
      } catch (err) {
        console.error('update_cache failed:', err);
        res.status(500).json({ status: 'error', message: err instanceof Error ? err.message : String(err) });
      }
    }),
  );

  return router;
}
