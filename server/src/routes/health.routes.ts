import { Router } from 'express';
import { requireCacheReady } from '../middleware/cacheReady.middleware';
import { CacheStore } from '../services/CacheStore';

export function createHealthRouter(store: CacheStore): Router {
  const router = Router();

  // Liveness only; never starts a cache load
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * GET /status
   * Readiness probe: 202 while the cache loads, then sizes of both property collections.
   */
  router.get('/status', requireCacheReady(store), (_req, res) => {
    res.json({
      status: 'healthy',
      cache_size: store.getCacheSize(),
      collections: store.getStatus().counts,
    });
  });

  return router;
}
