import { Request, Response, NextFunction } from 'express';
import { CacheStore } from '../services/CacheStore';

export const INITIALIZING_MESSAGE = 'Data is being loaded. Please try again in a few minutes.';

/**
 * Answers 202 until the cache has been populated. The first request on an
 * empty cache kicks off the background load.
 */
export function requireCacheReady(store: CacheStore, emptyBody: Record<string, unknown> = {}) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    if (!store.ensureInitialized()) {
      res.status(202).json({ status: 'initializing', message: INITIALIZING_MESSAGE, ...emptyBody });
      return;
    }
    next();
  };
}
