import { Router } from 'express';
import { requireCacheReady } from '../middleware/cacheReady.middleware';
import { listLocalityNames } from '../query/lookup';
import { CacheStore } from '../services/CacheStore';
import { listingBody } from './listingQuery';

export function createProjectsRouter(store: CacheStore): Router {
  const router = Router();
  const ready = requireCacheReady(store);

  /**
   * GET /residential_projects
   * Offset/limit listing; viewport-filtered when minLat, maxLat, minLng and maxLng are all given.
   */
  router.get('/residential_projects', ready, (req, res) => {
    res.json(listingBody('projects', store.getResidentialProjects(), req.query));
  });

  /**
   * GET /commercial_projects
   */
  router.get('/commercial_projects', ready, (req, res) => {
    res.json(listingBody('projects', store.getCommercialProjects(), req.query));
  });

  /**
   * GET /get_localities
   * Sorted, title-cased locality names.
   */
  router.get('/get_localities', ready, (_req, res) => {
    res.json({ status: 'success', localities: listLocalityNames(store.getLocalities()) });
  });

  return router;
}
