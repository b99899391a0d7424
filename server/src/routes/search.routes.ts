import { Router } from 'express';
import { requireCacheReady } from '../middleware/cacheReady.middleware';
import { normalizeSearchTerm, searchByPrefix } from '../query/prefixSearch';
import { CacheStore } from '../services/CacheStore';
import { pageBody, pagingSchema, parseQuery } from './listingQuery';

export function createSearchRouter(store: CacheStore): Router {
  const router = Router();
  const ready = requireCacheReady(store);

  /**
   * GET /search_residential_projects?q=
   * Name-prefix search, alphabetical; limit clamped to [1, 100].
   */
  router.get('/search_residential_projects', ready, (req, res) => {
    const { limit, offset } = parseQuery(pagingSchema, req.query);
    const term = normalizeSearchTerm(req.query.q);
    const page = searchByPrefix(
      term,
      store.getResidentialProjectsNameIndex(),
      store.getResidentialProjects(),
      { limit, offset },
    );
    res.json(pageBody('projects', page));
  });

  /**
   * GET /search_commercial_projects?q=
   */
  router.get('/search_commercial_projects', ready, (req, res) => {
    const { limit, offset } = parseQuery(pagingSchema, req.query);
    const term = normalizeSearchTerm(req.query.q);
    const page = searchByPrefix(
      term,
      store.getCommercialProjectsNameIndex(),
      store.getCommercialProjects(),
      { limit, offset },
    );
    res.json(pageBody('projects', page));
  });

  return router;
}
