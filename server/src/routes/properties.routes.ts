import { Router, Request } from 'express';
import { NotFoundError } from '../errors/HttpError';
import { requireCacheReady } from '../middleware/cacheReady.middleware';
import { filterCommercialProperties, filterResidentialProperties } from '../query/attributeFilters';
import { findById } from '../query/lookup';
import { CacheStore } from '../services/CacheStore';
import { commercialFilterSchema, listingBody, parseQuery, residentialFilterSchema } from './listingQuery';

function propertyId(req: Request): string {
  const { propertyId } = req.query;
  return typeof propertyId === 'string' ? propertyId : '';
}

export function createPropertiesRouter(store: CacheStore): Router {
  const router = Router();
  const ready = requireCacheReady(store);
  const readyForListing = requireCacheReady(store, { properties: [], total: 0 });

  /**
   * GET /residential_properties
   * Attribute filters (priceMin, priceMax, bhk, propertyType, locality, transactionType),
   * then the same paging and viewport handling as the project listings.
   */
  router.get('/residential_properties', readyForListing, (req, res) => {
    const criteria = parseQuery(residentialFilterSchema, req.query);
    const filtered = filterResidentialProperties(store.getResidentialProperties(), criteria);
    res.json(listingBody('properties', filtered, req.query));
  });

  /**
   * GET /commercial_properties
   */
  router.get('/commercial_properties', readyForListing, (req, res) => {
    const criteria = parseQuery(commercialFilterSchema, req.query);
    const filtered = filterCommercialProperties(store.getCommercialProperties(), criteria);
    res.json(listingBody('properties', filtered, req.query));
  });

  /**
   * GET /residential_property_by_id?propertyId=
   */
  router.get('/residential_property_by_id', ready, (req, res) => {
    const property = findById(store.getResidentialProperties(), propertyId(req));
    if (!property) throw new NotFoundError('Property not found');
    res.json(property);
  });

  /**
   * GET /commercial_property_by_id?propertyId=
   */
  router.get('/commercial_property_by_id', ready, (req, res) => {
    const property = findById(store.getCommercialProperties(), propertyId(req));
    if (!property) throw new NotFoundError('Property not found');
    res.json(property);
  });

  return router;
}
