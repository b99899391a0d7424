import { z } from 'zod';
import { ValidationError } from '../errors/HttpError';
import { decimalText, integerText } from '../query/numericText';
import { Page, compact, paginate } from '../query/pagination';
import { Locatable, Viewport, queryViewport } from '../query/viewport';
import { Collection } from '../types/listings';

export const DEFAULT_LIMIT = 12;

const VIEWPORT_KEYS = ['minLat', 'maxLat', 'minLng', 'maxLng'] as const;

// Absent and empty values fall back to the default; anything else must be numeric text
const emptyOr =
  (parse: (v: unknown) => unknown) =>
  (v: unknown): unknown =>
    v === '' ? undefined : parse(v);

const intParam = (name: string, fallback: number) =>
  z.preprocess(
    emptyOr(integerText),
    z
      .number({ invalid_type_error: `${name} must be an integer` })
      .int({ message: `${name} must be an integer` })
      .default(fallback),
  );

const priceParam = (name: string) =>
  z.preprocess(
    emptyOr(decimalText),
    z
      .number({ invalid_type_error: `${name} must be a number` })
      .finite({ message: `${name} must be a number` })
      .optional(),
  );

/** "a,b" -> ["a", "b"] */
const listParam = (name: string) =>
  z
    .string({ invalid_type_error: `${name} must be a comma-separated string` })
    .optional()
    .transform((v) => (v ? v.split(',') : undefined));

export const pagingSchema = z.object({
  limit: intParam('limit', DEFAULT_LIMIT),
  offset: intParam('offset', 0),
});

export const commercialFilterSchema = z.object({
  priceMin: priceParam('priceMin'),
  priceMax: priceParam('priceMax'),
  transactionType: z.string({ invalid_type_error: 'transactionType must be a string' }).optional(),
  propertyType: listParam('propertyType'),
  locality: listParam('locality'),
});

export const residentialFilterSchema = commercialFilterSchema.extend({
  bhk: listParam('bhk'),
});

export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.output<S> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0].message);
  }
  return parsed.data;
}

/** The four bounds, or null unless every one is present and non-empty. */
export function viewportParams(query: Record<string, unknown>): Record<keyof Viewport, unknown> | null {
  if (!VIEWPORT_KEYS.every((key) => Boolean(query[key]))) return null;

  return {
    minLat: query.minLat,
    maxLat: query.maxLat,
    minLng: query.minLng,
    maxLng: query.maxLng,
  };
}

export function pageBody<T>(key: 'projects' | 'properties', page: Page<T>): Record<string, unknown> {
  return {
    status: 'success',
    [key]: page.items,
    total: page.total,
    limit: page.limit,
    offset: page.offset,
    has_more: page.hasMore,
    ...(page.message !== undefined ? { message: page.message } : {}),
  };
}

/**
 * Viewport mode when all four bounds are given (limit clamped to 500),
 * otherwise plain offset/limit over every formatted entity.
 */
export function listingBody<T extends Locatable>(
  key: 'projects' | 'properties',
  items: Collection<T>,
  query: Record<string, unknown>,
): Record<string, unknown> {
  const { limit, offset } = parseQuery(pagingSchema, query);
  const viewport = viewportParams(query);

  if (viewport) {
    const page = queryViewport(items, viewport, { page: 1, limit, offset });
    return { ...pageBody(key, page), page: page.page, viewport: page.viewport };
  }

  const page = paginate(compact(items), { limit, offset }, { overflowMessage: 'Offset exceeds available data' });
  return pageBody(key, page);
}
