import { z } from 'zod';
import { ValidationError } from '../errors/HttpError';
import { Collection, FieldValue } from '../types/listings';
import { decimalText } from './numericText';
import { Page, PageRequest, paginate } from './pagination';

export const MAX_VIEWPORT_LIMIT = 500;

export interface Viewport {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

export interface LatLng {
  lat: number;
  lng: number;
}

export interface ViewportPage<T> extends Page<T> {
  viewport: Viewport;
}

/**
 * Entities carry their position under "coordinates", except commercial
 * projects which use "Coordinates". Both are read, lowercase first.
 */
export interface Locatable {
  coordinates?: FieldValue;
  Coordinates?: FieldValue;
}

const NOT_NUMERIC = 'All viewport parameters must be numeric';

const bound = z.preprocess(
  decimalText,
  z.number({ invalid_type_error: NOT_NUMERIC }).finite({ message: NOT_NUMERIC }),
);

const viewportSchema = z
  .object({ minLat: bound, maxLat: bound, minLng: bound, maxLng: bound })
  .superRefine((v, ctx) => {
    if (v.minLat > v.maxLat || v.minLng > v.maxLng) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Min values cannot be greater than max values' });
    } else if (!isLatitude(v.minLat) || !isLatitude(v.maxLat)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Latitude must be between -90 and 90 degrees' });
    } else if (!isLongitude(v.minLng) || !isLongitude(v.maxLng)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Longitude must be between -180 and 180 degrees' });
    }
  });

function isLatitude(value: number): boolean {
  return value >= -90 && value <= 90;
}

function isLongitude(value: number): boolean {
  return value >= -180 && value <= 180;
}

export function createViewport(raw: Record<keyof Viewport, unknown>): Viewport {
  const parsed = viewportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid viewport parameters: ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}

/** Parse "lat,lng". Anything else, including out-of-range pairs, is null. */
export function parseCoordinates(value: FieldValue | undefined): LatLng | null {
  if (typeof value !== 'string' || value === '') return null;

  const parts = value.split(',');
  if (parts.length !== 2) return null;

  const [latText, lngText] = parts.map((p) => p.trim());
  if (latText === '' || lngText === '') return null;

  const lat = Number(latText);
  const lng = Number(lngText);
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) return null;
  if (!isLatitude(lat) || !isLongitude(lng)) return null;

  return { lat, lng };
}

export function isInViewport(point: LatLng, viewport: Viewport): boolean {
  return (
    viewport.minLat <= point.lat &&
    point.lat <= viewport.maxLat &&
    viewport.minLng <= point.lng &&
    point.lng <= viewport.maxLng
  );
}

export function filterByViewport<T extends Locatable>(items: Collection<T>, viewport: Viewport): T[] {
  const inside: T[] = [];

  for (const item of items) {
    if (!item) continue;
    const point = parseCoordinates(item.coordinates || item.Coordinates);
    if (point && isInViewport(point, viewport)) {
      inside.push(item);
    }
  }

  return inside;
}

export function queryViewport<T extends Locatable>(
  items: Collection<T>,
  rawViewport: Record<keyof Viewport, unknown>,
  request: PageRequest,
): ViewportPage<T> {
  const viewport = createViewport(rawViewport);
  const page = paginate(filterByViewport(items, viewport), request, {
    maxLimit: MAX_VIEWPORT_LIMIT,
    overflowMessage: 'Page number exceeds available data for this viewport',
  });

  return { ...page, viewport };
}
