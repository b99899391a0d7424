import { Collection } from '../types/listings';

export interface PageRequest {
  /** 1-based; only the viewport path pages by number */
  page?: number;
  limit: number;
  offset: number;
}

export interface PageOptions {
  /** Upper clamp for limit; unbounded when omitted */
  maxLimit?: number;
  /** Returned alongside an empty page when the start index is past the end */
  overflowMessage: string;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  offset: number;
  hasMore: boolean;
  message?: string;
}

export function clampLimit(limit: number, maxLimit?: number): number {
  const bounded = maxLimit === undefined ? limit : Math.min(maxLimit, limit);
  return Math.max(1, bounded);
}

/** Drop records that failed to format */
export function compact<T>(collection: Collection<T>): T[] {
  return collection.filter((item): item is T => item !== null);
}

/**
 * Slice a result set. start = (page - 1) * limit + offset; a start at or past
 * the end yields an empty page with hasMore=false.
 */
export function paginate<T>(items: readonly T[], request: PageRequest, options: PageOptions): Page<T> {
  const page = Math.max(1, request.page ?? 1);
  const limit = clampLimit(request.limit, options.maxLimit);
  const offset = Math.max(0, request.offset);

  const start = (page - 1) * limit + offset;
  const end = start + limit;
  const total = items.length;

  if (start >= total) {
    return { items: [], total, page, limit, offset, hasMore: false, message: options.overflowMessage };
  }

  return { items: items.slice(start, end), total, page, limit, offset, hasMore: end < total };
}
