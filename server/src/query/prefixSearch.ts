import { ValidationError } from '../errors/HttpError';
import { Collection, FieldValue, NameIndex } from '../types/listings';
import { Page, paginate } from './pagination';

export const MAX_SEARCH_LIMIT = 100;

interface Named {
  name: FieldValue;
}

function nameKey(name: FieldValue): string {
  return String(name).toLowerCase();
}

/** Full rebuild; entities without a name are left out. */
export function buildNameIndex<T extends Named>(collection: Collection<T>): Map<string, number[]> {
  const index = new Map<string, number[]>();

  collection.forEach((item, position) => {
    if (!item || !item.name) return;
    const key = nameKey(item.name);
    const positions = index.get(key);
    if (positions) {
      positions.push(position);
    } else {
      index.set(key, [position]);
    }
  });

  return index;
}

export function normalizeSearchTerm(raw: unknown): string {
  const term = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  if (!term) {
    throw new ValidationError('Search term is required');
  }
  return term;
}

/**
 * Entities whose lowercased name starts with term, sorted by lowercased name.
 * Linear scan over the distinct names in the index.
 */
export function searchByPrefix<T extends Named>(
  term: string,
  index: NameIndex,
  collection: Collection<T>,
  request: { limit: number; offset: number },
): Page<T> {
  const positions = new Set<number>();
  for (const [key, keyPositions] of index) {
    if (key.startsWith(term)) {
      keyPositions.forEach((p) => positions.add(p));
    }
  }

  const matches: T[] = [];
  for (const position of [...positions].sort((a, b) => a - b)) {
    const item = collection[position];
    if (item) matches.push(item);
  }

  matches.sort((a, b) => {
    const left = nameKey(a.name);
    const right = nameKey(b.name);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });

  return paginate(matches, request, {
    maxLimit: MAX_SEARCH_LIMIT,
    overflowMessage: 'Offset exceeds available data',
  });
}
