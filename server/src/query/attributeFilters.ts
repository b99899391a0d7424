import { Collection, CommercialProperty, FieldValue, PropertyListing, ResidentialProperty } from '../types/listings';

export interface PropertyCriteria {
  /** Inclusive */
  priceMin?: number;
  /** Inclusive */
  priceMax?: number;
  /** Exact, case-sensitive */
  transactionType?: string;
  /** Case-insensitive exact match against any entry */
  propertyType?: readonly string[];
  /** Case-insensitive; matches when any entry is one of the property's localities */
  locality?: readonly string[];
}

export interface ResidentialCriteria extends PropertyCriteria {
  /** Case-insensitive substring: "3" matches "3 BHK" */
  bhk?: readonly string[];
}

interface NormalizedCriteria {
  priceMin?: number;
  priceMax?: number;
  transactionType?: string;
  propertyTypes: Set<string> | null;
  localities: Set<string> | null;
}

/** "₹1,50,000" -> 150000. Text that is not a number after cleanup is null. */
export function parsePrice(value: FieldValue): number | null {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(/,/g, '').replace(/₹/g, '').trim();
  if (cleaned === '') return null;

  const price = Number(cleaned);
  return Number.isNaN(price) ? null : price;
}

function tokens(values: readonly string[] | undefined): string[] {
  return (values ?? []).map((v) => v.trim().toLowerCase()).filter((v) => v !== '');
}

function tokenSet(values: readonly string[] | undefined): Set<string> | null {
  const set = new Set(tokens(values));
  return set.size > 0 ? set : null;
}

function text(value: FieldValue, fieldName: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new TypeError(`${fieldName} is not text: ${JSON.stringify(value)}`);
}

function normalize(criteria: PropertyCriteria): NormalizedCriteria {
  return {
    priceMin: criteria.priceMin,
    priceMax: criteria.priceMax,
    transactionType: criteria.transactionType || undefined,
    propertyTypes: tokenSet(criteria.propertyType),
    localities: tokenSet(criteria.locality),
  };
}

function matchesCommon(property: PropertyListing, criteria: NormalizedCriteria): boolean {
  const { priceMin, priceMax, transactionType, propertyTypes, localities } = criteria;

  if (priceMin !== undefined || priceMax !== undefined) {
    const price = parsePrice(property.price);
    if (price === null) return false;
    if (priceMin !== undefined && price < priceMin) return false;
    if (priceMax !== undefined && price > priceMax) return false;
  }

  if (transactionType !== undefined && property.transactionType !== transactionType) {
    return false;
  }

  if (propertyTypes && !propertyTypes.has(text(property.propertyType, 'propertyType').toLowerCase())) {
    return false;
  }

  if (localities && !property.locality.some((loc) => localities.has(loc.trim().toLowerCase()))) {
    return false;
  }

  return true;
}

function applyFilter<T extends PropertyListing>(
  properties: Collection<T>,
  predicate: (property: T) => boolean,
): T[] {
  const matched: T[] = [];

  for (const property of properties) {
    if (!property) continue;
    try {
      if (predicate(property)) matched.push(property);
    } catch (err) {
      console.error(`Error filtering property ${property.airtable_id}:`, err);
    }
  }

  return matched;
}

export function filterResidentialProperties(
  properties: Collection<ResidentialProperty>,
  criteria: ResidentialCriteria = {},
): ResidentialProperty[] {
  const common = normalize(criteria);
  const bhk = tokens(criteria.bhk);

  return applyFilter(properties, (property) => {
    if (!matchesCommon(property, common)) return false;
    if (bhk.length > 0) {
      const propertyBhk = text(property.bhk, 'bhk').toLowerCase();
      return bhk.some((token) => propertyBhk.includes(token));
    }
    return true;
  });
}

export function filterCommercialProperties(
  properties: Collection<CommercialProperty>,
  criteria: PropertyCriteria = {},
): CommercialProperty[] {
  const common = normalize(criteria);
  return applyFilter(properties, (property) => matchesCommon(property, common));
}
