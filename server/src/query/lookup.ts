import { Collection, FieldValue } from '../types/listings';

/** Linear scan; collections are a few thousand rows at most. */
export function findById<T extends { airtable_id: string }>(collection: Collection<T>, id: string): T | null {
  for (const item of collection) {
    if (item && item.airtable_id === id) return item;
  }
  return null;
}

// First letter of every run of letters upper, the rest lower: "c.g. road" -> "C.G. Road"
export function toTitleCase(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

/** Title-cased, sorted locality names; unnamed entries are dropped. */
export function listLocalityNames(localities: Collection<{ name: FieldValue }>): string[] {
  return localities
    .filter((loc): loc is { name: FieldValue } => loc !== null && Boolean(loc.name))
    .map((loc) => toTitleCase(String(loc.name)))
    .sort();
}
