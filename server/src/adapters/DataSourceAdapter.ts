/**
 * Interface for the remote tabular store the cache is built from.
 * Implementations list every row of a table; AirtableAdapter is the only one.
 */

/** Logical datasets the cache holds, in population order */
export const DATASETS = [
  'residentialProjects',
  'commercialProjects',
  'residentialProperties',
  'commercialProperties',
  'localities',
] as const;

export type DatasetName = (typeof DATASETS)[number];

export interface TableRef {
  baseId: string;
  tableId: string;
}

/** Where a dataset lives in the remote store */
export interface DatasetLocation {
  table: TableRef;
  /** Named view to read through; whole table when omitted */
  view?: string;
}

/** One row as returned by the remote store */
export interface RawRecord {
  id: string;
  fields: Record<string, unknown>;
  createdTime?: string;
}

export interface DataSourceAdapter {
  /** Human-readable identifier, e.g. "airtable" */
  readonly sourceId: string;

  fetchAll(table: TableRef, view?: string): Promise<RawRecord[]>;
  fetchDataset(dataset: DatasetName): Promise<RawRecord[]>;
}
