import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import { z } from 'zod';
import {
  DataSourceAdapter,
  DatasetLocation,
  DatasetName,
  RawRecord,
  TableRef,
} from './DataSourceAdapter';
import { env } from '../config/env';

/** Raw page shape returned by GET /v0/{baseId}/{table} */
const airtablePageSchema = z.object({
  records: z.array(
    z.object({
      id: z.string(),
      createdTime: z.string().optional(),
      fields: z.record(z.unknown()),
    }),
  ),
  offset: z.string().optional(),
});

// Airtable caps list requests at 100 rows per page
const AIRTABLE_PAGE_SIZE = 100;

/** Retry-After as seconds or an HTTP date, in ms; null when absent or unreadable. */
export function parseRetryAfter(value: unknown, now = Date.now()): number | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const text = value.trim();
  if (/^\d+$/.test(text)) return Number(text) * 1000;

  const at = Date.parse(text);
  return Number.isNaN(at) ? null : Math.max(0, at - now);
}

/**
 * A 429 waits for Retry-After, or rateLimitDelayMs without one; Airtable
 * rejects every request for 30 s after a rate-limit hit. Other failures back
 * off exponentially.
 */
export function retryDelayFor(rateLimitDelayMs: number) {
  return (retryCount: number, error: AxiosError): number => {
    if (error.response?.status === 429) {
      return parseRetryAfter(error.response.headers['retry-after']) ?? rateLimitDelayMs;
    }
    return axiosRetry.exponentialDelay(retryCount, error);
  };
}

export type DatasetLocations = Record<DatasetName, DatasetLocation>;

export interface AirtableAdapterOptions {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  /** Wait after a 429 that carries no Retry-After */
  rateLimitDelayMs?: number;
  locations?: DatasetLocations;
  /** Transport override passed straight to axios */
  adapter?: AxiosAdapter;
}

export function datasetLocationsFromEnv(): DatasetLocations {
  const inventory = env.INVENTORY_BASE_ID;
  const view = env.AIRTABLE_VIEW;

  return {
    residentialProjects: { table: { baseId: inventory, tableId: env.RESIDENTIAL_PROJECTS_TABLE_ID }, view },
    commercialProjects: { table: { baseId: env.PROJECTS_BASE_ID, tableId: env.COMMERCIAL_PROJECTS_TABLE_ID } },
    residentialProperties: { table: { baseId: inventory, tableId: env.RESIDENTIAL_PROPERTIES_TABLE_ID }, view },
    commercialProperties: { table: { baseId: inventory, tableId: env.COMMERCIAL_PROPERTIES_TABLE_ID }, view },
    localities: { table: { baseId: inventory, tableId: env.LOCALITIES_TABLE_ID } },
  };
}

export class AirtableAdapter implements DataSourceAdapter {
  readonly sourceId = 'airtable';
  private readonly client: AxiosInstance;
  private readonly locations: DatasetLocations;

  constructor(options: AirtableAdapterOptions = {}) {
    const {
      baseUrl = env.AIRTABLE_BASE_URL,
      apiKey = env.AIRTABLE_API_KEY,
      timeoutMs = env.AIRTABLE_TIMEOUT_MS,
      rateLimitDelayMs = env.AIRTABLE_RATE_LIMIT_DELAY_MS,
      locations = datasetLocationsFromEnv(),
      adapter,
    } = options;

    this.locations = locations;
    this.client = axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      adapter,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        Accept: 'application/json',
      },
    });

    axiosRetry(this.client, {
      retries: 3,
      retryDelay: retryDelayFor(rateLimitDelayMs),
      // Each retry gets the full timeout, whatever the wait before it
      shouldResetTimeout: true,
      retryCondition: (err) => {
        const status = err.response?.status;
        return axiosRetry.isNetworkError(err) || status === 429 || (status !== undefined && status >= 500);
      },
    });
  }

  /**
   * Read every row of a table, following Airtable's offset cursor until the
   * last page.
   */
  async fetchAll(table: TableRef, view?: string): Promise<RawRecord[]> {
    const url = `/${encodeURIComponent(table.baseId)}/${encodeURIComponent(table.tableId)}`;
    const records: RawRecord[] = [];
    let offset: string | undefined;

    do {
      const { data } = await this.client.get<unknown>(url, {
        params: { pageSize: AIRTABLE_PAGE_SIZE, view, offset },
      });

      const page = airtablePageSchema.parse(data);
      records.push(...page.records);
      offset = page.offset;
    } while (offset);

    return records;
  }

  async fetchDataset(dataset: DatasetName): Promise<RawRecord[]> {
    const { table, view } = this.locations[dataset];
    return this.fetchAll(table, view);
  }
}
