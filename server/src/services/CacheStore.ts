import NodeCache from 'node-cache';
import { setTimeout as delay } from 'timers/promises';
import { AirtableAdapter } from '../adapters/AirtableAdapter';
import { DataSourceAdapter, DatasetName, RawRecord } from '../adapters/DataSourceAdapter';
import { env } from '../config/env';
import { buildNameIndex } from '../query/prefixSearch';
import {
  formatCommercialProject,
  formatCommercialProperty,
  formatLocality,
  formatResidentialProject,
  formatResidentialProperty,
} from '../transformers/listingFormatters';
import {
  Collection,
  CommercialProject,
  CommercialProperty,
  Locality,
  NameIndex,
  ResidentialProject,
  ResidentialProperty,
} from '../types/listings';

/**
 * EMPTY -> LOADING -> READY. A failed background load drops back to EMPTY so
 * the next caller retries.
 */
export type CacheState = 'EMPTY' | 'LOADING' | 'READY';

export interface CacheSnapshot {
  residentialProjects: Collection<ResidentialProject>;
  commercialProjects: Collection<CommercialProject>;
  residentialProperties: Collection<ResidentialProperty>;
  commercialProperties: Collection<CommercialProperty>;
  localities: Collection<Locality>;
  residentialProjectsNameIndex: NameIndex;
  commercialProjectsNameIndex: NameIndex;
}

type SnapshotKey = keyof CacheSnapshot;

const SNAPSHOT_KEYS: readonly SnapshotKey[] = [
  'residentialProjects',
  'commercialProjects',
  'residentialProperties',
  'commercialProperties',
  'localities',
  'residentialProjectsNameIndex',
  'commercialProjectsNameIndex',
];

export interface CacheStoreOptions {
  /** Pause between dataset fetches, to stay under the remote store's rate limit */
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RefreshSummary {
  status: 'success';
  message: string;
  total_projects: number;
}

export interface CacheStatus {
  state: CacheState;
  counts: Record<DatasetName, number>;
}

function emptySnapshot(): CacheSnapshot {
  return {
    residentialProjects: [],
    commercialProjects: [],
    residentialProperties: [],
    commercialProperties: [],
    localities: [],
    residentialProjectsNameIndex: new Map(),
    commercialProjectsNameIndex: new Map(),
  };
}

export class CacheStore {
  // No TTL and no expiry timer: entries live until the next full swap
  private readonly store = new NodeCache({ useClones: false, stdTTL: 0, checkperiod: 0 });
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private state: CacheState = 'EMPTY';
  private loading: Promise<void> | null = null;

  constructor(
    private readonly source: DataSourceAdapter,
    options: CacheStoreOptions = {},
  ) {
    this.backoffMs = options.backoffMs ?? env.FETCH_BACKOFF_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.swap(emptySnapshot());
  }

  get currentState(): CacheState {
    return this.state;
  }

  /**
   * Non-blocking readiness check. The first call on an empty cache starts the
   * background load; every call until it finishes gets false.
   */
  ensureInitialized(): boolean {
    if (this.state === 'READY') return true;
    if (this.state === 'LOADING') return false;

    // Synchronous check-and-set: nothing can interleave before the load is registered
    this.state = 'LOADING';
    this.loading = this.loadInBackground().finally(() => {
      this.loading = null;
    });
    return false;
  }

  /** Resolves once the in-flight background load, if any, has finished. */
  settled(): Promise<void> {
    return this.loading ?? Promise.resolve();
  }

  /**
   * Rebuild the cache now, whatever the current state. The snapshot is only
   * replaced on success; failures propagate and leave the old one in place.
   */
  async refresh(): Promise<RefreshSummary> {
    const snapshot = await this.populate();
    this.swap(snapshot);
    this.state = 'READY';

    return {
      status: 'success',
      message: 'Cache updated successfully',
      total_projects: snapshot.residentialProjects.length,
    };
  }

  getResidentialProjects(): Collection<ResidentialProject> {
    return this.read('residentialProjects');
  }

  getCommercialProjects(): Collection<CommercialProject> {
    return this.read('commercialProjects');
  }

  getResidentialProperties(): Collection<ResidentialProperty> {
    return this.read('residentialProperties');
  }

  getCommercialProperties(): Collection<CommercialProperty> {
    return this.read('commercialProperties');
  }

  getLocalities(): Collection<Locality> {
    return this.read('localities');
  }

  getResidentialProjectsNameIndex(): NameIndex {
    return this.read('residentialProjectsNameIndex');
  }

  getCommercialProjectsNameIndex(): NameIndex {
    return this.read('commercialProjectsNameIndex');
  }

  /** [residential properties, commercial properties] */
  getCacheSize(): [number, number] {
    return [this.getResidentialProperties().length, this.getCommercialProperties().length];
  }

  getStatus(): CacheStatus {
    return {
      state: this.state,
      counts: {
        residentialProjects: this.getResidentialProjects().length,
        commercialProjects: this.getCommercialProjects().length,
        residentialProperties: this.getResidentialProperties().length,
        commercialProperties: this.getCommercialProperties().length,
        localities: this.getLocalities().length,
      },
    };
  }

  private async loadInBackground(): Promise<void> {
    try {
      this.swap(await this.populate());
      this.state = 'READY';
      console.info('CacheStore: initialization completed', this.getStatus().counts);
    } catch (err) {
      console.error('CacheStore: background initialization failed:', err);
      // A forced refresh may have landed while this load was running
      if (this.state === 'LOADING') {
        this.swap(emptySnapshot());
        this.state = 'EMPTY';
      }
    }
  }

  private async populate(): Promise<CacheSnapshot> {
    const rawResidentialProjects = await this.fetch('residentialProjects');
    const rawCommercialProjects = await this.fetch('commercialProjects');
    const rawResidentialProperties = await this.fetch('residentialProperties');
    const rawCommercialProperties = await this.fetch('commercialProperties');
    const rawLocalities = await this.fetch('localities', false);

    // Residential projects first: property photo backfill reads them
    const residentialProjects = rawResidentialProjects.map((r) => formatResidentialProject(r));
    const commercialProjects = rawCommercialProjects.map((r) => formatCommercialProject(r));
    const residentialProperties = rawResidentialProperties.map((r) =>
      formatResidentialProperty(r, residentialProjects),
    );
    const commercialProperties = rawCommercialProperties.map((r) => formatCommercialProperty(r));
    const localities = rawLocalities.map((r) => formatLocality(r));

    return {
      residentialProjects,
      commercialProjects,
      residentialProperties,
      commercialProperties,
      localities,
      residentialProjectsNameIndex: buildNameIndex(residentialProjects),
      commercialProjectsNameIndex: buildNameIndex(commercialProjects),
    };
  }

  private async fetch(dataset: DatasetName, backOff = true): Promise<RawRecord[]> {
    const records = await this.source.fetchDataset(dataset);
    console.info(`CacheStore: fetched ${records.length} ${dataset} records from ${this.source.sourceId}`);

    if (backOff && this.backoffMs > 0) {
      await this.sleep(this.backoffMs);
    }
    return records;
  }

  /** One synchronous mset, so readers see either the old or the new snapshot. */
  private swap(snapshot: CacheSnapshot): void {
    this.store.mset<unknown>(SNAPSHOT_KEYS.map((key) => ({ key, val: snapshot[key] })));
  }

  private read<K extends SnapshotKey>(key: K): CacheSnapshot[K] {
    const value = this.store.get<CacheSnapshot[K]>(key);
    if (value === undefined) {
      throw new Error(`CacheStore: no ${key} snapshot`);
    }
    return value;
  }
}

export const cacheStore = new CacheStore(new AirtableAdapter());
