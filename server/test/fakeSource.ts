import { DataSourceAdapter, DatasetName, RawRecord, TableRef } from '../src/adapters/DataSourceAdapter';

export type Datasets = Partial<Record<DatasetName, RawRecord[]>>;

/** In-process stand-in for the remote store. */
export class FakeSource implements DataSourceAdapter {
  readonly sourceId = 'fake';
  readonly calls: DatasetName[] = [];
  /** Dataset whose fetch rejects */
  failOn: DatasetName | null = null;
  /** Every fetch waits on this before answering */
  gate: Promise<void> = Promise.resolve();

  constructor(private readonly datasets: Datasets = {}) {}

  async fetchAll(table: TableRef): Promise<RawRecord[]> {
    throw new Error(`fetchAll(${table.tableId}) is not used by the cache`);
  }

  async fetchDataset(dataset: DatasetName): Promise<RawRecord[]> {
    this.calls.push(dataset);
    await this.gate;
    if (dataset === this.failOn) {
      throw new Error(`${dataset} unavailable`);
    }
    return this.datasets[dataset] ?? [];
  }
}

/** A promise plus the function that resolves it */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
