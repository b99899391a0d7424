import { CacheStore } from './CacheStore';
import { DATASETS } from '../adapters/DataSourceAdapter';
import { FakeSource, deferred } from '../../test/fakeSource';
import { sampleDatasets } from '../../test/fixtures';

describe('CacheStore', () => {
  let source: FakeSource;
  let store: CacheStore;

  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    source = new FakeSource(sampleDatasets());
    store = new CacheStore(source, { backoffMs: 0 });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('starts empty', () => {
    expect(store.currentState).toBe('EMPTY');
    expect(store.getResidentialProjects()).toEqual([]);
    expect(store.getCacheSize()).toEqual([0, 0]);
    expect(source.calls).toEqual([]);
  });

  describe('ensureInitialized', () => {
    it('starts exactly one load however many callers race', async () => {
      const gate = deferred();
      source.gate = gate.promise;

      const answers = Array.from({ length: 50 }, () => store.ensureInitialized());

      expect(answers.every((ready) => ready === false)).toBe(true);
      expect(store.currentState).toBe('LOADING');
      expect(source.calls).toEqual(['residentialProjects']);

      gate.resolve();
      await store.settled();

      expect(store.currentState).toBe('READY');
      expect(source.calls).toEqual([...DATASETS]);
      expect(store.ensureInitialized()).toBe(true);
      expect(source.calls).toHaveLength(5);
    });

    it('keeps answering false while the load is running', async () => {
      const gate = deferred();
      source.gate = gate.promise;

      store.ensureInitialized();
      expect(store.ensureInitialized()).toBe(false);
      expect(store.getCacheSize()).toEqual([0, 0]);

      gate.resolve();
      await store.settled();
      expect(store.ensureInitialized()).toBe(true);
    });

    it('returns to EMPTY after a failed load and retries on the next call', async () => {
      source.failOn = 'commercialProperties';

      store.ensureInitialized();
      await store.settled();

      expect(store.currentState).toBe('EMPTY');
      expect(store.getCacheSize()).toEqual([0, 0]);
      expect(console.error).toHaveBeenCalledWith(
        'CacheStore: background initialization failed:',
        new Error('commercialProperties unavailable'),
      );

      source.failOn = null;
      expect(store.ensureInitialized()).toBe(false);
      await store.settled();

      expect(store.currentState).toBe('READY');
      expect(source.calls).toHaveLength(4 + 5);
    });

    it('does not wipe a refresh that landed while a failing load was running', async () => {
      const gate = deferred();
      source.gate = gate.promise;
      store.ensureInitialized();

      source.gate = Promise.resolve();
      await store.refresh();

      source.failOn = 'residentialProjects';
      gate.resolve();
      await store.settled();

      expect(store.currentState).toBe('READY');
      expect(store.getCacheSize()).toEqual([3, 2]);
    });
  });

  describe('snapshot contents', () => {
    beforeEach(async () => {
      store.ensureInitialized();
      await store.settled();
    });

    it('keeps failed records as null entries', () => {
      const projects = store.getResidentialProjects();
      expect(projects).toHaveLength(4);
      expect(projects[3]).toBeNull();
    });

    it('backfills property photos from the linked project', () => {
      expect(store.getResidentialProperties()[0]?.photos).toBe('https://img.test/k1.jpg');
    });

    it('indexes project names', () => {
      const index = store.getResidentialProjectsNameIndex();
      expect(index.get('kalhaar blues')).toEqual([0]);
      expect(index.get('broken')).toBeUndefined();
      expect(store.getCommercialProjectsNameIndex().get('westfield plaza')).toEqual([1]);
    });

    it('reports sizes and counts', () => {
      expect(store.getCacheSize()).toEqual([3, 2]);
      expect(store.getStatus()).toEqual({
        state: 'READY',
        counts: {
          residentialProjects: 4,
          commercialProjects: 2,
          residentialProperties: 3,
          commercialProperties: 2,
          localities: 4,
        },
      });
    });
  });

  describe('backoff', () => {
    it('pauses after every fetch except the last', async () => {
      const sleep = jest.fn((_ms: number) => Promise.resolve());
      store = new CacheStore(source, { backoffMs: 250, sleep });

      await store.refresh();

      expect(sleep).toHaveBeenCalledTimes(4);
      expect(sleep).toHaveBeenCalledWith(250);
    });

    it('does not pause when the backoff is zero', async () => {
      const sleep = jest.fn((_ms: number) => Promise.resolve());
      store = new CacheStore(source, { backoffMs: 0, sleep });

      await store.refresh();

      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('refresh', () => {
    it('loads synchronously from EMPTY and summarizes', async () => {
      await expect(store.refresh()).resolves.toEqual({
        status: 'success',
        message: 'Cache updated successfully',
        total_projects: 4,
      });
      expect(store.currentState).toBe('READY');
    });

    it('replaces the whole snapshot', async () => {
      const datasets = sampleDatasets();
      store = new CacheStore(new FakeSource(datasets), { backoffMs: 0 });
      await store.refresh();

      datasets.commercialProperties = [];
      await store.refresh();

      expect(store.getCacheSize()).toEqual([3, 0]);
    });

    it('keeps the previous snapshot when a fetch fails', async () => {
      await store.refresh();
      source.failOn = 'localities';

      await expect(store.refresh()).rejects.toThrow('localities unavailable');

      expect(store.currentState).toBe('READY');
      expect(store.getCacheSize()).toEqual([3, 2]);
      expect(store.getLocalities()).toHaveLength(4);
    });
  });
});
