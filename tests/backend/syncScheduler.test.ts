import * as fs from 'fs/promises';

import { CounterReconciler } from '../../src/backend/services/counterReconciler';
import { EngineStateStore } from '../../src/backend/services/engineStateStore';
import { FileLibraryStore } from '../../src/backend/services/libraryStore';
import { ReconciliationLock } from '../../src/backend/services/reconciliationLock';
import {
  SyncScheduler,
  shouldRunFullSync,
} from '../../src/backend/services/syncScheduler';
import { CatalogUnavailableError } from '../../src/backend/utils/errors';
import { FileStorage } from '../../src/backend/utils/fileStorage';
import { HOUR_MS } from '../../src/backend/utils/timestamps';
import { SyncStatus } from '../../src/shared/types';

import { InMemoryCatalog, createCatalogTrack } from './helpers/inMemoryCatalog';

describe('shouldRunFullSync', () => {
  const now = Date.UTC(2024, 5, 1, 12, 0, 0);

  it('should run when no full sync has happened yet', () => {
    expect(shouldRunFullSync(null, now)).toBe(true);
  });

  it('should run once four hours have passed', () => {
    expect(shouldRunFullSync(now - 4 * HOUR_MS, now)).toBe(true);
    expect(shouldRunFullSync(now - 5 * HOUR_MS, now)).toBe(true);
  });

  it('should not run within four hours', () => {
    expect(shouldRunFullSync(now - 4 * HOUR_MS + 1, now)).toBe(false);
  });

  it('should honour a custom interval', () => {
    expect(shouldRunFullSync(now - HOUR_MS, now, HOUR_MS)).toBe(true);
  });
});

describe('SyncScheduler', () => {
  const testDataDir = './test-data-sync-scheduler';
  const T0 = Date.UTC(2024, 5, 1, 12, 0, 0);

  let fileStorage: FileStorage;
  let store: FileLibraryStore;
  let catalog: InMemoryCatalog;
  let stateStore: EngineStateStore;
  let reconciler: CounterReconciler;
  let scheduler: SyncScheduler;

  beforeEach(async () => {
    fileStorage = new FileStorage(testDataDir);
    await fileStorage.ensureDataDir();
    store = new FileLibraryStore(fileStorage);
    catalog = new InMemoryCatalog([
      createCatalogTrack({ id: 'a', currentPlayCount: 3 }),
      createCatalogTrack({ id: 'b', currentPlayCount: 1 }),
    ]);
    stateStore = new EngineStateStore(fileStorage);
    reconciler = new CounterReconciler(
      catalog,
      store,
      new ReconciliationLock()
    );
    scheduler = new SyncScheduler(reconciler, catalog, stateStore);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(testDataDir, { recursive: true, force: true });
  });

  it('should run a full sync on first activation', async () => {
    // Act
    const outcome = await scheduler.onAppActivated(T0);

    // Assert
    expect(outcome.mode).toBe('full');
    expect(outcome.report?.tracksProcessed).toBe(2);
    expect((await stateStore.get()).lastFullSyncAt).toBe(T0);
    expect(scheduler.getSyncStatus()).toEqual({
      status: 'completed',
      mode: 'full',
      lastSyncTimestamp: T0,
      playsCreated: 0,
    });
  });

  it('should skip the quick path when nothing is playing', async () => {
    await scheduler.onAppActivated(T0);

    const outcome = await scheduler.onAppActivated(T0 + HOUR_MS);

    expect(outcome).toEqual({
      mode: 'skipped',
      report: null,
      quickResult: null,
    });
  });

  it('should reconcile only the now-playing track within the interval', async () => {
    // Arrange
    await scheduler.onAppActivated(T0);
    catalog.setPlayCount('a', 4);
    catalog.setPlayCount('b', 9);
    catalog.setNowPlaying('a');
    const fullSpy = jest.spyOn(reconciler, 'reconcileAll');

    // Act
    const outcome = await scheduler.onAppActivated(T0 + HOUR_MS);

    // Assert
    expect(outcome.mode).toBe('quick');
    expect(outcome.quickResult?.playsCreated).toBe(1);
    expect(fullSpy).not.toHaveBeenCalled();
    expect(await store.countPlays({ trackId: 'b' })).toBe(0);
    expect((await stateStore.get()).lastQuickSyncAt).toBe(T0 + HOUR_MS);
  });

  it('should run a full sync again after the interval', async () => {
    await scheduler.onAppActivated(T0);
    catalog.setPlayCount('b', 3);

    const outcome = await scheduler.onAppActivated(T0 + 4 * HOUR_MS);

    expect(outcome.mode).toBe('full');
    expect(outcome.report?.playsCreated).toBe(2);
  });

  it('should join a sync that is already running', async () => {
    const fullSpy = jest.spyOn(reconciler, 'reconcileAll');

    const [first, second] = await Promise.all([
      scheduler.onAppActivated(T0),
      scheduler.onAppActivated(T0),
    ]);

    expect(fullSpy).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(scheduler.isSyncing()).toBe(false);
  });

  it('should emit status changes', async () => {
    const statuses: SyncStatus[] = [];
    scheduler.on('statusChange', (status: SyncStatus) => statuses.push(status));

    await scheduler.onAppActivated(T0);

    expect(statuses.map(status => status.status)).toEqual([
      'syncing',
      'completed',
    ]);
  });

  it('should record the error and rethrow when the catalog fails', async () => {
    catalog.failWith(new Error('media service crashed'));

    await expect(scheduler.onAppActivated(T0)).rejects.toBeInstanceOf(
      CatalogUnavailableError
    );

    expect(scheduler.getSyncStatus()).toEqual({
      status: 'error',
      mode: 'full',
      error: 'Catalog enumeration failed',
    });
    expect((await stateStore.get()).lastFullSyncAt).toBeNull();
  });
});
